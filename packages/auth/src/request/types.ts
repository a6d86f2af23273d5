/**
 * The parts of an HTTP request that MAC signing reads.
 */
export interface MacRequest {
  method: string;
  /** Path plus `?query` when there is one, exactly as it appears on the request line. */
  url: string;
  /** `Host` header value; carries the port when it is not the scheme default. */
  host: string;
  /** Defaults to `http`. */
  scheme?: string;
  authorization?: string;
}
