export class CryptoError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'CryptoError';
  }
}

export class UnsupportedAlgorithmError extends CryptoError {
  constructor(algorithm: string) {
    super(`unsupported hash algorithm: ${algorithm}`, 'UNSUPPORTED_ALGORITHM');
    this.name = 'UnsupportedAlgorithmError';
  }
}
