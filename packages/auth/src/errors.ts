export class MacAuthError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'MacAuthError';
  }
}

export const MALFORMED_HEADER_REASONS = [
  'EMPTY_HEADER',
  'MISSING_PARAMETERS',
  'MISSING_EQUALS',
  'EMPTY_KEY',
  'MISSING_VALUE',
  'UNEXPECTED_QUOTE',
  'UNEXPECTED_CHARACTER',
  'UNTERMINATED_QUOTE',
  'STRAY_COMMA',
  'DUPLICATE_KEY'
] as const;

export type MalformedHeaderReason = (typeof MALFORMED_HEADER_REASONS)[number];

export class MalformedHeaderError extends MacAuthError {
  constructor(
    public readonly reason: MalformedHeaderReason,
    public readonly position: number
  ) {
    super(`malformed authorization header: ${reason} at ${position}`, 'MALFORMED_HEADER');
    this.name = 'MalformedHeaderError';
  }
}

export class MissingParameterError extends MacAuthError {
  constructor(public readonly parameter: string) {
    super(`missing MAC parameter: ${parameter}`, 'MISSING_PARAMETER');
    this.name = 'MissingParameterError';
  }
}

export class InvalidParameterError extends MacAuthError {
  constructor(message: string, code = 'INVALID_PARAMETER') {
    super(message, code);
    this.name = 'InvalidParameterError';
  }
}

export class UnknownSchemeError extends InvalidParameterError {
  constructor(public readonly scheme: string) {
    super(`no default port for scheme: ${scheme}`, 'UNKNOWN_SCHEME');
    this.name = 'UnknownSchemeError';
  }
}

export class WrongSchemeError extends MacAuthError {
  constructor(public readonly scheme: string) {
    super('authorization scheme is not MAC', 'WRONG_SCHEME');
    this.name = 'WrongSchemeError';
  }
}

export class ReplayedNonceError extends MacAuthError {
  constructor() {
    super('nonce replayed or timestamp outside window', 'NONCE_REJECTED');
    this.name = 'ReplayedNonceError';
  }
}

export class SignatureMismatchError extends MacAuthError {
  constructor() {
    super('signature mismatch', 'SIGNATURE_MISMATCH');
    this.name = 'SignatureMismatchError';
  }
}
