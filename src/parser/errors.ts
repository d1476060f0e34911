export type SignatureErrorCode =
  | 'LOCATION_FAILED'
  | 'ENUMERATION_INVARIANT'
  | 'UNKNOWN_TYPE'
  | 'UNSUPPORTED_DECLARATION'
  | 'INVALID_DIRECTION';

export class SignatureError<D = Record<string, unknown>> extends Error {
  override name = 'SignatureError';
  readonly code: SignatureErrorCode;
  readonly details: D;

  constructor(code: SignatureErrorCode, message: string, details: D) {
    super(message);
    this.code = code;
    this.details = details;
  }
}

export type LocationDetails = {
  functionName: string;
  filePath: string;
  pattern?: string;
  anchor?: string;
};

/** The declaration + trailing comment pair for a function could not be found. */
export class LocationError extends SignatureError<LocationDetails> {
  override name = 'LocationError';

  constructor(message: string, details: LocationDetails) {
    super('LOCATION_FAILED', message, details);
  }
}

export type EnumerationDetails = {
  section: string;
  subsection: string;
  functionName: string;
};

export class EnumerationInvariantError extends SignatureError<EnumerationDetails> {
  override name = 'EnumerationInvariantError';

  constructor(message: string, details: EnumerationDetails) {
    super('ENUMERATION_INVARIANT', message, details);
  }
}

export type UnknownTypeDetails = {
  type: string;
  functionName?: string;
};

export class UnknownTypeError extends SignatureError<UnknownTypeDetails> {
  override name = 'UnknownTypeError';

  constructor(message: string, details: UnknownTypeDetails) {
    super('UNKNOWN_TYPE', message, details);
  }
}

export type UnsupportedDeclarationDetails = {
  fragment: string;
  functionName?: string;
};

/**
 * A parameter fragment outside the accepted declaration shapes
 * (function pointers, unnamed parameters).
 */
export class UnsupportedDeclarationError extends SignatureError<UnsupportedDeclarationDetails> {
  override name = 'UnsupportedDeclarationError';

  constructor(message: string, details: UnsupportedDeclarationDetails) {
    super('UNSUPPORTED_DECLARATION', message, details);
  }
}

/** A direction filter names something other than in, out, inout, unknown or ret. */
export class InvalidDirectionError extends SignatureError<{ direction: string }> {
  override name = 'InvalidDirectionError';

  constructor(message: string, details: { direction: string }) {
    super('INVALID_DIRECTION', message, details);
  }
}
