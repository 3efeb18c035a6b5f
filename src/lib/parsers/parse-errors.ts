export type MountstatsParseErrorKind =
  | 'malformed-section'
  | 'field-parse'
  | 'insufficient-tokens';

interface MountstatsParseErrorDetails {
  field?: string;
  operation?: string;
  cause?: unknown;
}

/**
 * Thrown by the mountstats parser. A failed parse never yields a partial map.
 */
export class MountstatsParseError extends Error {
  readonly field?: string;
  readonly operation?: string;

  constructor(
    message: string,
    public readonly kind: MountstatsParseErrorKind,
    details: MountstatsParseErrorDetails = {},
  ) {
    super(message, details.cause !== undefined ? { cause: details.cause } : undefined);
    this.name = 'MountstatsParseError';
    this.field = details.field;
    this.operation = details.operation;
  }
}

/**
 * Raised when a requested mount point is not an NFS mount in the report
 */
export class MountNotFoundError extends Error {
  constructor(public readonly mountPoint: string) {
    super(`Mount point not found: ${mountPoint}`);
    this.name = 'MountNotFoundError';
  }
}
