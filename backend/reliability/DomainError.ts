export type DomainErrorCode =
  | 'LOAD_ERROR'
  | 'NOT_FOUND'
  | 'DATA_INTEGRITY_ERROR'
  | 'VALIDATION_ERROR'
  | 'UNKNOWN_ERROR';

export type DomainErrorDetails = Record<string, unknown>;

export class DomainError extends Error {
  readonly code: DomainErrorCode;
  readonly details?: DomainErrorDetails;

  constructor(args: {
    code: DomainErrorCode;
    message: string;
    details?: DomainErrorDetails;
    cause?: unknown;
  }) {
    super(args.message, args.cause === undefined ? undefined : { cause: args.cause });
    this.name = 'DomainError';
    this.code = args.code;
    this.details = args.details;
  }
}

export const isDomainError = (err: unknown): err is DomainError =>
  err instanceof DomainError;

export const asDomainError = (err: unknown): DomainError => {
  if (isDomainError(err)) return err;
  const message = err instanceof Error ? err.message : 'Unexpected error.';
  return new DomainError({
    code: 'UNKNOWN_ERROR',
    message,
    cause: err,
  });
};
