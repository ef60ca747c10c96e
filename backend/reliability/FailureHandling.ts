import crypto from 'crypto';

import type { Telemetry } from '../telemetry/Telemetry';
import { asDomainError, type DomainError, type DomainErrorCode } from './DomainError';

export type CliFailure = {
  errorId: string;
  code: DomainErrorCode;
  exitCode: number;
  /** Single diagnostic line for stderr. */
  message: string;
};

const generateErrorId = (): string => crypto.randomUUID();

const exitCodeFor = (code: DomainErrorCode): number => {
  switch (code) {
    case 'VALIDATION_ERROR':
      return 2;
    case 'NOT_FOUND':
    case 'LOAD_ERROR':
    case 'DATA_INTEGRITY_ERROR':
    case 'UNKNOWN_ERROR':
    default:
      return 1;
  }
};

const publicMessageFor = (err: DomainError): string => {
  switch (err.code) {
    case 'UNKNOWN_ERROR':
      return err.message ? `Unexpected error: ${err.message}` : 'Unexpected error.';
    default:
      return err.message;
  }
};

export function mapErrorToExit(
  err: unknown,
  context: { operation: string; telemetry: Telemetry },
): CliFailure {
  const errorId = generateErrorId();
  const domain = asDomainError(err);

  context.telemetry.record({
    name: 'audit.error',
    tags: {
      operation: context.operation,
      code: domain.code,
      errorId,
    },
    message: domain.message,
  });

  return {
    errorId,
    code: domain.code,
    exitCode: exitCodeFor(domain.code),
    message: `error [${domain.code}]: ${publicMessageFor(domain)}`,
  };
}
