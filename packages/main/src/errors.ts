import type { ZodError } from 'zod';
import { AppErrorSchema, type AppError } from '../../shared/src';
import type { DatabaseError } from 'pg';

export const ErrorCodes = {
  invalidTransition: 'roll.invalidTransition',
  rollNotFound: 'roll.notFound',
  jobInvalidTransition: 'job.invalidTransition',
  jobNotFound: 'job.notFound',
  jobInProgress: 'job.inProgress',
  jobNotOpen: 'job.notOpen',
  printerBusy: 'printer.busy',
  confirmationRequired: 'confirmation.required',
  validation: 'validation.failed',
  fileAccess: 'ingest.fileAccess',
  unknownCommand: 'command.unknown',
  unknown: 'unknown'
} as const;

function pickDetails(error: DatabaseError) {
  const details: Record<string, unknown> = {};
  if (error.detail) details.detail = error.detail;
  if (error.schema) details.schema = error.schema;
  if (error.table) details.table = error.table;
  if (error.constraint) details.constraint = error.constraint;
  if (error.column) details.column = error.column;
  return Object.keys(details).length ? details : undefined;
}

const PG_ERROR_MAPPERS: Record<string, (error: DatabaseError) => AppError> = {
  '23505': (error) => ({
    code: 'db.uniqueViolation',
    message: 'A record with the same value already exists.',
    details: pickDetails(error)
  }),
  '23503': (error) => ({
    code: 'db.foreignKeyViolation',
    message: 'The requested record references missing related data.',
    details: pickDetails(error)
  }),
  '23502': (error) => ({
    code: 'db.notNullViolation',
    message: 'A required column was missing.',
    details: pickDetails(error)
  }),
  '22001': (error) => ({
    code: 'db.stringTooLong',
    message: 'Input was too long for the target column.',
    details: pickDetails(error)
  })
};

function defaultPgError(error: DatabaseError): AppError {
  return {
    code: 'db.error',
    message: error.message,
    details: pickDetails(error)
  };
}

// Postgres SQLSTATE codes are five characters; Node errno codes (ECONNREFUSED, ...) are not database errors.
function isDatabaseError(error: unknown): error is DatabaseError {
  return (
    error instanceof Error &&
    typeof (error as { code?: unknown }).code === 'string' &&
    /^[0-9A-Z]{5}$/.test((error as Error & { code: string }).code)
  );
}

function isAppError(error: unknown): error is AppError {
  return !(error instanceof Error) && AppErrorSchema.safeParse(error).success;
}

export function toAppError(error: unknown): AppError {
  if (isAppError(error)) {
    return error;
  }

  if (isDatabaseError(error)) {
    const mapper = PG_ERROR_MAPPERS[error.code ?? ''];
    return mapper ? mapper(error) : defaultPgError(error);
  }

  if (error instanceof Error) {
    return {
      code: ErrorCodes.unknown,
      message: error.message,
      details: error.stack ? { stack: error.stack } : undefined
    };
  }

  return {
    code: ErrorCodes.unknown,
    message: 'An unknown error occurred.',
    details: { raw: error }
  };
}

export function createAppError(code: string, message: string, details?: unknown): AppError {
  return details === undefined ? { code, message } : { code, message, details };
}

export function fromZodError(error: ZodError): AppError {
  const message = error.issues.map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message)).join('; ');
  return createAppError(ErrorCodes.validation, message, { issues: error.issues });
}
