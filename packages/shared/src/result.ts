import type { Result } from 'neverthrow';
import type { AppError } from './contracts';

export type ResultEnvelope<T> = { ok: true; value: T } | { ok: false; error: AppError };

export const makeOk = <T>(value: T): ResultEnvelope<T> => ({ ok: true, value });
export const makeErr = <T>(error: AppError): ResultEnvelope<T> => ({ ok: false, error });

export const toEnvelope = <T>(result: Result<T, AppError>): ResultEnvelope<T> =>
  result.isOk() ? makeOk(result.value) : makeErr(result.error);
