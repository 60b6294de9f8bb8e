import { QueryFailedError } from 'typeorm';

const UNIQUE_CODES = new Set(['23505', 'SQLITE_CONSTRAINT_UNIQUE']);

// postgres reports SQLSTATE in `code`; better-sqlite3 uses its own code names
export function isUniqueViolation(err: unknown): boolean {
  if (!(err instanceof QueryFailedError)) return false;
  const driverError: unknown = err.driverError;
  if (typeof driverError !== 'object' || driverError === null) return false;
  const code = 'code' in driverError ? driverError.code : undefined;
  return typeof code === 'string' && UNIQUE_CODES.has(code);
}
