/**
 * backend/src/shared/db/db-errors.ts
 *
 * WHY:
 * - DAL code must not throw AppError, but services need to recognise a constraint race.
 * - UniqueViolationError is the store-agnostic signal; each store raises it its own way.
 *
 * RULES:
 * - Only translate what a service can act on. Everything else propagates untouched.
 */

/** SQLSTATE raised by Postgres for `unique_violation`. */
export const PG_UNIQUE_VIOLATION = '23505';

export class UniqueViolationError extends Error {
  readonly constraint: string | null;

  constructor(constraint: string | null, opts?: { cause?: unknown }) {
    super(`Unique constraint violated${constraint ? `: ${constraint}` : ''}`, opts);
    this.name = 'UniqueViolationError';
    this.constraint = constraint;
  }
}

export function isPgUniqueViolation(err: unknown): boolean {
  return (
    typeof err === 'object' && err !== null && 'code' in err && err.code === PG_UNIQUE_VIOLATION
  );
}

export function pgConstraintName(err: unknown): string | null {
  if (typeof err === 'object' && err !== null && 'constraint' in err) {
    return typeof err.constraint === 'string' ? err.constraint : null;
  }
  return null;
}

/**
 * Runs a write and converts a Postgres unique violation into UniqueViolationError.
 */
export async function translateUniqueViolation<T>(write: () => Promise<T>): Promise<T> {
  try {
    return await write();
  } catch (err: unknown) {
    if (isPgUniqueViolation(err)) {
      throw new UniqueViolationError(pgConstraintName(err), { cause: err });
    }
    throw err;
  }
}
