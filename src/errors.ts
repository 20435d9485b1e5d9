/**
 * Input failed structural validation: required CSV columns are missing or a
 * shift label has no shift definition. Fatal for the whole ingestion run.
 */
export class SchemaValidationError extends Error {
  /** The offending column names or values. */
  readonly details: readonly string[];

  constructor(message: string, details: readonly string[]) {
    super(message);
    this.name = 'SchemaValidationError';
    this.details = details;
  }
}

/**
 * A chunk's writes hit a uniqueness, foreign-key, NOT NULL or check
 * constraint. The chunk was rolled back; chunks committed before it stay.
 */
export class IntegrityViolationError extends Error {
  readonly chunkIndex: number;
  /** Driver error code (SQLSTATE for PostgreSQL, SQLITE_CONSTRAINT_* for SQLite). */
  readonly code: string | undefined;

  constructor(chunkIndex: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Integrity violation in chunk ${chunkIndex}; chunk rolled back: ${reason}`, { cause });
    this.name = 'IntegrityViolationError';
    this.chunkIndex = chunkIndex;
    this.code = errorCode(cause);
  }
}

export function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err) {
    const { code } = err;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * True for constraint violations from either supported driver:
 * PostgreSQL SQLSTATE class 23 (integrity_constraint_violation) or a
 * better-sqlite3 SQLITE_CONSTRAINT* code.
 */
export function isIntegrityViolation(err: unknown): boolean {
  const code = errorCode(err);
  if (!code) return false;
  return /^23[0-9A-Z]{3}$/.test(code) || code.startsWith('SQLITE_CONSTRAINT');
}

/** A referenced row does not exist. */
export class NotFoundError extends Error {
  constructor(entity: string, id: string | number) {
    super(`${entity} ${id} not found`);
    this.name = 'NotFoundError';
  }
}
