/**
 * Storage error kinds.
 *
 * Lookups that match nothing are not errors: readers return `null`. Everything the
 * driver raises inside a connection scope surfaces as `StorageUnavailableError`.
 */

export class StorageUnavailableError extends Error {
  readonly code: string | undefined;

  constructor(message: string, options: { cause?: unknown; code?: string } = {}) {
    super(message, { cause: options.cause });
    this.name = "StorageUnavailableError";
    this.code = options.code;
  }

  static from(error: unknown): StorageUnavailableError {
    if (error instanceof StorageUnavailableError) return error;
    const message = error instanceof Error ? error.message : String(error);
    return new StorageUnavailableError(message, { cause: error, code: sqliteCode(error) });
  }
}

function sqliteCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/** True when an insert was rejected by a UNIQUE or PRIMARY KEY constraint. */
export function isUniqueViolation(error: unknown): boolean {
  const code = error instanceof StorageUnavailableError ? error.code : sqliteCode(error);
  return code === "SQLITE_CONSTRAINT_UNIQUE" || code === "SQLITE_CONSTRAINT_PRIMARYKEY";
}
