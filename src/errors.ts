import Database from "better-sqlite3";

export type FetchErrorCode =
  | "timeout"
  | "connection_refused"
  | "http_status"
  | "tls_error"
  | "network";

export type ParseErrorCode = "malformed_document" | "unsupported_dialect";

export type StorageErrorCode =
  | "constraint_violation"
  | "transaction_failure"
  | "io_failure";

export type ValidationErrorCode =
  | "duplicate_feed_url"
  | "invalid_feed_url"
  | "invalid_category_name"
  | "duplicate_category_name";

/**
 * A feed document could not be retrieved. `status` is set for `http_status`.
 */
export class FeedFetchError extends Error {
  override readonly name = "FeedFetchError";

  constructor(
    readonly code: FetchErrorCode,
    message: string,
    readonly status: number | null = null,
  ) {
    super(message);
  }
}

export class FeedParseError extends Error {
  override readonly name = "FeedParseError";

  constructor(
    readonly code: ParseErrorCode,
    message: string,
  ) {
    super(message);
  }
}

export class StorageError extends Error {
  override readonly name = "StorageError";

  constructor(
    readonly code: StorageErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class ValidationError extends Error {
  override readonly name = "ValidationError";

  constructor(
    readonly code: ValidationErrorCode,
    message: string,
  ) {
    super(message);
  }
}

export class NotFoundError extends Error {
  override readonly name = "NotFoundError";

  constructor(
    readonly entity: "feed" | "category" | "article",
    readonly id: number,
  ) {
    super(`${entity} ${id} not found`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function sqliteCode(err: unknown): string | null {
  if (err instanceof Database.SqliteError) return err.code;
  if (err instanceof Error && err.cause !== undefined) return sqliteCode(err.cause);
  return null;
}

/**
 * Maps a failure raised inside a database call onto the storage taxonomy.
 * Errors that are already a StorageError pass through unchanged.
 */
export function toStorageError(err: unknown): StorageError {
  if (err instanceof StorageError) return err;

  const code = sqliteCode(err);
  const message = errorMessage(err);

  if (code?.startsWith("SQLITE_CONSTRAINT")) {
    return new StorageError("constraint_violation", message, { cause: err });
  }
  if (
    code?.startsWith("SQLITE_IOERR") ||
    code === "SQLITE_FULL" ||
    code === "SQLITE_CANTOPEN" ||
    code === "SQLITE_READONLY"
  ) {
    return new StorageError("io_failure", message, { cause: err });
  }
  return new StorageError("transaction_failure", message, { cause: err });
}

export function isUniqueViolation(err: unknown): boolean {
  const code = sqliteCode(err);
  return code === "SQLITE_CONSTRAINT_UNIQUE" || code === "SQLITE_CONSTRAINT_PRIMARYKEY";
}
