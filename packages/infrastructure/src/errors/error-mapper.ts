import { SqlError } from "@effect/sql";
import {
  ConflictError,
  type EntityName,
  PersistenceError,
} from "@workspace/domain/errors";
import { Option } from "effect";
import {
  type ClassifiedDatabaseError,
  DatabaseError,
  DataIntegrityError,
  DuplicateEntityError,
  PersistenceTimeoutError,
  ReferenceNotFoundError,
  type RowDecodeError,
} from "../errors.js";

interface PgErrorFields {
  readonly code: string;
  readonly constraint: string | undefined;
  readonly detail: string | undefined;
}

const optionalString = (value: unknown): string | undefined =>
  typeof value === "string" ? value : undefined;

const pgErrorFields = (error: unknown): Option.Option<PgErrorFields> => {
  if (
    typeof error !== "object" ||
    error === null ||
    !("code" in error) ||
    typeof error.code !== "string"
  ) {
    return Option.none();
  }
  return Option.some({
    code: error.code,
    constraint: "constraint" in error ? optionalString(error.constraint) : undefined,
    detail: "detail" in error ? optionalString(error.detail) : undefined,
  });
};

/**
 * Classifies a database failure by its Postgres error code.
 * SqlError wrappers are unwrapped to the driver error first.
 */
export function classifyDatabaseError(error: unknown): ClassifiedDatabaseError {
  const timestamp = new Date();
  const cause = error instanceof SqlError.SqlError ? error.cause : error;

  const fields = pgErrorFields(cause);
  if (Option.isSome(fields)) {
    const { code, constraint, detail } = fields.value;

    // Unique constraint violation
    if (code === "23505") {
      return new DuplicateEntityError({
        entityType: extractEntityTypeFromConstraint(constraint),
        constraint: constraint ?? "unknown",
        id: extractIdFromDetail(detail),
        timestamp,
      });
    }

    // Foreign key constraint violation
    if (code === "23503") {
      return new ReferenceNotFoundError({
        referencedEntity:
          extractReferencedTable(detail) ??
          extractEntityTypeFromConstraint(constraint),
        referencedId: extractIdFromDetail(detail),
        timestamp,
      });
    }

    // Query cancelled by statement_timeout
    if (code === "57014") {
      return new PersistenceTimeoutError({
        operation: "database query",
        timestamp,
      });
    }

    // Invalid text representation / numeric out of range
    if (code === "22P02" || code === "22003") {
      return new DataIntegrityError({
        message: sanitizeErrorMessage(detail ?? "Invalid data format"),
        timestamp,
      });
    }
  }

  return new DatabaseError({
    message: sanitizeErrorMessage(
      cause instanceof Error ? cause.message : String(cause),
    ),
    cause,
    timestamp,
  });
}

const describe = (error: ClassifiedDatabaseError): string => {
  switch (error._tag) {
    case "DuplicateEntityError":
      return `Duplicate ${error.entityType} (${error.constraint})`;
    case "ReferenceNotFoundError":
      return `Referenced ${error.referencedEntity} does not exist`;
    case "PersistenceTimeoutError":
      return "Database query timed out";
    case "DataIntegrityError":
    case "DatabaseError":
      return error.message;
  }
};

/**
 * Turns any storage failure into the domain PersistenceError. The reason
 * never carries SQL text or connection details.
 */
export const toPersistenceError =
  (operation: string) =>
  (error: unknown): PersistenceError =>
    new PersistenceError({
      operation,
      reason: describe(classifyDatabaseError(error)),
    });

/**
 * Delete failures. A row another table still references is a conflict.
 */
export const toDeleteError =
  (operation: string, entity: EntityName, id: string) =>
  (error: unknown): ConflictError | PersistenceError => {
    const classified = classifyDatabaseError(error);
    return classified._tag === "ReferenceNotFoundError"
      ? new ConflictError({
          entity,
          id,
          reason: `${entity} is still referenced by ${classified.referencedEntity}`,
        })
      : new PersistenceError({ operation, reason: describe(classified) });
  };

export const decodeFailure =
  (operation: string) =>
  (error: RowDecodeError): PersistenceError =>
    new PersistenceError({
      operation,
      reason: `Stored ${error.table} ${error.id} has an invalid ${error.field}`,
    });

/**
 * Sanitizes error messages to prevent exposing internal details
 */
export function sanitizeErrorMessage(message: string): string {
  // Connection strings first, they carry credentials
  let sanitized = message.replace(
    /[a-zA-Z][a-zA-Z0-9+.-]*:\/\/[^\s@]+:[^\s@]+@[^\s]+/g,
    "<connection-string>",
  );

  sanitized = sanitized.replace(
    /(API key|token|password|secret|key)\s+[^\s]+/gi,
    "$1 <redacted>",
  );

  // Long tokens mixing letters and digits
  sanitized = sanitized.replace(/[a-zA-Z0-9_-]{20,}/g, (match) =>
    /[a-zA-Z]/.test(match) && /[0-9]/.test(match) ? "<redacted>" : match,
  );

  sanitized = sanitized.replace(
    /\/[a-zA-Z0-9_\-./]+\.(ts|js|json)/g,
    "<file-path>",
  );

  sanitized = sanitized.replace(
    /\b\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}\b/g,
    "<ip-address>",
  );

  return sanitized;
}

const KNOWN_TABLES = [
  "payment_methods",
  "payments",
  "reservations",
  "flights",
  "aircraft",
  "users",
  "audit_log",
] as const;

// "payments_reservation_key" -> "payments"
function extractEntityTypeFromConstraint(constraint?: string): string {
  if (!constraint) return "unknown";
  const table = KNOWN_TABLES.find((name) => constraint.startsWith(`${name}_`));
  return table ?? constraint;
}

// "Key (reference)=(K7Q2ZD) already exists." -> "K7Q2ZD"
function extractIdFromDetail(detail?: string): string {
  if (!detail) return "unknown";
  const match = detail.match(/\(([^)]+)\)=\(([^)]+)\)/);
  return match?.[2] ?? "unknown";
}

// 'Key (flight_id)=(...) is not present in table "flights".' -> "flights"
function extractReferencedTable(detail?: string): string | undefined {
  return detail?.match(/table "([^"]+)"/)?.[1];
}
