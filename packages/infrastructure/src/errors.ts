import { Data } from "effect";

// Persistence errors, classified from Postgres error codes

export class DuplicateEntityError extends Data.TaggedError(
  "DuplicateEntityError",
)<{
  readonly entityType: string;
  readonly constraint: string;
  readonly id: string;
  readonly timestamp: Date;
}> {}

export class ReferenceNotFoundError extends Data.TaggedError(
  "ReferenceNotFoundError",
)<{
  readonly referencedEntity: string;
  readonly referencedId: string;
  readonly timestamp: Date;
}> {}

export class PersistenceTimeoutError extends Data.TaggedError(
  "PersistenceTimeoutError",
)<{
  readonly operation: string;
  readonly timestamp: Date;
}> {}

export class DataIntegrityError extends Data.TaggedError("DataIntegrityError")<{
  readonly message: string;
  readonly timestamp: Date;
}> {}

export class DatabaseError extends Data.TaggedError("DatabaseError")<{
  readonly message: string;
  readonly cause?: unknown;
  readonly timestamp: Date;
}> {}

export type ClassifiedDatabaseError =
  | DuplicateEntityError
  | ReferenceNotFoundError
  | PersistenceTimeoutError
  | DataIntegrityError
  | DatabaseError;

// Stored rows that do not decode into domain values
export class RowDecodeError extends Data.TaggedError("RowDecodeError")<{
  readonly table: string;
  readonly id: string;
  readonly field: string;
}> {}
