import { Data, Schema } from "effect";

// --- Lookup / Validation Errors ---

export const EntityName = Schema.Literal(
	"Aircraft",
	"Flight",
	"Reservation",
	"Payment",
	"User",
);
export type EntityName = typeof EntityName.Type;

export class NotFoundError extends Schema.TaggedError<NotFoundError>()(
	"NotFoundError",
	{
		entity: EntityName,
		id: Schema.String,
	},
) {}

export class InvalidInputError extends Schema.TaggedError<InvalidInputError>()(
	"InvalidInputError",
	{
		field: Schema.String,
		reason: Schema.String,
	},
) {}

// --- Capacity Errors ---

export class CapacityExceededError extends Schema.TaggedError<CapacityExceededError>()(
	"CapacityExceededError",
	{
		flightId: Schema.String,
		requested: Schema.Number,
		remaining: Schema.Number,
	},
) {}

// --- Reservation / Payment Errors ---

export class ReservationStatusError extends Schema.TaggedError<ReservationStatusError>()(
	"ReservationStatusError",
	{
		reservationId: Schema.String,
		status: Schema.String,
		attempted: Schema.String,
	},
) {}

export class DuplicatePaymentError extends Schema.TaggedError<DuplicatePaymentError>()(
	"DuplicatePaymentError",
	{
		reservationId: Schema.String,
	},
) {}

// --- Referential Errors ---

export class ConflictError extends Schema.TaggedError<ConflictError>()(
	"ConflictError",
	{
		entity: EntityName,
		id: Schema.String,
		reason: Schema.String,
	},
) {}

// --- Access Errors ---

export class UnauthorizedError extends Schema.TaggedError<UnauthorizedError>()(
	"UnauthorizedError",
	{
		reason: Schema.String,
	},
) {}

export class ForbiddenError extends Schema.TaggedError<ForbiddenError>()(
	"ForbiddenError",
	{
		reason: Schema.String,
	},
) {}

// --- Storage Errors ---

export class PersistenceError extends Schema.TaggedError<PersistenceError>()(
	"PersistenceError",
	{
		operation: Schema.String,
		reason: Schema.String,
	},
) {}

// Raised by repositories when a versioned write loses a race. Never leaves the
// application layer: callers retry it or turn it into a ConflictError.
export class OptimisticLockingError extends Data.TaggedError(
	"OptimisticLockingError",
)<{
	readonly entityType: "Flight" | "Reservation";
	readonly id: string;
	readonly expectedVersion: number;
	readonly actualVersion: number;
}> {}

export const isOptimisticLockingError = (
	error: unknown,
): error is OptimisticLockingError => error instanceof OptimisticLockingError;
