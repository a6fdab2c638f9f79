import type {
	OptimisticLockingError,
	PersistenceError,
} from "@workspace/domain/errors";
import type { FlightId, ReservationId, UserId } from "@workspace/domain/kernel";
import type {
	Reservation,
	ReservationStatus,
} from "@workspace/domain/reservation";
import { Context, type Effect, type Option } from "effect";

export interface ReservationFilter {
	readonly status?: ReservationStatus | undefined;
	readonly flightId?: FlightId | undefined;
	readonly userId?: UserId | undefined;
	readonly limit?: number | undefined;
}

export interface ReservationRepositoryPort {
	/**
	 * Save a reservation and return the persisted entity with updated version.
	 * Fails with OptimisticLockingError if the stored version differs.
	 */
	save(
		reservation: Reservation,
	): Effect.Effect<Reservation, OptimisticLockingError | PersistenceError>;

	findById(
		id: ReservationId,
	): Effect.Effect<Option.Option<Reservation>, PersistenceError>;

	/**
	 * Newest first.
	 */
	list(
		filter: ReservationFilter,
	): Effect.Effect<ReadonlyArray<Reservation>, PersistenceError>;

	countByFlight(flightId: FlightId): Effect.Effect<number, PersistenceError>;

	/**
	 * Removes the reservation together with its payment.
	 */
	delete(id: ReservationId): Effect.Effect<void, PersistenceError>;
}

export class ReservationRepository extends Context.Tag("ReservationRepository")<
	ReservationRepository,
	ReservationRepositoryPort
>() {}
