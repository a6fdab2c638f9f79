import type {
	ConflictError,
	OptimisticLockingError,
	PersistenceError,
} from "@workspace/domain/errors";
import type { Flight } from "@workspace/domain/flight";
import type { AircraftId, FlightId, ReservationId } from "@workspace/domain/kernel";
import type { SeatLedger } from "@workspace/domain/seat-ledger";
import { Context, type Effect, type Option } from "effect";

export interface FlightRepositoryPort {
	findById(id: FlightId): Effect.Effect<Option.Option<Flight>, PersistenceError>;

	/**
	 * Insert or update. Updates never touch the ledger version; use
	 * `advanceLedger` for that.
	 */
	save(flight: Flight): Effect.Effect<Flight, PersistenceError>;

	/** Fails with a conflict while a reservation still references the flight. */
	delete(id: FlightId): Effect.Effect<void, ConflictError | PersistenceError>;

	countByAircraft(aircraftId: AircraftId): Effect.Effect<number, PersistenceError>;

	/**
	 * Moves every active flight of the aircraft to `blocked`.
	 * Returns the number of flights changed.
	 */
	blockActiveByAircraft(
		aircraftId: AircraftId,
	): Effect.Effect<number, PersistenceError>;

	/**
	 * Seat ledger snapshot for a flight. The ledger version is read before the
	 * occupied-seat sum. `exclude` leaves one reservation out of the sum.
	 * None when the flight does not exist.
	 */
	ledger(
		flightId: FlightId,
		exclude: Option.Option<ReservationId>,
	): Effect.Effect<Option.Option<SeatLedger>, PersistenceError>;

	/**
	 * Commits a claim: bumps the flight's ledger version if it still equals
	 * `ledger.version`. Fails with OptimisticLockingError otherwise.
	 */
	advanceLedger(
		ledger: SeatLedger,
	): Effect.Effect<void, OptimisticLockingError | PersistenceError>;

	/**
	 * Bumps the ledger version of every flight on the aircraft, invalidating
	 * in-flight claims that read the previous capacity.
	 */
	advanceLedgersForAircraft(
		aircraftId: AircraftId,
	): Effect.Effect<void, PersistenceError>;

	/**
	 * Highest non-cancelled seat total among the aircraft's flights (0 if none).
	 */
	maxOccupancyForAircraft(
		aircraftId: AircraftId,
	): Effect.Effect<number, PersistenceError>;
}

export class FlightRepository extends Context.Tag("FlightRepository")<
	FlightRepository,
	FlightRepositoryPort
>() {}
