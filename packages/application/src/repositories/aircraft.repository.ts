import type { Aircraft } from "@workspace/domain/aircraft";
import type { ConflictError, PersistenceError } from "@workspace/domain/errors";
import type { AircraftId } from "@workspace/domain/kernel";
import { Context, type Effect, type Option } from "effect";

export interface AircraftUsage {
	readonly aircraft: Aircraft;
	readonly flightCount: number;
}

export interface AircraftRepositoryPort {
	findById(
		id: AircraftId,
	): Effect.Effect<Option.Option<Aircraft>, PersistenceError>;

	/**
	 * All aircraft with the number of flights referencing each, ordered by model.
	 */
	listWithUsage(): Effect.Effect<ReadonlyArray<AircraftUsage>, PersistenceError>;

	/**
	 * Insert or update.
	 */
	save(aircraft: Aircraft): Effect.Effect<Aircraft, PersistenceError>;

	/** Fails with a conflict while a flight still references the aircraft. */
	delete(id: AircraftId): Effect.Effect<void, ConflictError | PersistenceError>;
}

export class AircraftRepository extends Context.Tag("AircraftRepository")<
	AircraftRepository,
	AircraftRepositoryPort
>() {}
