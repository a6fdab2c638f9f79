import * as Crypto from "node:crypto";
import { BookingConfig } from "@workspace/config";
import {
	Aircraft,
	AircraftStatus,
} from "@workspace/domain/aircraft";
import {
	ConflictError,
	InvalidInputError,
	NotFoundError,
	type PersistenceError,
} from "@workspace/domain/errors";
import { Flight, FlightStatus } from "@workspace/domain/flight";
import {
	type AircraftId,
	type FlightId,
	makeAircraftId,
	makeFlightId,
	Money,
	PlaceName,
} from "@workspace/domain/kernel";
import { Context, Effect, Layer, Option, Schema } from "effect";
import { UnitOfWork } from "../ports/unit-of-work.js";
import {
	AircraftRepository,
	type AircraftUsage,
} from "../repositories/aircraft.repository.js";
import { FlightRepository } from "../repositories/flight.repository.js";
import { ReservationRepository } from "../repositories/reservation.repository.js";
import {
	commitRetryPolicy,
	conflictFromLockingError,
} from "./commit-retry.js";

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

export interface CreateAircraftCommand {
	readonly model: string;
	readonly capacity: number;
	readonly status?: AircraftStatus | undefined;
	readonly airline?: string | undefined;
}

export interface UpdateAircraftCommand {
	readonly model?: string | undefined;
	readonly capacity?: number | undefined;
	readonly status?: AircraftStatus | undefined;
	readonly airline?: Option.Option<string> | undefined;
}

export interface CreateFlightCommand {
	readonly origin: string;
	readonly destination: string;
	readonly departureAt: Date;
	readonly arrivalAt?: Date | undefined;
	/** Decimal amount, e.g. "149.90" */
	readonly fare: string;
	readonly aircraftId: AircraftId;
	readonly status?: FlightStatus | undefined;
}

export interface UpdateFlightCommand {
	readonly origin?: string | undefined;
	readonly destination?: string | undefined;
	readonly departureAt?: Date | undefined;
	readonly arrivalAt?: Option.Option<Date> | undefined;
	readonly fare?: string | undefined;
	readonly aircraftId?: AircraftId | undefined;
	readonly status?: FlightStatus | undefined;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

const requireCapacity = (capacity: number) =>
	Number.isInteger(capacity) && capacity > 0
		? Effect.succeed(capacity)
		: Effect.fail(
				new InvalidInputError({
					field: "capacity",
					reason: "Capacity must be a positive integer",
				}),
			);

const requireModel = (model: string) => {
	const trimmed = model.trim();
	return trimmed.length > 0 && trimmed.length <= 100
		? Effect.succeed(trimmed)
		: Effect.fail(
				new InvalidInputError({
					field: "model",
					reason: "Model must be between 1 and 100 characters",
				}),
			);
};

const requirePlace = (field: "origin" | "destination", value: string) =>
	Schema.decodeUnknown(PlaceName)(value).pipe(
		Effect.mapError(
			() =>
				new InvalidInputError({
					field,
					reason: "Must be between 1 and 100 characters",
				}),
		),
	);

const requireFare = (fare: string) =>
	Option.match(Money.parse(fare), {
		onNone: () =>
			Effect.fail(
				new InvalidInputError({
					field: "fare",
					reason: "Fare must be a non-negative amount with at most two decimals",
				}),
			),
		onSome: Effect.succeed,
	});

// An out-of-service aircraft cannot carry an active flight
const statusOn = (requested: FlightStatus, aircraft: Aircraft): FlightStatus =>
	requested === FlightStatus.ACTIVE && !aircraft.isAvailable()
		? FlightStatus.BLOCKED
		: requested;

const requireSchedule = (departureAt: Date, arrivalAt: Option.Option<Date>) =>
	Option.exists(arrivalAt, (arrival) => arrival.getTime() <= departureAt.getTime())
		? Effect.fail(
				new InvalidInputError({
					field: "arrivalAt",
					reason: "Arrival must be after departure",
				}),
			)
		: Effect.void;

// ---------------------------------------------------------------------------
// Service Interface
// ---------------------------------------------------------------------------

export interface FleetServiceSignature {
	readonly listAircraft: () => Effect.Effect<
		ReadonlyArray<AircraftUsage>,
		PersistenceError
	>;

	readonly createAircraft: (
		command: CreateAircraftCommand,
	) => Effect.Effect<Aircraft, InvalidInputError | PersistenceError>;

	/**
	 * Moving an aircraft into an out-of-service status blocks its active flights
	 * in the same transaction. Shrinking capacity below the seats already
	 * reserved on any of its flights is rejected.
	 */
	readonly updateAircraft: (
		id: AircraftId,
		command: UpdateAircraftCommand,
	) => Effect.Effect<
		Aircraft,
		NotFoundError | InvalidInputError | ConflictError | PersistenceError
	>;

	readonly deleteAircraft: (
		id: AircraftId,
	) => Effect.Effect<void, NotFoundError | ConflictError | PersistenceError>;

	readonly createFlight: (
		command: CreateFlightCommand,
	) => Effect.Effect<Flight, NotFoundError | InvalidInputError | PersistenceError>;

	/**
	 * Moving a flight to another aircraft is a seat-ledger change: the seats
	 * already reserved must fit the new aircraft. A flight on an
	 * out-of-service aircraft stays blocked even when asked to be active.
	 */
	readonly updateFlight: (
		id: FlightId,
		command: UpdateFlightCommand,
	) => Effect.Effect<
		Flight,
		NotFoundError | InvalidInputError | ConflictError | PersistenceError
	>;

	readonly deleteFlight: (
		id: FlightId,
	) => Effect.Effect<void, NotFoundError | ConflictError | PersistenceError>;
}

export class FleetService extends Context.Tag("FleetService")<
	FleetService,
	FleetServiceSignature
>() {
	static readonly Live = Layer.effect(
		FleetService,
		Effect.gen(function* () {
			const aircraftRepo = yield* AircraftRepository;
			const flights = yield* FlightRepository;
			const reservations = yield* ReservationRepository;
			const unitOfWork = yield* UnitOfWork;
			const config = yield* BookingConfig;

			const retryPolicy = commitRetryPolicy(config.maxCommitRetries);

			const findAircraft = (id: AircraftId) =>
				aircraftRepo.findById(id).pipe(
					Effect.flatMap((found) =>
						Option.match(found, {
							onNone: () =>
								Effect.fail(new NotFoundError({ entity: "Aircraft", id })),
							onSome: Effect.succeed,
						}),
					),
				);

			const findFlight = (id: FlightId) =>
				flights.findById(id).pipe(
					Effect.flatMap((found) =>
						Option.match(found, {
							onNone: () =>
								Effect.fail(new NotFoundError({ entity: "Flight", id })),
							onSome: Effect.succeed,
						}),
					),
				);

			return FleetService.of({
				listAircraft: () => aircraftRepo.listWithUsage(),

				createAircraft: (command) =>
					Effect.gen(function* () {
						const model = yield* requireModel(command.model);
						const capacity = yield* requireCapacity(command.capacity);
						const aircraft = yield* aircraftRepo.save(
							Aircraft.create({
								id: makeAircraftId(Crypto.randomUUID()),
								model,
								capacity,
								status: command.status,
								airline: command.airline,
							}),
						);
						yield* Effect.logInfo("Aircraft created", {
							aircraftId: aircraft.id,
							capacity: aircraft.capacity,
						});
						return aircraft;
					}),

				updateAircraft: (id, command) =>
					unitOfWork.transaction(
						Effect.gen(function* () {
							const current = yield* findAircraft(id);
							const model =
								command.model === undefined
									? current.model
									: yield* requireModel(command.model);
							const capacity =
								command.capacity === undefined
									? current.capacity
									: yield* requireCapacity(command.capacity);

							const next = yield* aircraftRepo.save(
								new Aircraft({
									id: current.id,
									model,
									capacity,
									status: command.status ?? current.status,
									airline: command.airline ?? current.airline,
								}),
							);

							if (current.leavesServiceWith(next.status)) {
								const blocked = yield* flights.blockActiveByAircraft(id);
								yield* Effect.logInfo("Aircraft left service", {
									aircraftId: id,
									status: next.status,
									blockedFlights: blocked,
								});
							}

							if (next.capacity !== current.capacity) {
								yield* flights.advanceLedgersForAircraft(id);
								const occupied = yield* flights.maxOccupancyForAircraft(id);
								if (occupied > next.capacity) {
									return yield* Effect.fail(
										new ConflictError({
											entity: "Aircraft",
											id,
											reason: `A flight on this aircraft already holds ${occupied} seats`,
										}),
									);
								}
							}

							return next;
						}),
					),

				deleteAircraft: (id) =>
					unitOfWork.transaction(
						Effect.gen(function* () {
							yield* findAircraft(id);
							const flightCount = yield* flights.countByAircraft(id);
							if (flightCount > 0) {
								return yield* Effect.fail(
									new ConflictError({
										entity: "Aircraft",
										id,
										reason: `Aircraft is assigned to ${flightCount} flight(s)`,
									}),
								);
							}
							yield* aircraftRepo.delete(id);
							yield* Effect.logInfo("Aircraft deleted", { aircraftId: id });
						}),
					),

				createFlight: (command) =>
					Effect.gen(function* () {
						const origin = yield* requirePlace("origin", command.origin);
						const destination = yield* requirePlace(
							"destination",
							command.destination,
						);
						const fare = yield* requireFare(command.fare);
						const arrivalAt = Option.fromNullable(command.arrivalAt);
						yield* requireSchedule(command.departureAt, arrivalAt);

						const aircraft = yield* findAircraft(command.aircraftId);
						const requested = command.status ?? FlightStatus.ACTIVE;

						const flight = new Flight({
							id: makeFlightId(Crypto.randomUUID()),
							origin,
							destination,
							departureAt: command.departureAt,
							arrivalAt,
							fare,
							status: statusOn(requested, aircraft),
							aircraftId: aircraft.id,
							ledgerVersion: 0,
						});

						const saved = yield* flights.save(flight);
						yield* Effect.logInfo("Flight created", {
							flightId: saved.id,
							route: saved.routeCode(),
						});
						return saved;
					}),

				updateFlight: (id, command) =>
					unitOfWork
						.transaction(
							Effect.gen(function* () {
								const current = yield* findFlight(id);
								const origin =
									command.origin === undefined
										? current.origin
										: yield* requirePlace("origin", command.origin);
								const destination =
									command.destination === undefined
										? current.destination
										: yield* requirePlace("destination", command.destination);
								const fare =
									command.fare === undefined
										? current.fare
										: yield* requireFare(command.fare);
								const departureAt = command.departureAt ?? current.departureAt;
								const arrivalAt = command.arrivalAt ?? current.arrivalAt;
								yield* requireSchedule(departureAt, arrivalAt);

								const target = yield* findAircraft(
									command.aircraftId ?? current.aircraftId,
								);
								let ledgerVersion = current.ledgerVersion;
								if (target.id !== current.aircraftId) {
									const ledger = yield* flights
										.ledger(id, Option.none())
										.pipe(
											Effect.flatMap((found) =>
												Option.match(found, {
													onNone: () =>
														Effect.fail(new NotFoundError({ entity: "Flight", id })),
													onSome: Effect.succeed,
												}),
											),
										);
									if (ledger.occupied > target.capacity) {
										return yield* Effect.fail(
											new ConflictError({
												entity: "Flight",
												id,
												reason: `${ledger.occupied} seats are reserved but the aircraft holds ${target.capacity}`,
											}),
										);
									}
									yield* flights.advanceLedger(ledger);
									ledgerVersion = ledger.version + 1;
								}

								return yield* flights.save(
									new Flight({
										id: current.id,
										origin,
										destination,
										departureAt,
										arrivalAt,
										fare,
										status: statusOn(command.status ?? current.status, target),
										aircraftId: target.id,
										ledgerVersion,
									}),
								);
							}),
						)
						.pipe(
							Effect.retry(retryPolicy),
							Effect.catchTag("OptimisticLockingError", conflictFromLockingError),
						),

				deleteFlight: (id) =>
					unitOfWork.transaction(
						Effect.gen(function* () {
							yield* findFlight(id);
							const reservationCount = yield* reservations.countByFlight(id);
							if (reservationCount > 0) {
								return yield* Effect.fail(
									new ConflictError({
										entity: "Flight",
										id,
										reason: "Flight has reservations; cancel it instead",
									}),
								);
							}
							yield* flights.delete(id);
							yield* Effect.logInfo("Flight deleted", { flightId: id });
						}),
					),
			});
		}),
	);
}
