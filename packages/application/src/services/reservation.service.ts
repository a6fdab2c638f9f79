import * as Crypto from "node:crypto";
import { BookingConfig } from "@workspace/config";
import {
	type CapacityExceededError,
	type ConflictError,
	InvalidInputError,
	NotFoundError,
	type PersistenceError,
	type ReservationStatusError,
} from "@workspace/domain/errors";
import type { Flight } from "@workspace/domain/flight";
import {
	type FlightId,
	makeReservationId,
	Money,
	type ReservationId,
	type UserId,
} from "@workspace/domain/kernel";
import { PriceBreakdown } from "@workspace/domain/pricing";
import {
	Reservation,
	type ReservationStatus,
} from "@workspace/domain/reservation";
import { requireSeatCount } from "@workspace/domain/seat-ledger";
import { Context, Effect, Layer, Option } from "effect";
import { UnitOfWork } from "../ports/unit-of-work.js";
import { FlightRepository } from "../repositories/flight.repository.js";
import {
	type ReservationFilter,
	ReservationRepository,
} from "../repositories/reservation.repository.js";
import { UserRepository } from "../repositories/user.repository.js";
import { CapacityLedger } from "./capacity-ledger.service.js";
import {
	commitRetryPolicy,
	conflictFromLockingError,
} from "./commit-retry.js";

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

export interface CreateReservationCommand {
	readonly flightId: FlightId;
	readonly userId: UserId;
	readonly seats: number;
}

export interface AmendReservationCommand {
	readonly reservationId: ReservationId;
	readonly seats: Option.Option<number>;
	readonly status: Option.Option<ReservationStatus>;
}

// ---------------------------------------------------------------------------
// Service Interface
// ---------------------------------------------------------------------------

export interface ReservationServiceSignature {
	/**
	 * Reserves seats on an active flight for an existing user. The same path
	 * serves self-service bookings and agents booking on someone's behalf.
	 */
	readonly create: (
		command: CreateReservationCommand,
	) => Effect.Effect<
		Reservation,
		| NotFoundError
		| InvalidInputError
		| CapacityExceededError
		| ConflictError
		| PersistenceError
	>;

	/**
	 * Changes seats and/or status. A seat change is re-validated against the
	 * ledger without the reservation's own seats and fully repriced.
	 */
	readonly amend: (
		command: AmendReservationCommand,
	) => Effect.Effect<
		Reservation,
		| NotFoundError
		| InvalidInputError
		| CapacityExceededError
		| ReservationStatusError
		| ConflictError
		| PersistenceError
	>;

	readonly confirm: (
		id: ReservationId,
	) => Effect.Effect<
		Reservation,
		NotFoundError | ReservationStatusError | ConflictError | PersistenceError
	>;

	/**
	 * Idempotent. Works from every status: a PAID reservation is cancelled
	 * with its payment record kept, and its seats go back on sale.
	 */
	readonly cancel: (
		id: ReservationId,
	) => Effect.Effect<
		Reservation,
		NotFoundError | ConflictError | PersistenceError
	>;

	/** Removes the reservation and its payment. */
	readonly remove: (
		id: ReservationId,
	) => Effect.Effect<void, NotFoundError | PersistenceError>;

	readonly get: (
		id: ReservationId,
	) => Effect.Effect<Reservation, NotFoundError | PersistenceError>;

	/**
	 * Looks up a reservation on behalf of its owner. Someone else's
	 * reservation is reported as missing.
	 */
	readonly getOwned: (
		id: ReservationId,
		owner: UserId,
	) => Effect.Effect<Reservation, NotFoundError | PersistenceError>;

	readonly list: (
		filter: ReservationFilter,
	) => Effect.Effect<ReadonlyArray<Reservation>, PersistenceError>;
}

export class ReservationService extends Context.Tag("ReservationService")<
	ReservationService,
	ReservationServiceSignature
>() {
	static readonly Live = Layer.effect(
		ReservationService,
		Effect.gen(function* () {
			const ledger = yield* CapacityLedger;
			const reservations = yield* ReservationRepository;
			const flights = yield* FlightRepository;
			const users = yield* UserRepository;
			const unitOfWork = yield* UnitOfWork;
			const config = yield* BookingConfig;

			const serviceFee = Money.of(config.serviceFee);
			const retryPolicy = commitRetryPolicy(config.maxCommitRetries);

			const findReservation = (id: ReservationId) =>
				reservations.findById(id).pipe(
					Effect.flatMap((found) =>
						Option.match(found, {
							onNone: () =>
								Effect.fail(new NotFoundError({ entity: "Reservation", id })),
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

			const quote = (flight: Flight, seats: number) =>
				PriceBreakdown.quote({ unitFare: flight.fare, seats, serviceFee });

			// Persists a status-only change; unchanged reservations are not rewritten
			const transition = <E extends ReservationStatusError>(
				id: ReservationId,
				step: (reservation: Reservation) => Effect.Effect<Reservation, E>,
			) =>
				unitOfWork
					.transaction(
						Effect.gen(function* () {
							const current = yield* findReservation(id);
							const next = yield* step(current);
							if (next === current) return current;
							return yield* reservations.save(next);
						}),
					)
					.pipe(
						Effect.retry(retryPolicy),
						Effect.catchTag("OptimisticLockingError", conflictFromLockingError),
					);

			return ReservationService.of({
				create: (command) =>
					Effect.gen(function* () {
						const seats = yield* requireSeatCount(command.seats);

						yield* users.findById(command.userId).pipe(
							Effect.flatMap((found) =>
								Option.match(found, {
									onNone: () =>
										Effect.fail(
											new NotFoundError({ entity: "User", id: command.userId }),
										),
									onSome: () => Effect.void,
								}),
							),
						);

						const reservation = yield* unitOfWork
							.transaction(
								Effect.gen(function* () {
									const flight = yield* findFlight(command.flightId);
									if (!flight.isActive()) {
										return yield* Effect.fail(
											new InvalidInputError({
												field: "flightId",
												reason: `Flight is ${flight.status} and cannot be booked`,
											}),
										);
									}

									yield* ledger.commitClaim(flight.id, seats);

									return yield* reservations.save(
										Reservation.create({
											id: makeReservationId(Crypto.randomUUID()),
											userId: command.userId,
											flightId: flight.id,
											seats,
											price: quote(flight, seats),
										}),
									);
								}),
							)
							.pipe(
								Effect.retry(retryPolicy),
								Effect.catchTag(
									"OptimisticLockingError",
									conflictFromLockingError,
								),
							);

						yield* Effect.logInfo("Reservation created", {
							reservationId: reservation.id,
							flightId: reservation.flightId,
							seats: reservation.seats,
							total: reservation.price.total.toFixed(),
						});

						return reservation;
					}),

				amend: (command) =>
					Effect.gen(function* () {
						if (Option.isNone(command.seats) && Option.isNone(command.status)) {
							return yield* Effect.fail(
								new InvalidInputError({
									field: "reservation",
									reason: "Provide seats or status to amend",
								}),
							);
						}

						const requestedSeats = yield* Option.match(command.seats, {
							onNone: () => Effect.succeed(Option.none<number>()),
							onSome: (seats) => requireSeatCount(seats).pipe(Effect.map(Option.some)),
						});

						const amended = yield* unitOfWork
							.transaction(
								Effect.gen(function* () {
									let reservation = yield* findReservation(command.reservationId);

									if (Option.isSome(requestedSeats)) {
										const seats = requestedSeats.value;
										const flight = yield* findFlight(reservation.flightId);
										reservation = yield* reservation.resize(
											seats,
											quote(flight, seats),
										);
										yield* ledger.commitClaim(flight.id, seats, reservation.id);
									}

									if (Option.isSome(command.status)) {
										reservation = yield* reservation.transitionTo(
											command.status.value,
										);
									}

									return yield* reservations.save(reservation);
								}),
							)
							.pipe(
								Effect.retry(retryPolicy),
								Effect.catchTag(
									"OptimisticLockingError",
									conflictFromLockingError,
								),
							);

						yield* Effect.logInfo("Reservation amended", {
							reservationId: amended.id,
							seats: amended.seats,
							status: amended.status,
						});

						return amended;
					}),

				confirm: (id) => transition(id, (reservation) => reservation.confirm()),

				cancel: (id) =>
					transition(id, (reservation) => reservation.cancel()).pipe(
						Effect.tap((reservation) =>
							Effect.logInfo("Reservation cancelled", {
								reservationId: reservation.id,
							}),
						),
					),

				remove: (id) =>
					unitOfWork.transaction(
						Effect.gen(function* () {
							yield* findReservation(id);
							yield* reservations.delete(id);
							yield* Effect.logInfo("Reservation deleted", { reservationId: id });
						}),
					),

				get: findReservation,

				getOwned: (id, owner) =>
					findReservation(id).pipe(
						Effect.filterOrFail(
							(reservation) => reservation.userId === owner,
							() => new NotFoundError({ entity: "Reservation", id }),
						),
					),

				list: (filter) => reservations.list(filter),
			});
		}),
	);
}
