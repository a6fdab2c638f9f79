import * as Crypto from "node:crypto";
import { BookingConfig } from "@workspace/config";
import {
	ConflictError,
	DuplicatePaymentError,
	InvalidInputError,
	NotFoundError,
	type PersistenceError,
	type ReservationStatusError,
} from "@workspace/domain/errors";
import {
	PaymentId,
	type ReferenceCode,
	ReferenceCodeSchema,
	type ReservationId,
	SettlementReferenceSchema,
	type UserId,
} from "@workspace/domain/kernel";
import { Payment, type PaymentMethod } from "@workspace/domain/payment";
import {
	type Reservation,
	ReservationStatus,
} from "@workspace/domain/reservation";
import {
	Context,
	Data,
	Duration,
	Effect,
	Layer,
	Option,
	Schema,
} from "effect";
import { NotificationGateway } from "../gateways/notification.gateway.js";
import { UnitOfWork } from "../ports/unit-of-work.js";
import { FlightRepository } from "../repositories/flight.repository.js";
import {
	PaymentRepository,
	type PaymentRepositoryPort,
} from "../repositories/payment.repository.js";
import { ReservationRepository } from "../repositories/reservation.repository.js";
import { UserRepository } from "../repositories/user.repository.js";
import {
	commitRetryPolicy,
	conflictFromLockingError,
} from "./commit-retry.js";

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

export interface PayReservationCommand {
	readonly reservationId: ReservationId;
	readonly settlementReference: string;
	/** The paying user. None for back-office settlement. */
	readonly payer: Option.Option<UserId>;
}

export interface PaymentOutcome {
	readonly payment: Payment;
	readonly reservation: Reservation;
	readonly method: PaymentMethod;
}

// ---------------------------------------------------------------------------
// Service Interface
// ---------------------------------------------------------------------------

export interface PaymentServiceSignature {
	/**
	 * Records the single payment of a reservation and marks it PAID.
	 * The receipt is sent after commit; delivery problems are only logged.
	 */
	readonly pay: (
		command: PayReservationCommand,
	) => Effect.Effect<
		PaymentOutcome,
		| NotFoundError
		| InvalidInputError
		| DuplicatePaymentError
		| ReservationStatusError
		| ConflictError
		| PersistenceError
	>;
}

export class PaymentService extends Context.Tag("PaymentService")<
	PaymentService,
	PaymentServiceSignature
>() {
	static readonly Live = Layer.effect(
		PaymentService,
		Effect.gen(function* () {
			const reservations = yield* ReservationRepository;
			const payments = yield* PaymentRepository;
			const flights = yield* FlightRepository;
			const users = yield* UserRepository;
			const notificationGateway = yield* NotificationGateway;
			const unitOfWork = yield* UnitOfWork;
			const config = yield* BookingConfig;

			const retryPolicy = commitRetryPolicy(config.maxCommitRetries);

			const sendReceipt = (outcome: PaymentOutcome) =>
				Effect.gen(function* () {
					const { payment, reservation, method } = outcome;
					const owner = yield* users.findById(reservation.userId);
					const flight = yield* flights.findById(reservation.flightId);

					if (Option.isNone(owner) || Option.isNone(flight)) {
						return yield* Effect.logWarning(
							"Receipt skipped: owner or flight no longer exists",
							{ reservationId: reservation.id },
						);
					}

					yield* notificationGateway
						.sendReceipt(
							{
								paymentId: payment.id,
								reference: payment.reference,
								payerName: owner.value.name,
								origin: flight.value.origin,
								destination: flight.value.destination,
								departureAt: flight.value.departureAt,
								seats: reservation.seats,
								subtotal: reservation.price.subtotal,
								taxes: reservation.price.serviceFee,
								total: payment.amount,
								paymentMethod: method.label,
								paidAt: payment.paidAt,
							},
							{ email: owner.value.email, name: owner.value.name },
						)
						.pipe(Effect.timeout(Duration.seconds(30)));
				}).pipe(
					Effect.catchAll((err) =>
						Effect.logError("Failed to send payment receipt", {
							reservationId: outcome.reservation.id,
							error: err._tag,
						}),
					),
				);

			return PaymentService.of({
				pay: (command) =>
					Effect.gen(function* () {
						const settlementReference = yield* Schema.decodeUnknown(
							SettlementReferenceSchema,
						)(command.settlementReference.trim()).pipe(
							Effect.mapError(
								() =>
									new InvalidInputError({
										field: "settlementReference",
										reason: "Settlement reference must be exactly 9 digits",
									}),
							),
						);

						const outcome = yield* unitOfWork
							.transaction(
								Effect.gen(function* () {
									const reservation = yield* reservations
										.findById(command.reservationId)
										.pipe(
											Effect.map((found) =>
												Option.filter(found, (r) =>
													Option.match(command.payer, {
														onNone: () => true,
														onSome: (payer) => r.userId === payer,
													}),
												),
											),
											Effect.flatMap((found) =>
												Option.match(found, {
													onNone: () =>
														Effect.fail(
															new NotFoundError({
																entity: "Reservation",
																id: command.reservationId,
															}),
														),
													onSome: Effect.succeed,
												}),
											),
										);

									const existing = yield* payments.findByReservation(
										reservation.id,
									);
									if (
										Option.isSome(existing) ||
										reservation.status === ReservationStatus.PAID
									) {
										return yield* Effect.fail(
											new DuplicatePaymentError({
												reservationId: reservation.id,
											}),
										);
									}

									const paid = yield* reservation.settle();
									const method = yield* payments.resolveMethod(
										config.paymentMethodLabel,
									);
									const reference = yield* generateUniqueReference(
										payments,
										reservation.id,
									);

									const payment = yield* payments.insert(
										Payment.record({
											id: PaymentId.make(Crypto.randomUUID()),
											reference,
											reservation: paid,
											method,
											settlementReference,
										}),
									);
									const saved = yield* reservations.save(paid);

									return { payment, reservation: saved, method };
								}),
							)
							.pipe(
								Effect.retry(retryPolicy),
								Effect.catchTag(
									"OptimisticLockingError",
									conflictFromLockingError,
								),
							);

						yield* Effect.logInfo("Payment recorded", {
							reservationId: outcome.reservation.id,
							reference: outcome.payment.reference,
							amount: outcome.payment.amount.toFixed(),
						});

						yield* sendReceipt(outcome);

						return outcome;
					}),
			});
		}),
	);
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

class ReferenceCollision extends Data.TaggedError("ReferenceCollision")<{
	readonly reference: ReferenceCode;
}> {}

const REFERENCE_CHARSET = "ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789";
const REFERENCE_LENGTH = 6;

export const generateReferenceCandidate = (): ReferenceCode => {
	let candidate = "";
	for (let i = 0; i < REFERENCE_LENGTH; i++) {
		candidate += REFERENCE_CHARSET.charAt(
			Crypto.randomInt(REFERENCE_CHARSET.length),
		);
	}
	return ReferenceCodeSchema.make(candidate);
};

const generateUniqueReference = (
	payments: PaymentRepositoryPort,
	reservationId: ReservationId,
): Effect.Effect<ReferenceCode, ConflictError | PersistenceError> =>
	Effect.gen(function* () {
		const reference = generateReferenceCandidate();
		if (yield* payments.referenceExists(reference)) {
			return yield* Effect.fail(new ReferenceCollision({ reference }));
		}
		return reference;
	}).pipe(
		Effect.retry({
			times: 5,
			while: (error) => error._tag === "ReferenceCollision",
		}),
		Effect.catchTag("ReferenceCollision", () =>
			Effect.fail(
				new ConflictError({
					entity: "Payment",
					id: reservationId,
					reason: "Could not allocate a unique payment reference",
				}),
			),
		),
	);
