import { Effect, Schema } from "effect";
import { InvalidInputError, ReservationStatusError } from "../errors.js";
import { FlightId, ReservationId, SeatCount, UserId } from "../kernel.js";
import { PriceBreakdown } from "./pricing.js";

export const ReservationStatus = {
	PENDING: "PENDING",
	CONFIRMED: "CONFIRMED",
	PAID: "PAID",
	CANCELLED: "CANCELLED",
} as const;

export type ReservationStatus =
	(typeof ReservationStatus)[keyof typeof ReservationStatus];

export const ReservationStatusSchema = Schema.Enums(ReservationStatus);

const TRANSITIONS: Record<ReservationStatus, ReadonlyArray<ReservationStatus>> =
	{
		PENDING: [
			ReservationStatus.CONFIRMED,
			ReservationStatus.PAID,
			ReservationStatus.CANCELLED,
		],
		CONFIRMED: [ReservationStatus.PAID, ReservationStatus.CANCELLED],
		PAID: [],
		CANCELLED: [],
	};

export const canTransition = (
	from: ReservationStatus,
	to: ReservationStatus,
): boolean => from === to || TRANSITIONS[from].includes(to);

// --- Reservation Aggregate Root ---
export class Reservation extends Schema.Class<Reservation>("Reservation")({
	id: ReservationId,
	userId: UserId,
	flightId: FlightId,
	seats: SeatCount,
	price: PriceBreakdown,
	status: ReservationStatusSchema,
	createdAt: Schema.Date,
	version: Schema.Number.pipe(Schema.int(), Schema.nonNegative()),
}) {
	// PAID and CANCELLED accept neither seat amendments nor status changes
	isTerminal(): boolean {
		return (
			this.status === ReservationStatus.PAID ||
			this.status === ReservationStatus.CANCELLED
		);
	}

	// Counts toward the flight's occupancy
	holdsSeats(): boolean {
		return this.status !== ReservationStatus.CANCELLED;
	}

	isPayable(): boolean {
		return (
			this.status === ReservationStatus.PENDING ||
			this.status === ReservationStatus.CONFIRMED
		);
	}

	static create(props: {
		id: ReservationId;
		userId: UserId;
		flightId: FlightId;
		seats: number;
		price: PriceBreakdown;
		createdAt?: Date;
	}): Reservation {
		return new Reservation({
			id: props.id,
			userId: props.userId,
			flightId: props.flightId,
			seats: props.seats,
			price: props.price,
			status: ReservationStatus.PENDING,
			createdAt: props.createdAt ?? new Date(),
			version: 1,
		});
	}

	// Seat amendment; the caller has already cleared `seats` against the ledger
	resize(
		seats: number,
		price: PriceBreakdown,
	): Effect.Effect<Reservation, ReservationStatusError> {
		return Effect.gen(this, function* () {
			if (this.isTerminal()) {
				return yield* Effect.fail(
					new ReservationStatusError({
						reservationId: this.id,
						status: this.status,
						attempted: "amend seats",
					}),
				);
			}
			return new Reservation({ ...this, seats, price });
		});
	}

	/**
	 * Status change requested through an amendment. PAID is only reached
	 * through settlement, so it is rejected here as input rather than as a
	 * lifecycle violation.
	 */
	transitionTo(
		target: ReservationStatus,
	): Effect.Effect<Reservation, ReservationStatusError | InvalidInputError> {
		if (target === ReservationStatus.PAID && this.status !== target) {
			return Effect.fail(
				new InvalidInputError({
					field: "status",
					reason: "Reservations become PAID only through payment",
				}),
			);
		}
		return this.move(target);
	}

	confirm(): Effect.Effect<Reservation, ReservationStatusError> {
		return this.move(ReservationStatus.CONFIRMED);
	}

	/**
	 * Back-office cancellation, allowed from every status. A PAID
	 * reservation keeps its payment record. Cancelling twice is a no-op.
	 */
	cancel(): Effect.Effect<Reservation> {
		return this.status === ReservationStatus.CANCELLED
			? Effect.succeed(this)
			: Effect.succeed(
					new Reservation({ ...this, status: ReservationStatus.CANCELLED }),
				);
	}

	settle(): Effect.Effect<Reservation, ReservationStatusError> {
		return Effect.gen(this, function* () {
			if (!this.isPayable()) {
				return yield* Effect.fail(
					new ReservationStatusError({
						reservationId: this.id,
						status: this.status,
						attempted: ReservationStatus.PAID,
					}),
				);
			}
			return new Reservation({ ...this, status: ReservationStatus.PAID });
		});
	}

	private move(
		target: ReservationStatus,
	): Effect.Effect<Reservation, ReservationStatusError> {
		if (this.status === target) {
			return Effect.succeed(this);
		}
		if (!canTransition(this.status, target)) {
			return Effect.fail(
				new ReservationStatusError({
					reservationId: this.id,
					status: this.status,
					attempted: target,
				}),
			);
		}
		return Effect.succeed(new Reservation({ ...this, status: target }));
	}
}
