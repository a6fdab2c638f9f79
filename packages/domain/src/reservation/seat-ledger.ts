import { Effect, Schema } from "effect";
import { CapacityExceededError, InvalidInputError } from "../errors.js";
import { FlightId } from "../kernel.js";

export const requireSeatCount = (
	seats: number,
): Effect.Effect<number, InvalidInputError> =>
	Number.isInteger(seats) && seats > 0
		? Effect.succeed(seats)
		: Effect.fail(
				new InvalidInputError({
					field: "seats",
					reason: "Seat count must be a positive integer",
				}),
			);

/**
 * Seat accounting for one flight at a point in time.
 *
 * `occupied` is the sum of seats over the flight's non-cancelled reservations,
 * possibly excluding the reservation being amended. `version` is the flight's
 * ledger version observed before `occupied` was read; committing a claim
 * requires the flight to still be at that version.
 */
export class SeatLedger extends Schema.Class<SeatLedger>("SeatLedger")({
	flightId: FlightId,
	// Raw aircraft capacity; validated on use
	capacity: Schema.Number,
	occupied: Schema.Number.pipe(Schema.int(), Schema.nonNegative()),
	version: Schema.Number.pipe(Schema.int(), Schema.nonNegative()),
}) {
	hasValidCapacity(): boolean {
		return Number.isInteger(this.capacity) && this.capacity > 0;
	}

	remainingSeats(): Effect.Effect<number, InvalidInputError> {
		if (!this.hasValidCapacity()) {
			return Effect.fail(
				new InvalidInputError({
					field: "capacity",
					reason: `Aircraft capacity for flight ${this.flightId} is not configured`,
				}),
			);
		}
		return Effect.succeed(this.capacity - this.occupied);
	}

	claim(
		seats: number,
	): Effect.Effect<SeatLedger, CapacityExceededError | InvalidInputError> {
		return Effect.gen(this, function* () {
			yield* requireSeatCount(seats);
			const remaining = yield* this.remainingSeats();

			if (seats > remaining) {
				return yield* Effect.fail(
					new CapacityExceededError({
						flightId: this.flightId,
						requested: seats,
						remaining: Math.max(remaining, 0),
					}),
				);
			}

			return new SeatLedger({ ...this, occupied: this.occupied + seats });
		});
	}
}
