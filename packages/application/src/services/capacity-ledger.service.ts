/**
 * @file capacity-ledger.service.ts
 * @module @workspace/application/services
 * @description Seat accounting per flight
 *
 * Reads a flight's seat ledger and commits claims against it. A commit bumps
 * the flight's ledger version, so two claims computed from the same snapshot
 * can never both be written. Callers run `commitClaim` inside the
 * transaction that persists the reservation.
 */

import {
  type CapacityExceededError,
  type InvalidInputError,
  NotFoundError,
  type OptimisticLockingError,
  type PersistenceError,
} from "@workspace/domain/errors";
import type { FlightId, ReservationId } from "@workspace/domain/kernel";
import type { SeatLedger } from "@workspace/domain/seat-ledger";
import { Context, Effect, Layer, Metric, Option } from "effect";
import { FlightRepository } from "../repositories/flight.repository.js";

// ============================================================================
// METRICS
// ============================================================================

const seatClaimsCounter = Metric.counter("seat_claims_total", {
  description: "Seat claims committed against a flight ledger",
});

const seatClaimRejectionsCounter = Metric.counter(
  "seat_claim_rejections_total",
  { description: "Seat claims rejected for capacity or input reasons" },
);

// ============================================================================
// SERVICE
// ============================================================================

export interface CapacityLedgerSignature {
  readonly snapshot: (
    flightId: FlightId,
    exclude?: ReservationId,
  ) => Effect.Effect<SeatLedger, NotFoundError | PersistenceError>;

  /** Seats held by non-cancelled reservations, optionally leaving one out. */
  readonly occupiedSeats: (
    flightId: FlightId,
    exclude?: ReservationId,
  ) => Effect.Effect<number, NotFoundError | PersistenceError>;

  /**
   * Capacity minus occupied seats. Fails with InvalidInputError when the
   * aircraft capacity is missing or not a positive integer.
   */
  readonly remainingSeats: (
    flightId: FlightId,
    exclude?: ReservationId,
  ) => Effect.Effect<
    number,
    NotFoundError | InvalidInputError | PersistenceError
  >;

  /**
   * Validates `seats` against the current ledger and commits the claim.
   * Fails with OptimisticLockingError when another claim committed first.
   */
  readonly commitClaim: (
    flightId: FlightId,
    seats: number,
    exclude?: ReservationId,
  ) => Effect.Effect<
    SeatLedger,
    | NotFoundError
    | InvalidInputError
    | CapacityExceededError
    | OptimisticLockingError
    | PersistenceError
  >;
}

export class CapacityLedger extends Context.Tag("CapacityLedger")<
  CapacityLedger,
  CapacityLedgerSignature
>() {
  static readonly Live = Layer.effect(
    CapacityLedger,
    Effect.gen(function* () {
      const flights = yield* FlightRepository;

      const snapshot = (flightId: FlightId, exclude?: ReservationId) =>
        flights.ledger(flightId, Option.fromNullable(exclude)).pipe(
          Effect.flatMap((found) =>
            Option.match(found, {
              onNone: () =>
                Effect.fail(new NotFoundError({ entity: "Flight", id: flightId })),
              onSome: Effect.succeed,
            }),
          ),
        );

      return CapacityLedger.of({
        snapshot,

        occupiedSeats: (flightId, exclude) =>
          snapshot(flightId, exclude).pipe(Effect.map((ledger) => ledger.occupied)),

        remainingSeats: (flightId, exclude) =>
          snapshot(flightId, exclude).pipe(
            Effect.flatMap((ledger) => ledger.remainingSeats()),
          ),

        commitClaim: (flightId, seats, exclude) =>
          Effect.gen(function* () {
            const ledger = yield* snapshot(flightId, exclude);
            const next = yield* ledger.claim(seats).pipe(
              Effect.tapError((error) =>
                Effect.logDebug("Seat claim rejected", {
                  flightId,
                  seats,
                  reason: error._tag,
                }).pipe(Effect.zipRight(Metric.increment(seatClaimRejectionsCounter))),
              ),
            );
            yield* flights.advanceLedger(ledger);
            yield* Metric.increment(seatClaimsCounter);
            return next;
          }),
      });
    }),
  );
}
