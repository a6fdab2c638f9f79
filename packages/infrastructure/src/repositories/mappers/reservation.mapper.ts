import {
  makeFlightId,
  makeReservationId,
  makeUserId,
} from "@workspace/domain/kernel";
import { PriceBreakdown } from "@workspace/domain/pricing";
import {
  Reservation,
  ReservationStatusSchema,
} from "@workspace/domain/reservation";
import { Effect, Option, Schema } from "effect";
import { RowDecodeError } from "../../errors.js";
import { construct, decodeMoney } from "./row-decoding.js";

export interface ReservationRow {
  readonly id: string;
  readonly user_id: string;
  readonly flight_id: string;
  readonly seats: number;
  readonly unit_fare: string;
  readonly service_fee: string;
  readonly subtotal: string;
  readonly total: string;
  readonly status: string;
  readonly created_at: Date;
  readonly version: number;
}

const decodeStatus = Schema.decodeUnknownOption(ReservationStatusSchema);

export const toReservation = (
  row: ReservationRow,
): Effect.Effect<Reservation, RowDecodeError> =>
  Effect.gen(function* () {
    const ref = { table: "reservations", id: row.id };
    const status = yield* Option.match(
      decodeStatus(row.status.trim().toUpperCase()),
      {
        onNone: () => Effect.fail(new RowDecodeError({ ...ref, field: "status" })),
        onSome: Effect.succeed,
      },
    );
    const price = new PriceBreakdown({
      unitFare: yield* decodeMoney(row.unit_fare, ref, "unit_fare"),
      subtotal: yield* decodeMoney(row.subtotal, ref, "subtotal"),
      serviceFee: yield* decodeMoney(row.service_fee, ref, "service_fee"),
      total: yield* decodeMoney(row.total, ref, "total"),
    });
    return yield* construct(
      ref,
      () =>
        new Reservation({
          id: makeReservationId(row.id),
          userId: makeUserId(row.user_id),
          flightId: makeFlightId(row.flight_id),
          seats: row.seats,
          price,
          status,
          createdAt: row.created_at,
          version: row.version,
        }),
    );
  });

export const toReservationRow = (reservation: Reservation): ReservationRow => ({
  id: reservation.id,
  user_id: reservation.userId,
  flight_id: reservation.flightId,
  seats: reservation.seats,
  unit_fare: reservation.price.unitFare.toFixed(),
  service_fee: reservation.price.serviceFee.toFixed(),
  subtotal: reservation.price.subtotal.toFixed(),
  total: reservation.price.total.toFixed(),
  status: reservation.status,
  created_at: reservation.createdAt,
  version: reservation.version,
});
