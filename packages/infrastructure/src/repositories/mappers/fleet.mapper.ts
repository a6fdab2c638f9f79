import {
  Aircraft,
  AircraftStatus,
  normalizeAircraftStatus,
} from "@workspace/domain/aircraft";
import {
  Flight,
  FlightStatus,
  normalizeFlightStatus,
} from "@workspace/domain/flight";
import { makeAircraftId, makeFlightId } from "@workspace/domain/kernel";
import { Effect, Option } from "effect";
import type { RowDecodeError } from "../../errors.js";
import { construct, decodeMoney } from "./row-decoding.js";

// --- Database Row Types ---

export interface AircraftRow {
  readonly id: string;
  readonly model: string;
  readonly capacity: number;
  readonly status: string;
  readonly airline: string | null;
}

export interface FlightRow {
  readonly id: string;
  readonly origin: string;
  readonly destination: string;
  readonly departure_at: Date;
  readonly arrival_at: Date | null;
  readonly fare: string;
  readonly status: string;
  readonly aircraft_id: string;
  readonly ledger_version: number;
}

// --- Mappers ---

// Unrecognised spellings are treated as out of service
export const toAircraft = (
  row: AircraftRow,
): Effect.Effect<Aircraft, RowDecodeError> =>
  construct(
    { table: "aircraft", id: row.id },
    () =>
      new Aircraft({
        id: makeAircraftId(row.id),
        model: row.model,
        capacity: row.capacity,
        status: Option.getOrElse(
          normalizeAircraftStatus(row.status),
          () => AircraftStatus.UNAVAILABLE,
        ),
        airline: Option.fromNullable(row.airline),
      }),
  );

// Unrecognised spellings are treated as not bookable
export const toFlight = (row: FlightRow): Effect.Effect<Flight, RowDecodeError> =>
  Effect.gen(function* () {
    const ref = { table: "flights", id: row.id };
    const fare = yield* decodeMoney(row.fare, ref, "fare");
    return yield* construct(
      ref,
      () =>
        new Flight({
          id: makeFlightId(row.id),
          origin: row.origin,
          destination: row.destination,
          departureAt: row.departure_at,
          arrivalAt: Option.fromNullable(row.arrival_at),
          fare,
          status: Option.getOrElse(
            normalizeFlightStatus(row.status),
            () => FlightStatus.BLOCKED,
          ),
          aircraftId: makeAircraftId(row.aircraft_id),
          ledgerVersion: row.ledger_version,
        }),
    );
  });
