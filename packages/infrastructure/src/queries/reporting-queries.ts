/**
 * @file reporting-queries.ts
 * @module @workspace/infrastructure/queries
 * @description Dashboard aggregates computed in SQL
 */

import { SqlClient } from "@effect/sql";
import {
  ReportingQueries,
  type ReportingQueriesPort,
} from "@workspace/application/reporting.queries";
import { PersistenceError } from "@workspace/domain/errors";
import {
  ACTIVE_FLIGHT_STATUS_SYNONYMS,
  BLOCKED_FLIGHT_STATUS_SYNONYMS,
  CANCELLED_FLIGHT_STATUS_SYNONYMS,
  FlightStatus,
} from "@workspace/domain/flight";
import { Money } from "@workspace/domain/kernel";
import { ReservationStatus } from "@workspace/domain/reservation";
import { Effect, Layer, Option } from "effect";
import { toPersistenceError } from "../errors/error-mapper.js";

interface FlightLoadRow {
  readonly occupied: number;
  readonly capacity: number | null;
}

// Stored spellings that normalise to each flight status
const STATUS_SPELLINGS: Record<FlightStatus, ReadonlyArray<string>> = {
  active: ACTIVE_FLIGHT_STATUS_SYNONYMS,
  cancelled: CANCELLED_FLIGHT_STATUS_SYNONYMS,
  blocked: BLOCKED_FLIGHT_STATUS_SYNONYMS,
};

export class PostgresReportingQueries {
  static readonly Live = Layer.effect(
    ReportingQueries,
    Effect.gen(function* () {
      const sql = yield* SqlClient.SqlClient;

      const count = Effect.map(
        (rows: ReadonlyArray<{ count: number }>) => rows[0]?.count ?? 0,
      );

      const countFlightsWithStatusIn: ReportingQueriesPort["countFlightsWithStatusIn"] =
        (spellings) =>
          sql<{ count: number }>`
            SELECT COUNT(*)::int AS count
            FROM flights
            WHERE lower(trim(status)) IN ${sql.in(spellings.map((s) => s.toLowerCase()))}
          `.pipe(
            count,
            Effect.mapError(toPersistenceError("reporting.countFlights")),
          );

      return ReportingQueries.of({
        countFlightsByStatus: (status) =>
          countFlightsWithStatusIn(STATUS_SPELLINGS[status]),

        countFlightsWithStatusIn,

        countReservationsByStatus: (status) =>
          sql<{ count: number }>`
            SELECT COUNT(*)::int AS count
            FROM reservations
            WHERE upper(status) = ${status}
          `.pipe(
            count,
            Effect.mapError(toPersistenceError("reporting.countReservations")),
          ),

        totalRevenue: () =>
          sql<{ total: string }>`
            SELECT COALESCE(SUM(amount), 0)::text AS total FROM payments
          `.pipe(
            Effect.mapError(toPersistenceError("reporting.totalRevenue")),
            Effect.flatMap((rows) =>
              Option.match(Money.parse(rows[0]?.total ?? "0"), {
                onNone: () =>
                  Effect.fail(
                    new PersistenceError({
                      operation: "reporting.totalRevenue",
                      reason: "Stored payment amounts do not add up to a valid amount",
                    }),
                  ),
                onSome: Effect.succeed,
              }),
            ),
          ),

        totalSeatsReserved: () =>
          sql<{ count: number }>`
            SELECT COALESCE(SUM(seats), 0)::int AS count FROM reservations
          `.pipe(
            count,
            Effect.mapError(toPersistenceError("reporting.totalSeatsReserved")),
          ),

        reservationTimestampsSince: (since) =>
          sql<{ created_at: Date }>`
            SELECT created_at FROM reservations WHERE created_at >= ${since}
          `.pipe(
            Effect.map((rows) => rows.map((row) => row.created_at)),
            Effect.mapError(toPersistenceError("reporting.reservationTimestamps")),
          ),

        flightLoadsBetween: (start, end) =>
          sql<FlightLoadRow>`
            SELECT
              COALESCE((
                SELECT SUM(r.seats)
                FROM reservations r
                WHERE r.flight_id = f.id
                  AND upper(r.status) <> ${ReservationStatus.CANCELLED}
              ), 0)::int AS occupied,
              a.capacity
            FROM flights f
            LEFT JOIN aircraft a ON a.id = f.aircraft_id
            WHERE f.departure_at >= ${start} AND f.departure_at < ${end}
          `.pipe(
            Effect.map((rows) =>
              rows.map((row) => ({
                occupied: row.occupied,
                capacity: Option.fromNullable(row.capacity),
              })),
            ),
            Effect.mapError(toPersistenceError("reporting.flightLoads")),
          ),
      });
    }),
  );
}
