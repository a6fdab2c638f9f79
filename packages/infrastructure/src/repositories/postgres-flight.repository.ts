import { SqlClient } from "@effect/sql";
import {
  FlightRepository,
  type FlightRepositoryPort,
} from "@workspace/application/flight.repository";
import { OptimisticLockingError, PersistenceError } from "@workspace/domain/errors";
import {
  ACTIVE_FLIGHT_STATUS_SYNONYMS,
  Flight,
  FlightStatus,
} from "@workspace/domain/flight";
import { ReservationStatus } from "@workspace/domain/reservation";
import { SeatLedger } from "@workspace/domain/seat-ledger";
import { Effect, Layer, Option } from "effect";
import {
  decodeFailure,
  toDeleteError,
  toPersistenceError,
} from "../errors/error-mapper.js";
import { type FlightRow, toFlight } from "./mappers/fleet.mapper.js";
import { isUuid } from "./mappers/row-decoding.js";
import { AuditLogger } from "../services/audit-logger.js";

interface LedgerHeadRow {
  readonly ledger_version: number;
  readonly capacity: number | null;
}

const noRow = (operation: string) =>
  new PersistenceError({ operation, reason: "Write returned no row" });

/**
 * PostgreSQL implementation of the FlightRepository.
 *
 * The seat ledger is the flight's `ledger_version` column. A claim commits
 * with a compare-and-set on that column, so two transactions that read the
 * same version cannot both commit seats on the flight.
 */
export class PostgresFlightRepository {
  static readonly Live = Layer.effect(
    FlightRepository,
    Effect.gen(function* () {
      const sql = yield* SqlClient.SqlClient;
      const audit = yield* AuditLogger;

      const activeSpellings = sql.in([...ACTIVE_FLIGHT_STATUS_SYNONYMS]);

      const findById: FlightRepositoryPort["findById"] = (id) =>
        isUuid(id)
          ? sql<FlightRow>`
              SELECT id, origin, destination, departure_at, arrival_at, fare,
                     status, aircraft_id, ledger_version
              FROM flights
              WHERE id = ${id}
            `.pipe(
              Effect.mapError(toPersistenceError("flights.findById")),
              Effect.flatMap((rows) =>
                Option.match(Option.fromNullable(rows[0]), {
                  onNone: () => Effect.succeed(Option.none()),
                  onSome: (row) =>
                    toFlight(row).pipe(
                      Effect.map(Option.some),
                      Effect.mapError(decodeFailure("flights.findById")),
                    ),
                }),
              ),
            )
          : Effect.succeed(Option.none());

      // ledger_version is written on insert only
      const save: FlightRepositoryPort["save"] = (flight) =>
        sql<{ ledger_version: number; inserted: boolean }>`
          INSERT INTO flights (
            id, origin, destination, departure_at, arrival_at, fare,
            status, aircraft_id, ledger_version
          ) VALUES (
            ${flight.id},
            ${flight.origin},
            ${flight.destination},
            ${flight.departureAt},
            ${Option.getOrNull(flight.arrivalAt)},
            ${flight.fare.toFixed()},
            ${flight.status},
            ${flight.aircraftId},
            ${flight.ledgerVersion}
          )
          ON CONFLICT (id) DO UPDATE SET
            origin = EXCLUDED.origin,
            destination = EXCLUDED.destination,
            departure_at = EXCLUDED.departure_at,
            arrival_at = EXCLUDED.arrival_at,
            fare = EXCLUDED.fare,
            status = EXCLUDED.status,
            aircraft_id = EXCLUDED.aircraft_id
          RETURNING ledger_version, (xmax = 0) AS inserted
        `.pipe(
          Effect.mapError(toPersistenceError("flights.save")),
          Effect.flatMap((rows) =>
            Option.match(Option.fromNullable(rows[0]), {
              onNone: () => Effect.fail(noRow("flights.save")),
              onSome: (row) =>
                audit
                  .logSync({
                    aggregateType: "Flight",
                    aggregateId: flight.id,
                    operation: row.inserted ? "CREATE" : "UPDATE",
                    changes: {
                      route: `${flight.origin}-${flight.destination}`,
                      fare: flight.fare.toFixed(),
                      status: flight.status,
                      aircraftId: flight.aircraftId,
                    },
                  })
                  .pipe(
                    Effect.as(
                      new Flight({ ...flight, ledgerVersion: row.ledger_version }),
                    ),
                  ),
            }),
          ),
        );

      const remove: FlightRepositoryPort["delete"] = (id) =>
        sql`DELETE FROM flights WHERE id = ${id}`.pipe(
          Effect.mapError(toDeleteError("flights.delete", "Flight", id)),
          Effect.zipRight(
            audit.logSync({
              aggregateType: "Flight",
              aggregateId: id,
              operation: "DELETE",
              changes: null,
            }),
          ),
        );

      const countByAircraft: FlightRepositoryPort["countByAircraft"] = (
        aircraftId,
      ) =>
        sql<{ count: number }>`
          SELECT COUNT(*)::int AS count FROM flights WHERE aircraft_id = ${aircraftId}
        `.pipe(
          Effect.map((rows) => rows[0]?.count ?? 0),
          Effect.mapError(toPersistenceError("flights.countByAircraft")),
        );

      const blockActiveByAircraft: FlightRepositoryPort["blockActiveByAircraft"] =
        (aircraftId) =>
          sql<{ id: string }>`
            UPDATE flights
            SET status = ${FlightStatus.BLOCKED}
            WHERE aircraft_id = ${aircraftId}
              AND lower(trim(status)) IN ${activeSpellings}
            RETURNING id
          `.pipe(
            Effect.map((rows) => rows.length),
            Effect.mapError(toPersistenceError("flights.blockActiveByAircraft")),
          );

      const ledger: FlightRepositoryPort["ledger"] = (flightId, exclude) =>
        Effect.gen(function* () {
          if (!isUuid(flightId)) return Option.none();

          const heads = yield* sql<LedgerHeadRow>`
            SELECT f.ledger_version, a.capacity
            FROM flights f
            LEFT JOIN aircraft a ON a.id = f.aircraft_id
            WHERE f.id = ${flightId}
          `;
          const head = heads[0];
          if (head === undefined) return Option.none();

          const excluded = Option.match(exclude, {
            onNone: () => sql``,
            onSome: (reservationId) => sql`AND id <> ${reservationId}`,
          });
          const sums = yield* sql<{ occupied: number }>`
            SELECT COALESCE(SUM(seats), 0)::int AS occupied
            FROM reservations
            WHERE flight_id = ${flightId}
              AND upper(status) <> ${ReservationStatus.CANCELLED}
              ${excluded}
          `;

          return Option.some(
            new SeatLedger({
              flightId,
              capacity: head.capacity ?? 0,
              occupied: sums[0]?.occupied ?? 0,
              version: head.ledger_version,
            }),
          );
        }).pipe(Effect.mapError(toPersistenceError("flights.ledger")));

      const advanceLedger: FlightRepositoryPort["advanceLedger"] = (snapshot) =>
        Effect.gen(function* () {
          const updated = yield* sql<{ ledger_version: number }>`
            UPDATE flights
            SET ledger_version = ledger_version + 1
            WHERE id = ${snapshot.flightId}
              AND ledger_version = ${snapshot.version}
            RETURNING ledger_version
          `.pipe(Effect.mapError(toPersistenceError("flights.advanceLedger")));

          if (updated.length > 0) return;

          // Report the version that won
          const current = yield* sql<{ ledger_version: number }>`
            SELECT ledger_version FROM flights WHERE id = ${snapshot.flightId}
          `.pipe(Effect.mapError(toPersistenceError("flights.advanceLedger")));

          const actual = current[0];
          if (actual === undefined) {
            return yield* Effect.fail(
              new PersistenceError({
                operation: "flights.advanceLedger",
                reason: "Flight no longer exists",
              }),
            );
          }
          return yield* Effect.fail(
            new OptimisticLockingError({
              entityType: "Flight",
              id: snapshot.flightId,
              expectedVersion: snapshot.version,
              actualVersion: actual.ledger_version,
            }),
          );
        });

      const advanceLedgersForAircraft: FlightRepositoryPort["advanceLedgersForAircraft"] =
        (aircraftId) =>
          sql`
            UPDATE flights
            SET ledger_version = ledger_version + 1
            WHERE aircraft_id = ${aircraftId}
          `.pipe(
            Effect.asVoid,
            Effect.mapError(toPersistenceError("flights.advanceLedgersForAircraft")),
          );

      const maxOccupancyForAircraft: FlightRepositoryPort["maxOccupancyForAircraft"] =
        (aircraftId) =>
          sql<{ occupied: number }>`
            SELECT COALESCE(MAX(per_flight.occupied), 0)::int AS occupied
            FROM (
              SELECT COALESCE(SUM(r.seats), 0) AS occupied
              FROM flights f
              LEFT JOIN reservations r
                ON r.flight_id = f.id
               AND upper(r.status) <> ${ReservationStatus.CANCELLED}
              WHERE f.aircraft_id = ${aircraftId}
              GROUP BY f.id
            ) AS per_flight
          `.pipe(
            Effect.map((rows) => rows[0]?.occupied ?? 0),
            Effect.mapError(toPersistenceError("flights.maxOccupancyForAircraft")),
          );

      return FlightRepository.of({
        findById,
        save,
        delete: remove,
        countByAircraft,
        blockActiveByAircraft,
        ledger,
        advanceLedger,
        advanceLedgersForAircraft,
        maxOccupancyForAircraft,
      });
    }),
  );
}
