import { SqlClient } from "@effect/sql";
import {
  ReservationRepository,
  type ReservationRepositoryPort,
} from "@workspace/application/reservation.repository";
import { OptimisticLockingError, PersistenceError } from "@workspace/domain/errors";
import { Reservation } from "@workspace/domain/reservation";
import { Effect, Layer, Option } from "effect";
import { decodeFailure, toPersistenceError } from "../errors/error-mapper.js";
import {
  type ReservationRow,
  toReservation,
  toReservationRow,
} from "./mappers/reservation.mapper.js";
import { isUuid } from "./mappers/row-decoding.js";
import { AuditLogger } from "../services/audit-logger.js";

/**
 * PostgreSQL implementation of the ReservationRepository.
 */
export class PostgresReservationRepository {
  static readonly Live = Layer.effect(
    ReservationRepository,
    Effect.gen(function* () {
      const sql = yield* SqlClient.SqlClient;
      const audit = yield* AuditLogger;

      const decodeAll = (operation: string) => (rows: ReadonlyArray<ReservationRow>) =>
        Effect.forEach(rows, toReservation).pipe(
          Effect.mapError(decodeFailure(operation)),
        );

      const save: ReservationRepositoryPort["save"] = (reservation) =>
        Effect.gen(function* () {
          const row = toReservationRow(reservation);

          // New rows keep their version; updates bump it if it still matches
          const result = yield* sql<{ version: number }>`
            INSERT INTO reservations (
              id, user_id, flight_id, seats, unit_fare, service_fee,
              subtotal, total, status, created_at, version
            ) VALUES (
              ${row.id},
              ${row.user_id},
              ${row.flight_id},
              ${row.seats},
              ${row.unit_fare},
              ${row.service_fee},
              ${row.subtotal},
              ${row.total},
              ${row.status},
              ${row.created_at},
              ${row.version}
            )
            ON CONFLICT (id) DO UPDATE SET
              seats = EXCLUDED.seats,
              unit_fare = EXCLUDED.unit_fare,
              service_fee = EXCLUDED.service_fee,
              subtotal = EXCLUDED.subtotal,
              total = EXCLUDED.total,
              status = EXCLUDED.status,
              version = reservations.version + 1
            WHERE reservations.version = ${reservation.version}
            RETURNING version
          `.pipe(Effect.mapError(toPersistenceError("reservations.save")));

          const saved = result[0];
          if (saved !== undefined) {
            yield* audit.logSync({
              aggregateType: "Reservation",
              aggregateId: reservation.id,
              operation: saved.version === reservation.version ? "CREATE" : "UPDATE",
              changes: { seats: row.seats, status: row.status, total: row.total },
            });
            return new Reservation({ ...reservation, version: saved.version });
          }

          const existing = yield* sql<{ version: number }>`
            SELECT version FROM reservations WHERE id = ${reservation.id}
          `.pipe(Effect.mapError(toPersistenceError("reservations.save")));

          const current = existing[0];
          if (current === undefined) {
            return yield* Effect.fail(
              new PersistenceError({
                operation: "reservations.save",
                reason: "Update failed to return a result",
              }),
            );
          }
          return yield* Effect.fail(
            new OptimisticLockingError({
              entityType: "Reservation",
              id: reservation.id,
              expectedVersion: reservation.version,
              actualVersion: current.version,
            }),
          );
        });

      const findById: ReservationRepositoryPort["findById"] = (id) =>
        isUuid(id)
          ? sql<ReservationRow>`
              SELECT * FROM reservations WHERE id = ${id}
            `.pipe(
              Effect.mapError(toPersistenceError("reservations.findById")),
              Effect.flatMap(decodeAll("reservations.findById")),
              Effect.map((reservations) => Option.fromNullable(reservations[0])),
            )
          : Effect.succeed(Option.none());

      const list: ReservationRepositoryPort["list"] = (filter) => {
        const conditions = [
          ...(filter.status === undefined
            ? []
            : [sql`upper(status) = ${filter.status}`]),
          ...(filter.flightId === undefined
            ? []
            : [sql`flight_id = ${filter.flightId}`]),
          ...(filter.userId === undefined ? [] : [sql`user_id = ${filter.userId}`]),
        ];
        const limit =
          filter.limit === undefined ? sql`` : sql`LIMIT ${filter.limit}`;

        return sql<ReservationRow>`
          SELECT * FROM reservations
          WHERE ${sql.and(conditions)}
          ORDER BY created_at DESC, id ASC
          ${limit}
        `.pipe(
          Effect.mapError(toPersistenceError("reservations.list")),
          Effect.flatMap(decodeAll("reservations.list")),
        );
      };

      const countByFlight: ReservationRepositoryPort["countByFlight"] = (
        flightId,
      ) =>
        sql<{ count: number }>`
          SELECT COUNT(*)::int AS count FROM reservations WHERE flight_id = ${flightId}
        `.pipe(
          Effect.map((rows) => rows[0]?.count ?? 0),
          Effect.mapError(toPersistenceError("reservations.countByFlight")),
        );

      // payments.reservation_id cascades
      const remove: ReservationRepositoryPort["delete"] = (id) =>
        sql`DELETE FROM reservations WHERE id = ${id}`.pipe(
          Effect.mapError(toPersistenceError("reservations.delete")),
          Effect.zipRight(
            audit.logSync({
              aggregateType: "Reservation",
              aggregateId: id,
              operation: "DELETE",
              changes: null,
            }),
          ),
        );

      return ReservationRepository.of({
        save,
        findById,
        list,
        countByFlight,
        delete: remove,
      });
    }),
  );
}
