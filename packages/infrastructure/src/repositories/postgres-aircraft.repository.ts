import { SqlClient } from "@effect/sql";
import {
  AircraftRepository,
  type AircraftRepositoryPort,
} from "@workspace/application/aircraft.repository";
import { PersistenceError } from "@workspace/domain/errors";
import { Effect, Layer, Option } from "effect";
import {
  decodeFailure,
  toDeleteError,
  toPersistenceError,
} from "../errors/error-mapper.js";
import { type AircraftRow, toAircraft } from "./mappers/fleet.mapper.js";
import { isUuid } from "./mappers/row-decoding.js";
import { AuditLogger } from "../services/audit-logger.js";

interface AircraftUsageRow extends AircraftRow {
  readonly flight_count: number;
}

export class PostgresAircraftRepository {
  static readonly Live = Layer.effect(
    AircraftRepository,
    Effect.gen(function* () {
      const sql = yield* SqlClient.SqlClient;
      const audit = yield* AuditLogger;

      const findById: AircraftRepositoryPort["findById"] = (id) =>
        isUuid(id)
          ? sql<AircraftRow>`
              SELECT id, model, capacity, status, airline
              FROM aircraft
              WHERE id = ${id}
            `.pipe(
              Effect.mapError(toPersistenceError("aircraft.findById")),
              Effect.flatMap((rows) =>
                Option.match(Option.fromNullable(rows[0]), {
                  onNone: () => Effect.succeed(Option.none()),
                  onSome: (row) =>
                    toAircraft(row).pipe(
                      Effect.map(Option.some),
                      Effect.mapError(decodeFailure("aircraft.findById")),
                    ),
                }),
              ),
            )
          : Effect.succeed(Option.none());

      const listWithUsage: AircraftRepositoryPort["listWithUsage"] = () =>
        sql<AircraftUsageRow>`
          SELECT a.id, a.model, a.capacity, a.status, a.airline,
                 COUNT(f.id)::int AS flight_count
          FROM aircraft a
          LEFT JOIN flights f ON f.aircraft_id = a.id
          GROUP BY a.id
          ORDER BY a.model ASC
        `.pipe(
          Effect.mapError(toPersistenceError("aircraft.list")),
          Effect.flatMap((rows) =>
            Effect.forEach(rows, (row) =>
              toAircraft(row).pipe(
                Effect.map((aircraft) => ({
                  aircraft,
                  flightCount: row.flight_count,
                })),
              ),
            ).pipe(Effect.mapError(decodeFailure("aircraft.list"))),
          ),
        );

      const save: AircraftRepositoryPort["save"] = (aircraft) =>
        sql<{ inserted: boolean }>`
          INSERT INTO aircraft (id, model, capacity, status, airline)
          VALUES (
            ${aircraft.id},
            ${aircraft.model},
            ${aircraft.capacity},
            ${aircraft.status},
            ${Option.getOrNull(aircraft.airline)}
          )
          ON CONFLICT (id) DO UPDATE SET
            model = EXCLUDED.model,
            capacity = EXCLUDED.capacity,
            status = EXCLUDED.status,
            airline = EXCLUDED.airline
          RETURNING (xmax = 0) AS inserted
        `.pipe(
          Effect.mapError(toPersistenceError("aircraft.save")),
          Effect.flatMap((rows) =>
            Option.match(Option.fromNullable(rows[0]), {
              onNone: () =>
                Effect.fail(
                  new PersistenceError({
                    operation: "aircraft.save",
                    reason: "Write returned no row",
                  }),
                ),
              onSome: (row) =>
                audit
                  .logSync({
                    aggregateType: "Aircraft",
                    aggregateId: aircraft.id,
                    operation: row.inserted ? "CREATE" : "UPDATE",
                    changes: {
                      model: aircraft.model,
                      capacity: aircraft.capacity,
                      status: aircraft.status,
                    },
                  })
                  .pipe(Effect.as(aircraft)),
            }),
          ),
        );

      const remove: AircraftRepositoryPort["delete"] = (id) =>
        sql`DELETE FROM aircraft WHERE id = ${id}`.pipe(
          Effect.mapError(toDeleteError("aircraft.delete", "Aircraft", id)),
          Effect.zipRight(
            audit.logSync({
              aggregateType: "Aircraft",
              aggregateId: id,
              operation: "DELETE",
              changes: null,
            }),
          ),
        );

      return AircraftRepository.of({
        findById,
        listWithUsage,
        save,
        delete: remove,
      });
    }),
  );
}
