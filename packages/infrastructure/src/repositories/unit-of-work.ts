import { SqlClient, SqlError } from "@effect/sql";
import {
  UnitOfWork,
  type UnitOfWorkPort,
} from "@workspace/application/unit-of-work";
import { Effect, Layer } from "effect";
import { toPersistenceError } from "../errors/error-mapper.js";

export class PostgresUnitOfWork {
  /**
   * Live Layer: PostgreSQL implementation. Nested calls become savepoints.
   */
  static readonly Live = Layer.effect(
    UnitOfWork,
    Effect.gen(function* () {
      const sql = yield* SqlClient.SqlClient;

      const transaction: UnitOfWorkPort["transaction"] = (effect) =>
        sql.withTransaction(effect).pipe(
          Effect.tapError(() => Effect.logDebug("Transaction rolled back")),
          Effect.mapError((error) =>
            error instanceof SqlError.SqlError
              ? toPersistenceError("transaction")(error)
              : error,
          ),
        );

      return UnitOfWork.of({ transaction });
    }),
  );
}
