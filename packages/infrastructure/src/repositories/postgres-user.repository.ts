import { SqlClient } from "@effect/sql";
import {
  UserRepository,
  type UserRepositoryPort,
} from "@workspace/application/user.repository";
import { UserRole } from "@workspace/domain/user";
import { Effect, Layer, Option } from "effect";
import { toPersistenceError } from "../errors/error-mapper.js";
import { toUser, type UserRow } from "./mappers/user.mapper.js";

export class PostgresUserRepository {
  static readonly Live = Layer.effect(
    UserRepository,
    Effect.gen(function* () {
      const sql = yield* SqlClient.SqlClient;

      const findById: UserRepositoryPort["findById"] = (id) =>
        sql<UserRow>`
          SELECT id, name, email, role, status FROM users WHERE id = ${id}
        `.pipe(
          Effect.map((rows) => Option.map(Option.fromNullable(rows[0]), toUser)),
          Effect.mapError(toPersistenceError("users.findById")),
        );

      // Any stored role other than "agent" reads as client
      const list: UserRepositoryPort["list"] = (filter) => {
        const conditions = [
          ...(filter.role === undefined
            ? []
            : [
                filter.role === UserRole.AGENT
                  ? sql`lower(trim(role)) = ${UserRole.AGENT}`
                  : sql`lower(trim(role)) <> ${UserRole.AGENT}`,
              ]),
          ...(filter.status === undefined
            ? []
            : [sql`lower(status) = ${filter.status.toLowerCase()}`]),
        ];
        return sql<UserRow>`
          SELECT id, name, email, role, status
          FROM users
          WHERE ${sql.and(conditions)}
          ORDER BY name ASC
        `.pipe(
          Effect.map((rows) => rows.map(toUser)),
          Effect.mapError(toPersistenceError("users.list")),
        );
      };

      return UserRepository.of({ findById, list });
    }),
  );
}
