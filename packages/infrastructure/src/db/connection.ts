import type { SqlClient, SqlError } from "@effect/sql";
import { PgClient } from "@effect/sql-pg";
import { DatabaseConfig } from "@workspace/config";
import { Config, type ConfigError, type Layer } from "effect";

// Main Connection Layer (Production)
// Built from the PG* variables described by DatabaseConfig
export const ConnectionPoolLive: Layer.Layer<
  SqlClient.SqlClient,
  ConfigError.ConfigError | SqlError.SqlError
> = PgClient.layerConfig(
  DatabaseConfig.pipe(
    Config.map((db) => ({
      host: db.host,
      port: db.port,
      database: db.database,
      username: db.user,
      password: db.password,
      ssl: db.ssl,
    })),
  ),
);
