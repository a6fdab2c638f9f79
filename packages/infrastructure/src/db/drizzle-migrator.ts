import { fileURLToPath } from "node:url";
import { DatabaseConfig } from "@workspace/config";
import { drizzle } from "drizzle-orm/node-postgres";
import { migrate } from "drizzle-orm/node-postgres/migrator";
import { Data, Effect, Redacted } from "effect";
import { Pool } from "pg";

export class MigrationError extends Data.TaggedError("MigrationError")<{
  readonly message: string;
  readonly cause: unknown;
}> {}

// Generated by drizzle-kit from src/db/schema.ts
const MIGRATIONS_FOLDER = fileURLToPath(new URL("../../drizzle", import.meta.url));

export class DrizzleMigrator extends Effect.Service<DrizzleMigrator>()(
  "DrizzleMigrator",
  {
    effect: Effect.gen(function* () {
      const config = yield* DatabaseConfig;

      const acquire = Effect.sync(
        () =>
          new Pool({
            host: config.host,
            port: config.port,
            user: config.user,
            password: Redacted.value(config.password),
            database: config.database,
            ssl: config.ssl,
          }),
      );

      const use = (pool: Pool) =>
        Effect.gen(function* () {
          const db = drizzle(pool);
          yield* Effect.tryPromise({
            try: () => migrate(db, { migrationsFolder: MIGRATIONS_FOLDER }),
            catch: (error) =>
              new MigrationError({
                message: error instanceof Error ? error.message : String(error),
                cause: error,
              }),
          });
          yield* Effect.logInfo("Drizzle migrations applied successfully");
        });

      const release = (pool: Pool) => Effect.promise(() => pool.end());

      return {
        run: Effect.acquireUseRelease(acquire, use, release),
      };
    }),
  },
) {}
