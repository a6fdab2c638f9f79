#!/usr/bin/env tsx
/**
 * Applies the drizzle-kit migrations in ./drizzle
 */

import "dotenv/config";
import { NodeRuntime } from "@effect/platform-node";
import { Effect } from "effect";
import { DrizzleMigrator } from "../src/db/drizzle-migrator.js";

const program = Effect.gen(function* () {
  const migrator = yield* DrizzleMigrator;
  yield* migrator.run;
}).pipe(
  Effect.tapErrorTag("MigrationError", (error) =>
    Effect.logError("Migration failed", { reason: error.message }),
  ),
  Effect.provide(DrizzleMigrator.Default),
);

NodeRuntime.runMain(program);
