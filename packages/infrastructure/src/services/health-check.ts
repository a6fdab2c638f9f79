import { SqlClient } from "@effect/sql";
import { HealthConfig } from "@workspace/config";
import { Clock, Context, Duration, Effect, Layer, Option, Ref } from "effect";

export type HealthStatus = "healthy" | "unhealthy";

export interface ComponentHealth {
  readonly name: string;
  readonly status: HealthStatus;
  readonly message?: string;
  readonly latencyMs?: number;
}

export interface HealthCheckResult {
  readonly status: HealthStatus;
  readonly version: string;
  readonly components: ReadonlyArray<ComponentHealth>;
  readonly timestamp: Date;
}

export interface HealthCheckSignature {
  /**
   * Checks every component. Returns the cached result within the cache TTL.
   */
  readonly check: () => Effect.Effect<HealthCheckResult>;

  /**
   * Forces a fresh check, bypassing the cache.
   */
  readonly checkFresh: () => Effect.Effect<HealthCheckResult>;
}

export class HealthCheck extends Context.Tag("HealthCheck")<
  HealthCheck,
  HealthCheckSignature
>() {
  /**
   * Live Layer: probes the database. Requires SqlClient.
   */
  static readonly Live = Layer.effect(
    HealthCheck,
    Effect.gen(function* () {
      const sql = yield* SqlClient.SqlClient;
      const config = yield* HealthConfig;

      const cacheRef = yield* Ref.make<
        Option.Option<{ result: HealthCheckResult; cachedAt: number }>
      >(Option.none());

      const checkDatabase: Effect.Effect<ComponentHealth> = Effect.gen(
        function* () {
          const startTime = yield* Clock.currentTimeMillis;
          yield* sql`SELECT 1 as health_check`;
          const latencyMs = (yield* Clock.currentTimeMillis) - startTime;

          return {
            name: "database",
            status: "healthy" as const,
            latencyMs,
          };
        },
      ).pipe(
        Effect.catchAll((error) =>
          Effect.logError("Health check failed for database", {
            error: String(error),
          }).pipe(
            Effect.as({
              name: "database",
              status: "unhealthy" as const,
              message: "database unavailable",
            }),
          ),
        ),
      );

      const performHealthChecks: Effect.Effect<HealthCheckResult> = Effect.gen(
        function* () {
          const components = [yield* checkDatabase];
          const status: HealthStatus = components.some(
            (c) => c.status === "unhealthy",
          )
            ? "unhealthy"
            : "healthy";

          return {
            status,
            version: config.version,
            components,
            timestamp: new Date(yield* Clock.currentTimeMillis),
          };
        },
      ).pipe(
        Effect.timeoutTo({
          duration: Duration.seconds(config.timeout),
          onSuccess: Effect.succeed,
          onTimeout: () =>
            Effect.map(Clock.currentTimeMillis, (now) => ({
              status: "unhealthy" as const,
              version: config.version,
              components: [
                {
                  name: "timeout",
                  status: "unhealthy" as const,
                  message: `Health check timed out after ${config.timeout}s`,
                },
              ],
              timestamp: new Date(now),
            })),
        }),
        Effect.flatten,
      );

      const refresh = Effect.gen(function* () {
        const result = yield* performHealthChecks;
        const cachedAt = yield* Clock.currentTimeMillis;
        yield* Ref.set(cacheRef, Option.some({ result, cachedAt }));
        return result;
      });

      return HealthCheck.of({
        check: () =>
          Effect.gen(function* () {
            const cached = yield* Ref.get(cacheRef);
            const now = yield* Clock.currentTimeMillis;

            if (
              Option.isSome(cached) &&
              now - cached.value.cachedAt < config.cacheTTL * 1000
            ) {
              return cached.value.result;
            }

            return yield* refresh;
          }),

        checkFresh: () => refresh,
      });
    }),
  );
}
