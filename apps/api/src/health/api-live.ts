import { HttpApiBuilder } from "@effect/platform";
import { HealthCheck } from "@workspace/infrastructure/health-check";
import { DateTime, Effect } from "effect";
import { Api } from "../api.js";
import { HealthReport } from "./api.js";

type ComponentReport = HealthReport["components"][string];

export const HealthApiLive = HttpApiBuilder.group(Api, "health", (handlers) =>
  handlers.handle("check", () =>
    Effect.gen(function* () {
      const health = yield* HealthCheck;
      const result = yield* health.check();

      const components: Record<string, ComponentReport> = {};
      for (const c of result.components) {
        components[c.name] = {
          status: c.status,
          latency: c.latencyMs,
          error: c.message,
        };
      }

      return new HealthReport({
        status: result.status,
        version: result.version,
        timestamp: DateTime.unsafeMake(result.timestamp),
        components,
      });
    }),
  ),
);
