import { HttpApiEndpoint, HttpApiGroup } from "@effect/platform";
import { Schema } from "effect";

const HealthStatus = Schema.Literal("healthy", "unhealthy");

export class HealthReport extends Schema.Class<HealthReport>("HealthReport")({
  status: HealthStatus,
  version: Schema.String,
  timestamp: Schema.DateTimeUtc,
  components: Schema.Record({
    key: Schema.String,
    value: Schema.Struct({
      status: HealthStatus,
      latency: Schema.optional(Schema.Number),
      error: Schema.optional(Schema.String),
    }),
  }),
}) {}

export class HealthGroup extends HttpApiGroup.make("health")
  .add(HttpApiEndpoint.get("check", "/").addSuccess(HealthReport))
  .prefix("/health") {}
