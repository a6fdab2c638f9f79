import {
  HttpApiBuilder,
  HttpApiClient,
  HttpClient,
  HttpClientRequest,
} from "@effect/platform";
import { NodeHttpServer } from "@effect/platform-node";
import {
  makeTestLayer,
  type TestLayerOptions,
} from "@workspace/application/testing";
import {
  HealthCheck,
  type HealthCheckResult,
} from "@workspace/infrastructure/health-check";
import { Effect, Layer } from "effect";
import { Api } from "../api.js";
import { ApiLive } from "../api-live.js";

export const HEALTHY: HealthCheckResult = {
  status: "healthy",
  version: "0.1.0-test",
  components: [{ name: "database", status: "healthy", latencyMs: 3 }],
  timestamp: new Date("2026-10-19T12:00:00Z"),
};

const HealthCheckStub = Layer.succeed(
  HealthCheck,
  HealthCheck.of({
    check: () => Effect.succeed(HEALTHY),
    checkFresh: () => Effect.succeed(HEALTHY),
  }),
);

/**
 * The full API over in-memory ports, served on an ephemeral port. The
 * in-memory store and an HTTP client bound to the server are exposed.
 */
export const makeTestServer = (options: TestLayerOptions = {}) =>
  HttpApiBuilder.serve().pipe(
    Layer.provide(ApiLive),
    Layer.provideMerge(Layer.merge(makeTestLayer(options), HealthCheckStub)),
    Layer.provideMerge(NodeHttpServer.layerTest),
  );

export type TestServer = Layer.Layer.Success<ReturnType<typeof makeTestServer>>;

export const clientFor = (credential?: string) =>
  HttpApiClient.make(Api, {
    transformClient:
      credential === undefined
        ? undefined
        : HttpClient.mapRequest(HttpClientRequest.bearerToken(credential)),
  });

export const runWithServer = <A, E>(
  options: TestLayerOptions,
  program: Effect.Effect<A, E, TestServer>,
) => Effect.runPromise(program.pipe(Effect.provide(makeTestServer(options))));
