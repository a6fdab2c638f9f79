import "dotenv/config";
import { createServer } from "node:http";
import { HttpApiBuilder, HttpMiddleware } from "@effect/platform";
import {
  NodeContext,
  NodeHttpServer,
  NodeRuntime,
} from "@effect/platform-node";
import { ApplicationLive } from "@workspace/application/layers";
import { AppConfig, redactSensitiveConfig } from "@workspace/config";
import { InfrastructureLive } from "@workspace/infrastructure";
import { ConfigProvider, Effect, Layer } from "effect";
import { ApiLive } from "./api-live.js";

// ============================================================================
// Layer Hierarchy
// ============================================================================

/**
 * 1. Adapters (Postgres, Resend, token verification, audit, health)
 */
const InfraLive = Layer.mergeAll(InfrastructureLive, NodeContext.layer);

/**
 * 2. Application services over the adapters; the ports stay visible to
 *    the handlers that read through them.
 */
const AppServicesLive = ApplicationLive.pipe(Layer.provideMerge(InfraLive));

// ============================================================================
// HTTP Layer
// ============================================================================

const ServerLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const app = yield* AppConfig;
    const config = app.api;
    yield* Effect.logInfo("Configuration loaded", redactSensitiveConfig(app));
    yield* Effect.logInfo("Starting HTTP server", {
      port: config.port,
      environment: config.nodeEnv,
    });
    return HttpApiBuilder.serve(
      HttpMiddleware.cors({
        allowedOrigins: config.corsOrigins,
        allowedMethods: ["GET", "POST", "PUT", "DELETE"],
        allowedHeaders: ["Content-Type", "Authorization"],
      }),
    ).pipe(
      Layer.provide(ApiLive),
      Layer.provide(NodeHttpServer.layer(createServer, { port: config.port })),
    );
  }),
).pipe(Layer.provide(AppServicesLive));

const MainLive = ServerLive.pipe(
  Layer.provide(Layer.setConfigProvider(ConfigProvider.fromEnv())),
);

const program = Layer.launch(MainLive).pipe(
  Effect.catchAllCause((cause) =>
    Effect.logFatal("Fatal error in main program", cause).pipe(
      Effect.flatMap(() => Effect.failCause(cause)),
    ),
  ),
  Effect.onInterrupt(() => Effect.logInfo("Shutting down backend")),
);

NodeRuntime.runMain(program);
