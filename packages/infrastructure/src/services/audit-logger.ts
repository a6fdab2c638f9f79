import { SqlClient } from "@effect/sql";
import { Clock, Context, Effect, Layer, Option } from "effect";

export type AggregateType = "Aircraft" | "Flight" | "Reservation" | "Payment";
export type OperationType = "CREATE" | "UPDATE" | "DELETE";

export interface AuditLogParams {
  readonly aggregateType: AggregateType;
  readonly aggregateId: string;
  readonly operation: OperationType;
  readonly changes: unknown;
}

export interface AuditLoggerSignature {
  /**
   * Fire-and-forget audit log. Failures are logged but not propagated.
   */
  readonly log: (params: AuditLogParams) => Effect.Effect<void>;

  /**
   * Waits for the insert. Inside a transaction the record commits or rolls
   * back with the change it describes.
   */
  readonly logSync: (params: AuditLogParams) => Effect.Effect<void>;
}

/**
 * The acting user, provided per request by the HTTP layer.
 */
export class UserContext extends Context.Tag("UserContext")<
  UserContext,
  { readonly userId: string }
>() {}

const currentUserId = Effect.serviceOption(UserContext).pipe(
  Effect.map((context) =>
    Option.getOrNull(Option.map(context, (ctx) => ctx.userId)),
  ),
);

export class AuditLogger extends Context.Tag("AuditLogger")<
  AuditLogger,
  AuditLoggerSignature
>() {
  /**
   * Live Layer: writes to the audit_log table.
   */
  static readonly Live = Layer.effect(
    AuditLogger,
    Effect.gen(function* () {
      const sql = yield* SqlClient.SqlClient;

      const insertAuditRecord = (params: AuditLogParams, userId: string | null) =>
        Effect.gen(function* () {
          const timestamp = new Date(yield* Clock.currentTimeMillis);

          yield* sql`
            INSERT INTO audit_log (aggregate_type, aggregate_id, operation, changes, user_id, timestamp)
            VALUES (
              ${params.aggregateType},
              ${params.aggregateId},
              ${params.operation},
              ${JSON.stringify(params.changes)},
              ${userId},
              ${timestamp}
            )
          `;

          yield* Effect.logDebug("Audit record created", {
            aggregateType: params.aggregateType,
            aggregateId: params.aggregateId,
            operation: params.operation,
          });
        });

      const reportFailure = (params: AuditLogParams) => (error: unknown) =>
        Effect.logWarning("Failed to create audit record", {
          error: String(error),
          aggregateType: params.aggregateType,
          aggregateId: params.aggregateId,
        });

      return AuditLogger.of({
        log: (params) =>
          Effect.gen(function* () {
            const userId = yield* currentUserId;
            yield* insertAuditRecord(params, userId).pipe(
              Effect.catchAll(reportFailure(params)),
              Effect.forkDaemon,
            );
          }),

        logSync: (params) =>
          Effect.gen(function* () {
            const userId = yield* currentUserId;
            yield* insertAuditRecord(params, userId).pipe(
              Effect.catchAll(reportFailure(params)),
            );
          }),
      });
    }),
  );

  /**
   * Test Layer: logs at debug level unless overridden.
   */
  static readonly Test = (overrides: Partial<AuditLoggerSignature> = {}) =>
    Layer.succeed(
      AuditLogger,
      AuditLogger.of({
        log: (params) =>
          Effect.logDebug("[TEST] Audit log (fire-and-forget)", {
            aggregateType: params.aggregateType,
            aggregateId: params.aggregateId,
            operation: params.operation,
          }),

        logSync: (params) =>
          Effect.logDebug("[TEST] Audit log (sync)", {
            aggregateType: params.aggregateType,
            aggregateId: params.aggregateId,
            operation: params.operation,
          }),

        ...overrides,
      }),
    );
}
