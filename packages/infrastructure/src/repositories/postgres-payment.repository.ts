import { SqlClient } from "@effect/sql";
import {
  PaymentRepository,
  type PaymentRepositoryPort,
} from "@workspace/application/payment.repository";
import {
  DuplicatePaymentError,
  PersistenceError,
} from "@workspace/domain/errors";
import { Effect, Layer, Option } from "effect";
import {
  classifyDatabaseError,
  decodeFailure,
  toPersistenceError,
} from "../errors/error-mapper.js";
import {
  type PaymentMethodRow,
  type PaymentRow,
  toPayment,
  toPaymentMethod,
} from "./mappers/payment.mapper.js";
import { AuditLogger } from "../services/audit-logger.js";

const RESERVATION_UNIQUE_CONSTRAINT = "payments_reservation_key";

/**
 * PostgreSQL implementation of the PaymentRepository.
 */
export class PostgresPaymentRepository {
  static readonly Live = Layer.effect(
    PaymentRepository,
    Effect.gen(function* () {
      const sql = yield* SqlClient.SqlClient;
      const audit = yield* AuditLogger;

      const findByReservation: PaymentRepositoryPort["findByReservation"] = (
        reservationId,
      ) =>
        sql<PaymentRow>`
          SELECT * FROM payments WHERE reservation_id = ${reservationId}
        `.pipe(
          Effect.mapError(toPersistenceError("payments.findByReservation")),
          Effect.flatMap((rows) =>
            Option.match(Option.fromNullable(rows[0]), {
              onNone: () => Effect.succeed(Option.none()),
              onSome: (row) =>
                toPayment(row).pipe(
                  Effect.map(Option.some),
                  Effect.mapError(decodeFailure("payments.findByReservation")),
                ),
            }),
          ),
        );

      const referenceExists: PaymentRepositoryPort["referenceExists"] = (
        reference,
      ) =>
        sql<{ found: boolean }>`
          SELECT EXISTS (SELECT 1 FROM payments WHERE reference = ${reference}) AS found
        `.pipe(
          Effect.map((rows) => rows[0]?.found ?? false),
          Effect.mapError(toPersistenceError("payments.referenceExists")),
        );

      // A concurrent payment for the same reservation trips the unique index
      const insert: PaymentRepositoryPort["insert"] = (payment) =>
        sql`
          INSERT INTO payments (
            id, reference, reservation_id, method_id, amount,
            settlement_reference, paid_at
          ) VALUES (
            ${payment.id},
            ${payment.reference},
            ${payment.reservationId},
            ${payment.methodId},
            ${payment.amount.toFixed()},
            ${payment.settlementReference},
            ${payment.paidAt}
          )
        `.pipe(
          Effect.mapError((error) => {
            const classified = classifyDatabaseError(error);
            return classified._tag === "DuplicateEntityError" &&
              classified.constraint === RESERVATION_UNIQUE_CONSTRAINT
              ? new DuplicatePaymentError({ reservationId: payment.reservationId })
              : toPersistenceError("payments.insert")(error);
          }),
          Effect.zipRight(
            audit.logSync({
              aggregateType: "Payment",
              aggregateId: payment.id,
              operation: "CREATE",
              changes: {
                reference: payment.reference,
                reservationId: payment.reservationId,
                amount: payment.amount.toFixed(),
              },
            }),
          ),
          Effect.as(payment),
        );

      const resolveMethod: PaymentRepositoryPort["resolveMethod"] = (label) =>
        sql<PaymentMethodRow>`
          INSERT INTO payment_methods (label)
          VALUES (${label})
          ON CONFLICT (label) DO UPDATE SET label = EXCLUDED.label
          RETURNING id, label
        `.pipe(
          Effect.mapError(toPersistenceError("payments.resolveMethod")),
          Effect.flatMap((rows) =>
            Option.match(Option.fromNullable(rows[0]), {
              onNone: () =>
                Effect.fail(
                  new PersistenceError({
                    operation: "payments.resolveMethod",
                    reason: "Write returned no row",
                  }),
                ),
              onSome: (row) =>
                toPaymentMethod(row).pipe(
                  Effect.mapError(decodeFailure("payments.resolveMethod")),
                ),
            }),
          ),
        );

      return PaymentRepository.of({
        findByReservation,
        referenceExists,
        insert,
        resolveMethod,
      });
    }),
  );
}
