import {
  PaymentId,
  PaymentMethodId,
  ReferenceCodeSchema,
  ReservationId,
  SettlementReferenceSchema,
} from "@workspace/domain/kernel";
import { Payment, PaymentMethod } from "@workspace/domain/payment";
import { Effect } from "effect";
import type { RowDecodeError } from "../../errors.js";
import { construct, decodeMoney } from "./row-decoding.js";

export interface PaymentRow {
  readonly id: string;
  readonly reference: string;
  readonly reservation_id: string;
  readonly method_id: string;
  readonly amount: string;
  readonly settlement_reference: string;
  readonly paid_at: Date;
}

export interface PaymentMethodRow {
  readonly id: string;
  readonly label: string;
}

export const toPayment = (
  row: PaymentRow,
): Effect.Effect<Payment, RowDecodeError> =>
  Effect.gen(function* () {
    const ref = { table: "payments", id: row.id };
    const amount = yield* decodeMoney(row.amount, ref, "amount");
    return yield* construct(
      ref,
      () =>
        new Payment({
          id: PaymentId.make(row.id),
          reference: ReferenceCodeSchema.make(row.reference),
          reservationId: ReservationId.make(row.reservation_id),
          methodId: PaymentMethodId.make(row.method_id),
          amount,
          settlementReference: SettlementReferenceSchema.make(
            row.settlement_reference,
          ),
          paidAt: row.paid_at,
        }),
    );
  });

export const toPaymentMethod = (
  row: PaymentMethodRow,
): Effect.Effect<PaymentMethod, RowDecodeError> =>
  construct(
    { table: "payment_methods", id: row.id },
    () =>
      new PaymentMethod({
        id: PaymentMethodId.make(row.id),
        label: row.label,
      }),
  );
