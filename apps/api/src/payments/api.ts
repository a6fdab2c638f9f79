import { HttpApiEndpoint, HttpApiGroup } from "@effect/platform";
import { PaymentConfirmation } from "@workspace/application/read-models";
import * as Errors from "@workspace/domain/errors";
import { ReservationId } from "@workspace/domain/kernel";
import { Schema } from "effect";
import { Authentication } from "../security/authentication.js";

export class SettlementPayload extends Schema.Class<SettlementPayload>(
  "SettlementPayload",
)({
  /** Mobile money account the amount was collected from, 9 digits */
  settlementReference: Schema.String,
}) {}

export class PayReservationPayload extends Schema.Class<PayReservationPayload>(
  "PayReservationPayload",
)({
  reservationId: ReservationId,
  settlementReference: Schema.String,
}) {}

export class PaymentsGroup extends HttpApiGroup.make("payments")
  .add(
    HttpApiEndpoint.post("pay", "/")
      .setPayload(PayReservationPayload)
      .addSuccess(PaymentConfirmation, { status: 201 })
      .addError(Errors.NotFoundError, { status: 404 })
      .addError(Errors.InvalidInputError, { status: 400 })
      .addError(Errors.DuplicatePaymentError, { status: 409 })
      .addError(Errors.ReservationStatusError, { status: 409 })
      .addError(Errors.ConflictError, { status: 409 })
      .addError(Errors.PersistenceError, { status: 500 }),
  )
  .middleware(Authentication)
  .prefix("/payments") {}
