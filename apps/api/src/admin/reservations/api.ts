import { HttpApiEndpoint, HttpApiGroup } from "@effect/platform";
import {
  PaymentConfirmation,
  ReservationView,
} from "@workspace/application/read-models";
import * as Errors from "@workspace/domain/errors";
import { FlightId, ReservationId, UserId } from "@workspace/domain/kernel";
import { ReservationStatusSchema } from "@workspace/domain/reservation";
import { Schema } from "effect";
import { SettlementPayload } from "../../payments/api.js";
import { Authentication } from "../../security/authentication.js";

export class BookOnBehalfPayload extends Schema.Class<BookOnBehalfPayload>(
  "BookOnBehalfPayload",
)({
  flightId: FlightId,
  userId: UserId,
  seats: Schema.Number,
}) {}

export class AmendReservationPayload extends Schema.Class<AmendReservationPayload>(
  "AmendReservationPayload",
)({
  seats: Schema.optional(Schema.Number),
  status: Schema.optional(ReservationStatusSchema),
}) {}

export const ReservationListParams = Schema.Struct({
  status: Schema.optional(ReservationStatusSchema),
  flightId: Schema.optional(FlightId),
  userId: Schema.optional(UserId),
  limit: Schema.optional(
    Schema.NumberFromString.pipe(Schema.int(), Schema.positive()),
  ),
});

const ReservationPath = Schema.Struct({ id: ReservationId });

export class AdminReservationsGroup extends HttpApiGroup.make(
  "adminReservations",
)
  .add(
    HttpApiEndpoint.get("list", "/")
      .setUrlParams(ReservationListParams)
      .addSuccess(Schema.Array(ReservationView)),
  )
  .add(
    HttpApiEndpoint.get("get", "/:id")
      .setPath(ReservationPath)
      .addSuccess(ReservationView)
      .addError(Errors.NotFoundError, { status: 404 }),
  )
  .add(
    HttpApiEndpoint.post("create", "/")
      .setPayload(BookOnBehalfPayload)
      .addSuccess(ReservationView, { status: 201 })
      .addError(Errors.NotFoundError, { status: 404 })
      .addError(Errors.InvalidInputError, { status: 400 })
      .addError(Errors.CapacityExceededError, { status: 409 })
      .addError(Errors.ConflictError, { status: 409 }),
  )
  .add(
    HttpApiEndpoint.put("amend", "/:id")
      .setPath(ReservationPath)
      .setPayload(AmendReservationPayload)
      .addSuccess(ReservationView)
      .addError(Errors.NotFoundError, { status: 404 })
      .addError(Errors.InvalidInputError, { status: 400 })
      .addError(Errors.CapacityExceededError, { status: 409 })
      .addError(Errors.ReservationStatusError, { status: 409 })
      .addError(Errors.ConflictError, { status: 409 }),
  )
  .add(
    HttpApiEndpoint.del("delete", "/:id")
      .setPath(ReservationPath)
      .addError(Errors.NotFoundError, { status: 404 }),
  )
  .add(
    HttpApiEndpoint.post("confirm", "/:id/confirm")
      .setPath(ReservationPath)
      .addSuccess(ReservationView)
      .addError(Errors.NotFoundError, { status: 404 })
      .addError(Errors.ReservationStatusError, { status: 409 })
      .addError(Errors.ConflictError, { status: 409 }),
  )
  .add(
    HttpApiEndpoint.post("cancel", "/:id/cancel")
      .setPath(ReservationPath)
      .addSuccess(ReservationView)
      .addError(Errors.NotFoundError, { status: 404 })
      .addError(Errors.ConflictError, { status: 409 }),
  )
  .add(
    HttpApiEndpoint.post("pay", "/:id/pay")
      .setPath(ReservationPath)
      .setPayload(SettlementPayload)
      .addSuccess(PaymentConfirmation, { status: 201 })
      .addError(Errors.NotFoundError, { status: 404 })
      .addError(Errors.InvalidInputError, { status: 400 })
      .addError(Errors.DuplicatePaymentError, { status: 409 })
      .addError(Errors.ReservationStatusError, { status: 409 })
      .addError(Errors.ConflictError, { status: 409 }),
  )
  .addError(Errors.ForbiddenError, { status: 403 })
  .addError(Errors.PersistenceError, { status: 500 })
  .middleware(Authentication)
  .prefix("/admin/reservations") {}
