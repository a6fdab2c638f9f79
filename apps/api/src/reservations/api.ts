import { HttpApiEndpoint, HttpApiGroup } from "@effect/platform";
import { ReservationView } from "@workspace/application/read-models";
import * as Errors from "@workspace/domain/errors";
import { FlightId, ReservationId } from "@workspace/domain/kernel";
import { Schema } from "effect";
import { Authentication } from "../security/authentication.js";

export class BookSeatsPayload extends Schema.Class<BookSeatsPayload>(
  "BookSeatsPayload",
)({
  flightId: FlightId,
  seats: Schema.Number,
}) {}

export class ReservationsGroup extends HttpApiGroup.make("reservations")
  .add(
    HttpApiEndpoint.post("create", "/")
      .setPayload(BookSeatsPayload)
      .addSuccess(ReservationView, { status: 201 })
      .addError(Errors.NotFoundError, { status: 404 })
      .addError(Errors.InvalidInputError, { status: 400 })
      .addError(Errors.CapacityExceededError, { status: 409 })
      .addError(Errors.ConflictError, { status: 409 }),
  )
  .add(
    HttpApiEndpoint.get("listOwn", "/").addSuccess(
      Schema.Array(ReservationView),
    ),
  )
  .add(
    HttpApiEndpoint.get("getOwn", "/:id")
      .setPath(Schema.Struct({ id: ReservationId }))
      .addSuccess(ReservationView)
      .addError(Errors.NotFoundError, { status: 404 }),
  )
  .addError(Errors.PersistenceError, { status: 500 })
  .middleware(Authentication)
  .prefix("/reservations") {}
