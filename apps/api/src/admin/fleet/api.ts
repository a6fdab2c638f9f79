import { HttpApiEndpoint, HttpApiGroup } from "@effect/platform";
import { AircraftView, FlightView } from "@workspace/application/read-models";
import { AircraftStatusSchema } from "@workspace/domain/aircraft";
import * as Errors from "@workspace/domain/errors";
import { FlightStatusSchema } from "@workspace/domain/flight";
import { AircraftId, FlightId } from "@workspace/domain/kernel";
import { Schema } from "effect";
import { Authentication } from "../../security/authentication.js";

// --- Aircraft ---

export class CreateAircraftPayload extends Schema.Class<CreateAircraftPayload>(
  "CreateAircraftPayload",
)({
  model: Schema.String,
  capacity: Schema.Number,
  status: Schema.optional(AircraftStatusSchema),
  airline: Schema.optional(Schema.String),
}) {}

export class UpdateAircraftPayload extends Schema.Class<UpdateAircraftPayload>(
  "UpdateAircraftPayload",
)({
  model: Schema.optional(Schema.String),
  capacity: Schema.optional(Schema.Number),
  status: Schema.optional(AircraftStatusSchema),
  /** `null` clears the airline */
  airline: Schema.optional(Schema.NullOr(Schema.String)),
}) {}

const AircraftPath = Schema.Struct({ id: AircraftId });

export class AdminAircraftGroup extends HttpApiGroup.make("adminAircraft")
  .add(HttpApiEndpoint.get("list", "/").addSuccess(Schema.Array(AircraftView)))
  .add(
    HttpApiEndpoint.post("create", "/")
      .setPayload(CreateAircraftPayload)
      .addSuccess(AircraftView, { status: 201 })
      .addError(Errors.InvalidInputError, { status: 400 }),
  )
  .add(
    HttpApiEndpoint.put("update", "/:id")
      .setPath(AircraftPath)
      .setPayload(UpdateAircraftPayload)
      .addSuccess(AircraftView)
      .addError(Errors.NotFoundError, { status: 404 })
      .addError(Errors.InvalidInputError, { status: 400 })
      .addError(Errors.ConflictError, { status: 409 }),
  )
  .add(
    HttpApiEndpoint.del("delete", "/:id")
      .setPath(AircraftPath)
      .addError(Errors.NotFoundError, { status: 404 })
      .addError(Errors.ConflictError, { status: 409 }),
  )
  .addError(Errors.ForbiddenError, { status: 403 })
  .addError(Errors.PersistenceError, { status: 500 })
  .middleware(Authentication)
  .prefix("/admin/aircraft") {}

// --- Flights ---

export class CreateFlightPayload extends Schema.Class<CreateFlightPayload>(
  "CreateFlightPayload",
)({
  origin: Schema.String,
  destination: Schema.String,
  departureAt: Schema.Date,
  arrivalAt: Schema.optional(Schema.Date),
  /** Decimal amount, e.g. "149.90" */
  fare: Schema.String,
  aircraftId: AircraftId,
  status: Schema.optional(FlightStatusSchema),
}) {}

export class UpdateFlightPayload extends Schema.Class<UpdateFlightPayload>(
  "UpdateFlightPayload",
)({
  origin: Schema.optional(Schema.String),
  destination: Schema.optional(Schema.String),
  departureAt: Schema.optional(Schema.Date),
  /** `null` clears the arrival time */
  arrivalAt: Schema.optional(Schema.NullOr(Schema.Date)),
  fare: Schema.optional(Schema.String),
  aircraftId: Schema.optional(AircraftId),
  status: Schema.optional(FlightStatusSchema),
}) {}

const FlightPath = Schema.Struct({ id: FlightId });

export class AdminFlightsGroup extends HttpApiGroup.make("adminFlights")
  .add(HttpApiEndpoint.get("list", "/").addSuccess(Schema.Array(FlightView)))
  .add(
    HttpApiEndpoint.post("create", "/")
      .setPayload(CreateFlightPayload)
      .addSuccess(FlightView, { status: 201 })
      .addError(Errors.NotFoundError, { status: 404 })
      .addError(Errors.InvalidInputError, { status: 400 }),
  )
  .add(
    HttpApiEndpoint.put("update", "/:id")
      .setPath(FlightPath)
      .setPayload(UpdateFlightPayload)
      .addSuccess(FlightView)
      .addError(Errors.NotFoundError, { status: 404 })
      .addError(Errors.InvalidInputError, { status: 400 })
      .addError(Errors.ConflictError, { status: 409 }),
  )
  .add(
    HttpApiEndpoint.del("delete", "/:id")
      .setPath(FlightPath)
      .addError(Errors.NotFoundError, { status: 404 })
      .addError(Errors.ConflictError, { status: 409 }),
  )
  .addError(Errors.ForbiddenError, { status: 403 })
  .addError(Errors.PersistenceError, { status: 500 })
  .middleware(Authentication)
  .prefix("/admin/flights") {}
