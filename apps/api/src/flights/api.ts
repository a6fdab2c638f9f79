import { HttpApiEndpoint, HttpApiGroup } from "@effect/platform";
import {
  FlightSort,
  MAX_PAGE_SIZE,
} from "@workspace/application/flight-catalog.queries";
import { FlightPage, FlightView } from "@workspace/application/read-models";
import * as Errors from "@workspace/domain/errors";
import { FlightId } from "@workspace/domain/kernel";
import { Schema } from "effect";

const PositiveInt = Schema.NumberFromString.pipe(
  Schema.int(),
  Schema.positive(),
);

export const FlightSearchParams = Schema.Struct({
  origin: Schema.optional(Schema.String),
  destination: Schema.optional(Schema.String),
  /** Any instant of the wanted UTC day, e.g. `2026-03-14` */
  date: Schema.optional(Schema.Date),
  sort: Schema.optional(FlightSort),
  page: Schema.optional(PositiveInt),
  limit: Schema.optional(
    PositiveInt.pipe(Schema.lessThanOrEqualTo(MAX_PAGE_SIZE)),
  ),
});

export class FlightsGroup extends HttpApiGroup.make("flights")
  .add(
    HttpApiEndpoint.get("search", "/")
      .setUrlParams(FlightSearchParams)
      .addSuccess(FlightPage)
      .addError(Errors.InvalidInputError, { status: 400 }),
  )
  .add(
    HttpApiEndpoint.get("get", "/:id")
      .setPath(Schema.Struct({ id: FlightId }))
      .addSuccess(FlightView)
      .addError(Errors.NotFoundError, { status: 404 }),
  )
  .addError(Errors.PersistenceError, { status: 500 })
  .prefix("/flights") {}
