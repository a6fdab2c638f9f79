import { HttpApiBuilder } from "@effect/platform";
import { FleetService } from "@workspace/application/fleet.service";
import { FlightCatalogQueries } from "@workspace/application/flight-catalog.queries";
import { AircraftView, FlightView } from "@workspace/application/read-models";
import type { Aircraft } from "@workspace/domain/aircraft";
import { NotFoundError } from "@workspace/domain/errors";
import type { Flight } from "@workspace/domain/flight";
import { Effect, Option } from "effect";
import { Api } from "../../api.js";
import { asAgent } from "../../security/authentication.js";

// Absent keys leave a field untouched; `null` clears it
const clearable = <A>(value: A | null | undefined) =>
  value === undefined ? undefined : Option.fromNullable(value);

export const AdminAircraftApiLive = HttpApiBuilder.group(
  Api,
  "adminAircraft",
  (handlers) =>
    Effect.gen(function* () {
      const fleet = yield* FleetService;

      const withUsage = (aircraft: Aircraft) =>
        fleet.listAircraft().pipe(
          Effect.map((usages) => {
            const usage = usages.find((u) => u.aircraft.id === aircraft.id);
            return AircraftView.of(aircraft, usage?.flightCount ?? 0);
          }),
        );

      return handlers
        .handle("list", () =>
          asAgent(() => fleet.listAircraft()).pipe(
            Effect.map((usages) =>
              usages.map((u) => AircraftView.of(u.aircraft, u.flightCount)),
            ),
          ),
        )
        .handle("create", ({ payload }) =>
          asAgent(() => fleet.createAircraft(payload)).pipe(
            Effect.map((aircraft) => AircraftView.of(aircraft, 0)),
          ),
        )
        .handle("update", ({ path, payload }) =>
          asAgent(() =>
            fleet.updateAircraft(path.id, {
              model: payload.model,
              capacity: payload.capacity,
              status: payload.status,
              airline: clearable(payload.airline),
            }),
          ).pipe(Effect.flatMap(withUsage)),
        )
        .handle("delete", ({ path }) =>
          asAgent(() => fleet.deleteAircraft(path.id)),
        );
    }),
);

export const AdminFlightsApiLive = HttpApiBuilder.group(
  Api,
  "adminFlights",
  (handlers) =>
    Effect.gen(function* () {
      const fleet = yield* FleetService;
      const catalog = yield* FlightCatalogQueries;

      const toView = (flight: Flight) =>
        catalog.findListing(flight.id).pipe(
          Effect.flatMap((found) =>
            Option.match(found, {
              onNone: () =>
                Effect.fail(new NotFoundError({ entity: "Flight", id: flight.id })),
              onSome: (listing) => Effect.succeed(FlightView.fromListing(listing)),
            }),
          ),
        );

      return handlers
        .handle("list", () =>
          asAgent(() => catalog.board()).pipe(
            Effect.map((listings) => listings.map(FlightView.fromListing)),
          ),
        )
        .handle("create", ({ payload }) =>
          asAgent(() => fleet.createFlight(payload)).pipe(
            Effect.flatMap(toView),
          ),
        )
        .handle("update", ({ path, payload }) =>
          asAgent(() =>
            fleet.updateFlight(path.id, {
              ...payload,
              arrivalAt: clearable(payload.arrivalAt),
            }),
          ).pipe(Effect.flatMap(toView)),
        )
        .handle("delete", ({ path }) =>
          asAgent(() => fleet.deleteFlight(path.id)),
        );
    }),
);
