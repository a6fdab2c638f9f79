import { HttpApiBuilder } from "@effect/platform";
import { ReservationView } from "@workspace/application/read-models";
import { ReservationService } from "@workspace/application/reservation.service";
import { Effect } from "effect";
import { Api } from "../api.js";
import { asCurrentUser } from "../security/authentication.js";

export const ReservationsApiLive = HttpApiBuilder.group(
  Api,
  "reservations",
  (handlers) =>
    Effect.gen(function* () {
      const reservations = yield* ReservationService;

      return handlers
        .handle("create", ({ payload }) =>
          asCurrentUser((user) =>
            reservations.create({
              flightId: payload.flightId,
              userId: user.id,
              seats: payload.seats,
            }),
          ).pipe(Effect.map(ReservationView.fromReservation)),
        )
        .handle("listOwn", () =>
          asCurrentUser((user) => reservations.list({ userId: user.id })).pipe(
            Effect.map((found) => found.map(ReservationView.fromReservation)),
          ),
        )
        .handle("getOwn", ({ path }) =>
          asCurrentUser((user) => reservations.getOwned(path.id, user.id)).pipe(
            Effect.map(ReservationView.fromReservation),
          ),
        );
    }),
);
