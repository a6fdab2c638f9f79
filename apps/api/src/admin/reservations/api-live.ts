import { HttpApiBuilder } from "@effect/platform";
import { PaymentService } from "@workspace/application/payment.service";
import {
  PaymentConfirmation,
  ReservationView,
} from "@workspace/application/read-models";
import { ReservationService } from "@workspace/application/reservation.service";
import { Effect, Option } from "effect";
import { Api } from "../../api.js";
import { asAgent } from "../../security/authentication.js";

export const AdminReservationsApiLive = HttpApiBuilder.group(
  Api,
  "adminReservations",
  (handlers) =>
    Effect.gen(function* () {
      const reservations = yield* ReservationService;
      const payments = yield* PaymentService;

      const view = Effect.map(ReservationView.fromReservation);

      return handlers
        .handle("list", ({ urlParams }) =>
          asAgent(() => reservations.list(urlParams)).pipe(
            Effect.map((found) => found.map(ReservationView.fromReservation)),
          ),
        )
        .handle("get", ({ path }) =>
          asAgent(() => reservations.get(path.id)).pipe(view),
        )
        .handle("create", ({ payload }) =>
          asAgent(() => reservations.create(payload)).pipe(view),
        )
        .handle("amend", ({ path, payload }) =>
          asAgent(() =>
            reservations.amend({
              reservationId: path.id,
              seats: Option.fromNullable(payload.seats),
              status: Option.fromNullable(payload.status),
            }),
          ).pipe(view),
        )
        .handle("delete", ({ path }) =>
          asAgent(() => reservations.remove(path.id)),
        )
        .handle("confirm", ({ path }) =>
          asAgent(() => reservations.confirm(path.id)).pipe(view),
        )
        .handle("cancel", ({ path }) =>
          asAgent(() => reservations.cancel(path.id)).pipe(view),
        )
        .handle("pay", ({ path, payload }) =>
          asAgent(() =>
            payments.pay({
              reservationId: path.id,
              settlementReference: payload.settlementReference,
              payer: Option.none(),
            }),
          ).pipe(
            Effect.map((outcome) =>
              PaymentConfirmation.of(outcome.payment, outcome.reservation),
            ),
          ),
        );
    }),
);
