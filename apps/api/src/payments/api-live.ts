import { HttpApiBuilder } from "@effect/platform";
import { PaymentService } from "@workspace/application/payment.service";
import { PaymentConfirmation } from "@workspace/application/read-models";
import { Effect, Option } from "effect";
import { Api } from "../api.js";
import { asCurrentUser } from "../security/authentication.js";

export const PaymentsApiLive = HttpApiBuilder.group(Api, "payments", (handlers) =>
  handlers.handle("pay", ({ payload }) =>
    Effect.gen(function* () {
      const payments = yield* PaymentService;
      const outcome = yield* asCurrentUser((user) =>
        payments.pay({
          reservationId: payload.reservationId,
          settlementReference: payload.settlementReference,
          payer: Option.some(user.id),
        }),
      );
      return PaymentConfirmation.of(outcome.payment, outcome.reservation);
    }),
  ),
);
