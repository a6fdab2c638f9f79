import { HttpApiBuilder } from "@effect/platform";
import { ReportingService } from "@workspace/application/reporting.service";
import { Effect } from "effect";
import { Api } from "../../api.js";
import { asAgent } from "../../security/authentication.js";

export const AdminStatsApiLive = HttpApiBuilder.group(
  Api,
  "adminStats",
  (handlers) =>
    Effect.gen(function* () {
      const reporting = yield* ReportingService;

      return handlers
        .handle("overview", () => asAgent(() => reporting.overview()))
        .handle("weeklyBookings", () =>
          asAgent(() => reporting.weeklyBookings()),
        )
        .handle("flightsSummary", ({ urlParams }) =>
          asAgent(() => reporting.flightsSummary(urlParams.date)),
        )
        .handle("recentReservations", ({ urlParams }) =>
          asAgent(() => reporting.recentReservations(urlParams.limit)),
        );
    }),
);
