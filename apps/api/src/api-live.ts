import { HttpApiBuilder } from "@effect/platform";
import { Layer } from "effect";
import {
  AdminAircraftApiLive,
  AdminFlightsApiLive,
} from "./admin/fleet/api-live.js";
import { AdminReservationsApiLive } from "./admin/reservations/api-live.js";
import { AdminStatsApiLive } from "./admin/stats/api-live.js";
import { AdminUsersApiLive } from "./admin/users/api-live.js";
import { Api } from "./api.js";
import { FlightsApiLive } from "./flights/api-live.js";
import { HealthApiLive } from "./health/api-live.js";
import { PaymentsApiLive } from "./payments/api-live.js";
import { ReservationsApiLive } from "./reservations/api-live.js";
import { AuthenticationLive } from "./security/authentication.js";

const HandlersLive = Layer.mergeAll(
  FlightsApiLive,
  ReservationsApiLive,
  PaymentsApiLive,
  AdminStatsApiLive,
  AdminAircraftApiLive,
  AdminFlightsApiLive,
  AdminReservationsApiLive,
  AdminUsersApiLive,
  HealthApiLive,
);

/**
 * Every route handler plus the authentication middleware. Requires the
 * application services, the ports they expose and the health check.
 */
export const ApiLive = HttpApiBuilder.api(Api).pipe(
  Layer.provide(HandlersLive),
  Layer.provide(AuthenticationLive),
);
