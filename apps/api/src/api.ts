import { HttpApi } from "@effect/platform";
import { AdminAircraftGroup, AdminFlightsGroup } from "./admin/fleet/api.js";
import { AdminReservationsGroup } from "./admin/reservations/api.js";
import { AdminStatsGroup } from "./admin/stats/api.js";
import { AdminUsersGroup } from "./admin/users/api.js";
import { FlightsGroup } from "./flights/api.js";
import { HealthGroup } from "./health/api.js";
import { PaymentsGroup } from "./payments/api.js";
import { ReservationsGroup } from "./reservations/api.js";

export class Api extends HttpApi.make("Api")
  .add(FlightsGroup)
  .add(ReservationsGroup)
  .add(PaymentsGroup)
  .add(AdminStatsGroup)
  .add(AdminAircraftGroup)
  .add(AdminFlightsGroup)
  .add(AdminReservationsGroup)
  .add(AdminUsersGroup)
  .add(HealthGroup)
  .prefix("/api") {}
