import { HttpApiEndpoint, HttpApiGroup } from "@effect/platform";
import {
  DashboardOverview,
  FlightsSummary,
  RecentReservation,
  WeekdayBookings,
} from "@workspace/application/read-models";
import * as Errors from "@workspace/domain/errors";
import { Schema } from "effect";
import { Authentication } from "../../security/authentication.js";

const MAX_RECENT_LIMIT = 50;

export class AdminStatsGroup extends HttpApiGroup.make("adminStats")
  .add(HttpApiEndpoint.get("overview", "/overview").addSuccess(DashboardOverview))
  .add(
    HttpApiEndpoint.get("weeklyBookings", "/weekly-bookings").addSuccess(
      Schema.Array(WeekdayBookings),
    ),
  )
  .add(
    HttpApiEndpoint.get("flightsSummary", "/flights-summary")
      .setUrlParams(Schema.Struct({ date: Schema.optional(Schema.Date) }))
      .addSuccess(FlightsSummary),
  )
  .add(
    HttpApiEndpoint.get("recentReservations", "/recent-reservations")
      .setUrlParams(
        Schema.Struct({
          limit: Schema.optional(
            Schema.NumberFromString.pipe(
              Schema.int(),
              Schema.positive(),
              Schema.lessThanOrEqualTo(MAX_RECENT_LIMIT),
            ),
          ),
        }),
      )
      .addSuccess(Schema.Array(RecentReservation)),
  )
  .addError(Errors.ForbiddenError, { status: 403 })
  .addError(Errors.PersistenceError, { status: 500 })
  .middleware(Authentication)
  .prefix("/admin/stats") {}
