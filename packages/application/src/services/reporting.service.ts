/**
 * @file reporting.service.ts
 * @module @workspace/application/services
 * @description Back-office dashboard rollups. Read-only.
 */

import type { PersistenceError } from "@workspace/domain/errors";
import {
  CANCELLED_FLIGHT_STATUS_SYNONYMS,
  FlightStatus,
} from "@workspace/domain/flight";
import {
  averageLoadFactor,
  bucketByWeekday,
  trailingWindowStart,
  utcDayRange,
} from "@workspace/domain/reporting";
import { ReservationStatus } from "@workspace/domain/reservation";
import { Clock, Context, Effect, Layer, Option } from "effect";
import {
  DashboardOverview,
  FlightsSummary,
  RecentReservation,
  WeekdayBookings,
} from "../models/read-models.js";
import { ReportingQueries } from "../queries/reporting.queries.js";
import { FlightRepository } from "../repositories/flight.repository.js";
import { ReservationRepository } from "../repositories/reservation.repository.js";
import { UserRepository } from "../repositories/user.repository.js";

export const DEFAULT_RECENT_LIMIT = 5;

export interface ReportingServiceSignature {
  readonly overview: () => Effect.Effect<DashboardOverview, PersistenceError>;

  /** Reservations of the trailing seven days per UTC weekday, Mon..Sun. */
  readonly weeklyBookings: (
    now?: Date,
  ) => Effect.Effect<ReadonlyArray<WeekdayBookings>, PersistenceError>;

  /**
   * Flights departing on the UTC day of `date` (today by default). The
   * cancelled count covers every day.
   */
  readonly flightsSummary: (
    date?: Date,
  ) => Effect.Effect<FlightsSummary, PersistenceError>;

  readonly recentReservations: (
    limit?: number,
  ) => Effect.Effect<ReadonlyArray<RecentReservation>, PersistenceError>;
}

const currentDate = Clock.currentTimeMillis.pipe(
  Effect.map((millis) => new Date(millis)),
);

export class ReportingService extends Context.Tag("ReportingService")<
  ReportingService,
  ReportingServiceSignature
>() {
  static readonly Live = Layer.effect(
    ReportingService,
    Effect.gen(function* () {
      const queries = yield* ReportingQueries;
      const reservations = yield* ReservationRepository;
      const flights = yield* FlightRepository;
      const users = yield* UserRepository;

      return ReportingService.of({
        overview: () =>
          Effect.all(
            {
              activeFlights: queries.countFlightsByStatus(FlightStatus.ACTIVE),
              pendingReservations: queries.countReservationsByStatus(
                ReservationStatus.PENDING,
              ),
              totalRevenue: queries.totalRevenue(),
              totalPassengers: queries.totalSeatsReserved(),
            },
            { concurrency: "unbounded" },
          ).pipe(
            Effect.map(
              (totals) =>
                new DashboardOverview({
                  ...totals,
                  totalRevenue: totals.totalRevenue.toFixed(),
                }),
            ),
          ),

        weeklyBookings: (now) =>
          Effect.gen(function* () {
            const end = now ?? (yield* currentDate);
            const timestamps = yield* queries.reservationTimestampsSince(
              trailingWindowStart(end),
            );
            return bucketByWeekday(timestamps).map(
              (bucket) => new WeekdayBookings(bucket),
            );
          }),

        flightsSummary: (date) =>
          Effect.gen(function* () {
            const day = date ?? (yield* currentDate);
            const [start, end] = utcDayRange(day);
            const [loads, cancelledFlights] = yield* Effect.all(
              [
                queries.flightLoadsBetween(start, end),
                queries.countFlightsWithStatusIn(CANCELLED_FLIGHT_STATUS_SYNONYMS),
              ],
              { concurrency: "unbounded" },
            );
            return new FlightsSummary({
              date: start.toISOString().slice(0, 10),
              flightCount: loads.length,
              averageLoadFactor: averageLoadFactor(loads),
              cancelledFlights,
            });
          }),

        recentReservations: (limit = DEFAULT_RECENT_LIMIT) =>
          Effect.gen(function* () {
            const latest = yield* reservations.list({ limit });
            return yield* Effect.forEach(latest, (reservation) =>
              Effect.gen(function* () {
                const owner = yield* users.findById(reservation.userId);
                const flight = yield* flights.findById(reservation.flightId);
                const passengerName = Option.match(owner, {
                  onNone: () => "Unknown passenger",
                  onSome: (user) => user.name,
                });
                return new RecentReservation({
                  id: reservation.id,
                  passengerName,
                  initials: Option.match(owner, {
                    onNone: () => "?",
                    onSome: (user) => user.initials(),
                  }),
                  routeCode: Option.match(flight, {
                    onNone: () => "-",
                    onSome: (f) => f.routeCode(),
                  }),
                  seats: reservation.seats,
                  total: reservation.price.total.toFixed(),
                  status: reservation.status,
                  createdAt: reservation.createdAt,
                });
              }),
            );
          }),
      });
    }),
  );
}
