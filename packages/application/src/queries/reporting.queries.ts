/**
 * @file reporting.queries.ts
 * @module @workspace/application/queries
 * @description Aggregate reads behind the back-office dashboard
 */

import type { PersistenceError } from "@workspace/domain/errors";
import type { FlightStatus } from "@workspace/domain/flight";
import type { Money } from "@workspace/domain/kernel";
import type { FlightLoad } from "@workspace/domain/reporting";
import type { ReservationStatus } from "@workspace/domain/reservation";
import { Context, type Effect } from "effect";

export interface ReportingQueriesPort {
  countFlightsByStatus(
    status: FlightStatus,
  ): Effect.Effect<number, PersistenceError>;

  /**
   * Flights whose stored status matches one of `spellings`, ignoring case.
   */
  countFlightsWithStatusIn(
    spellings: ReadonlyArray<string>,
  ): Effect.Effect<number, PersistenceError>;

  countReservationsByStatus(
    status: ReservationStatus,
  ): Effect.Effect<number, PersistenceError>;

  /** Sum of all payment amounts. */
  totalRevenue(): Effect.Effect<Money, PersistenceError>;

  /** Sum of seat counts over all reservations. */
  totalSeatsReserved(): Effect.Effect<number, PersistenceError>;

  reservationTimestampsSince(
    since: Date,
  ): Effect.Effect<ReadonlyArray<Date>, PersistenceError>;

  /**
   * Occupancy of each flight departing in [start, end).
   */
  flightLoadsBetween(
    start: Date,
    end: Date,
  ): Effect.Effect<ReadonlyArray<FlightLoad>, PersistenceError>;
}

export class ReportingQueries extends Context.Tag("ReportingQueries")<
  ReportingQueries,
  ReportingQueriesPort
>() {}
