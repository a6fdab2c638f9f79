/**
 * @file read-models.ts
 * @module @workspace/application/models
 * @description Read models returned to API consumers
 *
 * Amounts are rendered as fixed two-digit strings so that clients never
 * round decimal values themselves.
 */

import { type Aircraft, AircraftStatusSchema } from "@workspace/domain/aircraft";
import { FlightStatusSchema } from "@workspace/domain/flight";
import {
  AircraftId,
  FlightId,
  ReferenceCodeSchema,
  ReservationId,
  UserId,
} from "@workspace/domain/kernel";
import type { Payment } from "@workspace/domain/payment";
import { loadFactor, roundToTenth, WEEKDAYS } from "@workspace/domain/reporting";
import {
  type Reservation,
  ReservationStatusSchema,
} from "@workspace/domain/reservation";
import { type User, UserRoleSchema } from "@workspace/domain/user";
import { Option, Schema } from "effect";
import type { FlightListing } from "../queries/flight-catalog.queries.js";

const Count = Schema.Number.pipe(Schema.int(), Schema.nonNegative());

// --- Flights ---

export class FlightView extends Schema.Class<FlightView>("FlightView")({
  id: FlightId,
  routeCode: Schema.String,
  origin: Schema.String,
  destination: Schema.String,
  departureAt: Schema.Date,
  arrivalAt: Schema.OptionFromNullOr(Schema.Date),
  fare: Schema.String,
  status: FlightStatusSchema,
  aircraftId: AircraftId,
  aircraftModel: Schema.String,
  capacity: Schema.Number,
  seatsBooked: Count,
  remainingSeats: Count,
  loadFactor: Schema.OptionFromNullOr(Schema.Number),
}) {
  static fromListing(listing: FlightListing): FlightView {
    const { flight, capacity, occupied } = listing;
    const usableCapacity = Option.some(capacity).pipe(
      Option.filter((c) => Number.isInteger(c) && c > 0),
    );
    return new FlightView({
      id: flight.id,
      routeCode: flight.routeCode(),
      origin: flight.origin,
      destination: flight.destination,
      departureAt: flight.departureAt,
      arrivalAt: flight.arrivalAt,
      fare: flight.fare.toFixed(),
      status: flight.status,
      aircraftId: flight.aircraftId,
      aircraftModel: listing.aircraftModel,
      capacity,
      seatsBooked: occupied,
      remainingSeats: Option.match(usableCapacity, {
        onNone: () => 0,
        onSome: (c) => Math.max(c - occupied, 0),
      }),
      loadFactor: loadFactor({ occupied, capacity: usableCapacity }).pipe(
        Option.map(roundToTenth),
      ),
    });
  }
}

export class FlightPage extends Schema.Class<FlightPage>("FlightPage")({
  flights: Schema.Array(FlightView),
  page: Schema.Number,
  limit: Schema.Number,
  hasMore: Schema.Boolean,
}) {}

// --- Reservations ---

export class ReservationView extends Schema.Class<ReservationView>(
  "ReservationView",
)({
  id: ReservationId,
  userId: UserId,
  flightId: FlightId,
  seats: Schema.Number,
  status: ReservationStatusSchema,
  unitFare: Schema.String,
  subtotal: Schema.String,
  serviceFee: Schema.String,
  total: Schema.String,
  createdAt: Schema.Date,
}) {
  static fromReservation(reservation: Reservation): ReservationView {
    return new ReservationView({
      id: reservation.id,
      userId: reservation.userId,
      flightId: reservation.flightId,
      seats: reservation.seats,
      status: reservation.status,
      unitFare: reservation.price.unitFare.toFixed(),
      subtotal: reservation.price.subtotal.toFixed(),
      serviceFee: reservation.price.serviceFee.toFixed(),
      total: reservation.price.total.toFixed(),
      createdAt: reservation.createdAt,
    });
  }
}

export class PaymentConfirmation extends Schema.Class<PaymentConfirmation>(
  "PaymentConfirmation",
)({
  reservationId: ReservationId,
  reference: ReferenceCodeSchema,
  amount: Schema.String,
  reservationStatus: ReservationStatusSchema,
  paidAt: Schema.Date,
}) {
  static of(payment: Payment, reservation: Reservation): PaymentConfirmation {
    return new PaymentConfirmation({
      reservationId: reservation.id,
      reference: payment.reference,
      amount: payment.amount.toFixed(),
      reservationStatus: reservation.status,
      paidAt: payment.paidAt,
    });
  }
}

// --- Fleet ---

export class AircraftView extends Schema.Class<AircraftView>("AircraftView")({
  id: AircraftId,
  model: Schema.String,
  capacity: Schema.Number,
  status: AircraftStatusSchema,
  airline: Schema.OptionFromNullOr(Schema.String),
  flightCount: Count,
}) {
  static of(aircraft: Aircraft, flightCount: number): AircraftView {
    return new AircraftView({
      id: aircraft.id,
      model: aircraft.model,
      capacity: aircraft.capacity,
      status: aircraft.status,
      airline: aircraft.airline,
      flightCount,
    });
  }
}

// --- Users ---

export class UserView extends Schema.Class<UserView>("UserView")({
  id: UserId,
  name: Schema.String,
  email: Schema.String,
  role: UserRoleSchema,
  status: Schema.OptionFromNullOr(Schema.String),
}) {
  static fromUser(user: User): UserView {
    return new UserView({
      id: user.id,
      name: user.name,
      email: user.email,
      role: user.role,
      status: user.status,
    });
  }
}

// --- Dashboard ---

export class DashboardOverview extends Schema.Class<DashboardOverview>(
  "DashboardOverview",
)({
  activeFlights: Count,
  pendingReservations: Count,
  totalRevenue: Schema.String,
  totalPassengers: Count,
}) {}

export class WeekdayBookings extends Schema.Class<WeekdayBookings>(
  "WeekdayBookings",
)({
  day: Schema.Literal(...WEEKDAYS),
  count: Count,
}) {}

export class FlightsSummary extends Schema.Class<FlightsSummary>(
  "FlightsSummary",
)({
  /** UTC day, `YYYY-MM-DD` */
  date: Schema.String,
  flightCount: Count,
  averageLoadFactor: Schema.Number,
  cancelledFlights: Count,
}) {}

export class RecentReservation extends Schema.Class<RecentReservation>(
  "RecentReservation",
)({
  id: ReservationId,
  passengerName: Schema.String,
  initials: Schema.String,
  routeCode: Schema.String,
  seats: Schema.Number,
  total: Schema.String,
  status: ReservationStatusSchema,
  createdAt: Schema.Date,
}) {}
