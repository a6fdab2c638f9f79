import { faker } from "@faker-js/faker";
import { Aircraft, type AircraftStatus } from "@workspace/domain/aircraft";
import { Flight, type FlightStatus } from "@workspace/domain/flight";
import {
  makeAircraftId,
  makeFlightId,
  makeReservationId,
  makeUserId,
  Money,
} from "@workspace/domain/kernel";
import { PriceBreakdown } from "@workspace/domain/pricing";
import { Reservation, type ReservationStatus } from "@workspace/domain/reservation";
import { User, type UserRole } from "@workspace/domain/user";
import { Option } from "effect";

export const money = (amount: string): Money => Option.getOrThrow(Money.parse(amount));

export interface CreateTestAircraftOptions {
  readonly id?: string;
  readonly model?: string;
  readonly capacity?: number;
  readonly status?: AircraftStatus;
  readonly airline?: string;
}

export const createTestAircraft = ({
  id = "aircraft-1",
  model = "ATR 72-600",
  capacity = 10,
  status = "available",
  airline,
}: CreateTestAircraftOptions = {}): Aircraft =>
  new Aircraft({
    id: makeAircraftId(id),
    model,
    capacity,
    status,
    airline: Option.fromNullable(airline),
  });

export interface CreateTestFlightOptions {
  readonly id?: string;
  readonly aircraftId?: string;
  readonly origin?: string;
  readonly destination?: string;
  readonly departureAt?: Date;
  readonly arrivalAt?: Date;
  readonly fare?: string;
  readonly status?: FlightStatus;
  readonly ledgerVersion?: number;
}

export const createTestFlight = ({
  id = "flight-1",
  aircraftId = "aircraft-1",
  origin = "Goma",
  destination = "Kinshasa",
  departureAt = new Date("2026-11-02T08:00:00Z"),
  arrivalAt,
  fare = "100.00",
  status = "active",
  ledgerVersion = 0,
}: CreateTestFlightOptions = {}): Flight =>
  new Flight({
    id: makeFlightId(id),
    origin,
    destination,
    departureAt,
    arrivalAt: Option.fromNullable(arrivalAt),
    fare: money(fare),
    status,
    aircraftId: makeAircraftId(aircraftId),
    ledgerVersion,
  });

export interface CreateTestUserOptions {
  readonly id?: string;
  readonly name?: string;
  readonly email?: string;
  readonly role?: UserRole;
  readonly status?: string;
}

export const createTestUser = ({
  id = "user-1",
  name = faker.person.fullName(),
  email = faker.internet.email(),
  role = "client",
  status,
}: CreateTestUserOptions = {}): User =>
  new User({
    id: makeUserId(id),
    name,
    email,
    role,
    status: Option.fromNullable(status),
  });

export interface CreateTestReservationOptions {
  readonly id?: string;
  readonly userId?: string;
  readonly flightId?: string;
  readonly seats?: number;
  readonly fare?: string;
  readonly serviceFee?: string;
  readonly status?: ReservationStatus;
  readonly createdAt?: Date;
  readonly version?: number;
}

export const createTestReservation = ({
  id = faker.string.uuid(),
  userId = "user-1",
  flightId = "flight-1",
  seats = 1,
  fare = "100.00",
  serviceFee = "12.50",
  status = "PENDING",
  createdAt = new Date("2026-10-12T09:00:00Z"),
  version = 1,
}: CreateTestReservationOptions = {}): Reservation =>
  new Reservation({
    id: makeReservationId(id),
    userId: makeUserId(userId),
    flightId: makeFlightId(flightId),
    seats,
    price: PriceBreakdown.quote({
      unitFare: money(fare),
      seats,
      serviceFee: money(serviceFee),
    }),
    status,
    createdAt,
    version,
  });
