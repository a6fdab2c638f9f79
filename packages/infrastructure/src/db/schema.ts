import { sql } from "drizzle-orm";
import {
  check,
  decimal,
  index,
  integer,
  jsonb,
  pgTable,
  timestamp,
  uniqueIndex,
  uuid,
  varchar,
} from "drizzle-orm/pg-core";

// 1. Aircraft
export const aircraft = pgTable(
  "aircraft",
  {
    id: uuid("id").primaryKey(),
    model: varchar("model", { length: 100 }).notNull(),
    capacity: integer("capacity").notNull(),
    status: varchar("status", { length: 20 }).notNull().default("available"),
    airline: varchar("airline", { length: 100 }),
  },
  (table) => [check("chk_aircraft_capacity", sql`${table.capacity} > 0`)],
);

// 2. Flights (ledger_version is bumped on every seat commit)
export const flights = pgTable(
  "flights",
  {
    id: uuid("id").primaryKey(),
    origin: varchar("origin", { length: 100 }).notNull(),
    destination: varchar("destination", { length: 100 }).notNull(),
    departureAt: timestamp("departure_at", { withTimezone: true }).notNull(),
    arrivalAt: timestamp("arrival_at", { withTimezone: true }),
    fare: decimal("fare", { precision: 12, scale: 2 }).notNull(),
    status: varchar("status", { length: 20 }).notNull().default("active"),
    aircraftId: uuid("aircraft_id")
      .notNull()
      .references(() => aircraft.id, { onDelete: "restrict" }),
    ledgerVersion: integer("ledger_version").notNull().default(0),
  },
  (table) => [
    check("chk_flights_fare", sql`${table.fare} >= 0`),
    index("idx_flights_aircraft").on(table.aircraftId),
    index("idx_flights_departure").on(table.departureAt),
  ],
);

// 3. Users (written by the identity system, read here)
export const users = pgTable("users", {
  id: varchar("id", { length: 100 }).primaryKey(),
  name: varchar("name", { length: 200 }).notNull(),
  email: varchar("email", { length: 255 }).notNull(),
  role: varchar("role", { length: 20 }).notNull().default("client"),
  status: varchar("status", { length: 50 }),
});

// 4. Reservations (Aggregate Root with Optimistic Locking)
export const reservations = pgTable(
  "reservations",
  {
    id: uuid("id").primaryKey(),
    userId: varchar("user_id", { length: 100 }).notNull(),
    flightId: uuid("flight_id")
      .notNull()
      .references(() => flights.id, { onDelete: "restrict" }),
    seats: integer("seats").notNull(),
    unitFare: decimal("unit_fare", { precision: 12, scale: 2 }).notNull(),
    serviceFee: decimal("service_fee", { precision: 12, scale: 2 }).notNull(),
    subtotal: decimal("subtotal", { precision: 12, scale: 2 }).notNull(),
    total: decimal("total", { precision: 12, scale: 2 }).notNull(),
    status: varchar("status", { length: 20 }).notNull(),
    createdAt: timestamp("created_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
    version: integer("version").notNull().default(1),
  },
  (table) => [
    check("chk_reservations_seats", sql`${table.seats} > 0`),
    index("idx_reservations_flight").on(table.flightId),
    index("idx_reservations_user").on(table.userId),
    index("idx_reservations_created").on(table.createdAt),
  ],
);

// 5. Payment methods (created lazily by label)
export const paymentMethods = pgTable("payment_methods", {
  id: uuid("id").primaryKey().defaultRandom(),
  label: varchar("label", { length: 50 }).notNull().unique(),
});

// 6. Payments (at most one per reservation)
export const payments = pgTable(
  "payments",
  {
    id: uuid("id").primaryKey(),
    reference: varchar("reference", { length: 6 }).notNull(),
    reservationId: uuid("reservation_id")
      .notNull()
      .references(() => reservations.id, { onDelete: "cascade" }),
    methodId: uuid("method_id")
      .notNull()
      .references(() => paymentMethods.id),
    amount: decimal("amount", { precision: 12, scale: 2 }).notNull(),
    settlementReference: varchar("settlement_reference", { length: 9 }).notNull(),
    paidAt: timestamp("paid_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    check("chk_payments_amount", sql`${table.amount} >= 0`),
    uniqueIndex("payments_reservation_key").on(table.reservationId),
    uniqueIndex("payments_reference_key").on(table.reference),
  ],
);

// 7. Audit Log
export const auditLog = pgTable("audit_log", {
  id: uuid("id").primaryKey().defaultRandom(),
  aggregateType: varchar("aggregate_type", { length: 50 }).notNull(),
  aggregateId: varchar("aggregate_id", { length: 100 }).notNull(),
  operation: varchar("operation", { length: 20 }).notNull(),
  changes: jsonb("changes"),
  userId: varchar("user_id", { length: 100 }),
  timestamp: timestamp("timestamp").notNull().defaultNow(),
});
