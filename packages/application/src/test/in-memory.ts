/**
 * @file in-memory.ts
 * @module @workspace/application/testing
 * @description In-process stand-ins for every application port.
 *
 * All ports share one immutable state snapshot held in a Ref. Versioned
 * writes and payment inserts are checked and applied atomically with
 * Ref.modify. By default the unit of work admits one transaction at a time
 * and restores the snapshot taken at its start when the transaction fails.
 * With `interleaved: true` transactions run concurrently without isolation
 * and yield after every ledger read, so optimistic-locking races surface.
 */

import type { Aircraft } from "@workspace/domain/aircraft";
import {
  DuplicatePaymentError,
  OptimisticLockingError,
  PersistenceError,
  UnauthorizedError,
} from "@workspace/domain/errors";
import { Flight, FlightStatus } from "@workspace/domain/flight";
import {
  makeUserId,
  Money,
  PaymentMethodId,
  type ReservationId,
} from "@workspace/domain/kernel";
import { type Payment, PaymentMethod } from "@workspace/domain/payment";
import { utcDayRange } from "@workspace/domain/reporting";
import { Reservation } from "@workspace/domain/reservation";
import { SeatLedger } from "@workspace/domain/seat-ledger";
import type { User } from "@workspace/domain/user";
import {
  BigDecimal,
  Context,
  Effect,
  Exit,
  FiberRef,
  Layer,
  Option,
  Ref,
} from "effect";
import { IdentityGateway } from "../gateways/identity.gateway.js";
import {
  NotificationGateway,
  type NotificationGatewayService,
  type EmailRecipient,
  type PaymentReceipt,
} from "../gateways/notification.gateway.js";
import { UnitOfWork } from "../ports/unit-of-work.js";
import {
  FlightCatalogQueries,
  type FlightListing,
} from "../queries/flight-catalog.queries.js";
import { ReportingQueries } from "../queries/reporting.queries.js";
import {
  AircraftRepository,
  type AircraftRepositoryPort,
} from "../repositories/aircraft.repository.js";
import {
  FlightRepository,
  type FlightRepositoryPort,
} from "../repositories/flight.repository.js";
import {
  PaymentRepository,
  type PaymentRepositoryPort,
} from "../repositories/payment.repository.js";
import {
  ReservationRepository,
  type ReservationRepositoryPort,
} from "../repositories/reservation.repository.js";
import { UserRepository } from "../repositories/user.repository.js";

// ============================================================================
// STATE
// ============================================================================

export interface SentReceipt {
  readonly receipt: PaymentReceipt;
  readonly recipient: EmailRecipient;
}

export interface InMemoryState {
  readonly aircraft: ReadonlyMap<string, Aircraft>;
  readonly flights: ReadonlyMap<string, Flight>;
  readonly reservations: ReadonlyMap<string, Reservation>;
  /** Keyed by reservation id */
  readonly payments: ReadonlyMap<string, Payment>;
  /** Keyed by label */
  readonly paymentMethods: ReadonlyMap<string, PaymentMethod>;
  readonly users: ReadonlyMap<string, User>;
  readonly receipts: ReadonlyArray<SentReceipt>;
}

export interface InMemorySeed {
  readonly aircraft?: ReadonlyArray<Aircraft>;
  readonly flights?: ReadonlyArray<Flight>;
  readonly reservations?: ReadonlyArray<Reservation>;
  readonly payments?: ReadonlyArray<Payment>;
  readonly users?: ReadonlyArray<User>;
  /** Bearer credential → user id */
  readonly credentials?: Readonly<Record<string, string>>;
}

export interface InMemoryOptions {
  readonly seed?: InMemorySeed;
  readonly interleaved?: boolean;
  /** Wraps the stock implementations, e.g. to inject a failure. */
  readonly decorate?: {
    readonly aircraft?: (base: AircraftRepositoryPort) => AircraftRepositoryPort;
    readonly flights?: (base: FlightRepositoryPort) => FlightRepositoryPort;
    readonly reservations?: (
      base: ReservationRepositoryPort,
    ) => ReservationRepositoryPort;
    readonly payments?: (base: PaymentRepositoryPort) => PaymentRepositoryPort;
    readonly notifications?: (
      base: NotificationGatewayService,
    ) => NotificationGatewayService;
  };
}

/** Direct access to the store, for assertions. */
export class InMemoryStore extends Context.Tag("InMemoryStore")<
  InMemoryStore,
  Ref.Ref<InMemoryState>
>() {}

const byId = <T extends { readonly id: string }>(
  items: ReadonlyArray<T> = [],
): ReadonlyMap<string, T> => new Map(items.map((item) => [item.id, item]));

const withEntry = <T>(
  map: ReadonlyMap<string, T>,
  key: string,
  value: T,
): ReadonlyMap<string, T> => new Map(map).set(key, value);

const withoutEntry = <T>(
  map: ReadonlyMap<string, T>,
  key: string,
): ReadonlyMap<string, T> => {
  const next = new Map(map);
  next.delete(key);
  return next;
};

export const occupiedSeats = (
  state: InMemoryState,
  flightId: string,
  exclude: Option.Option<ReservationId> = Option.none(),
): number => {
  let total = 0;
  for (const reservation of state.reservations.values()) {
    if (
      reservation.flightId === flightId &&
      reservation.holdsSeats() &&
      !Option.contains(exclude, reservation.id)
    ) {
      total += reservation.seats;
    }
  }
  return total;
};

const listingOf = (
  state: InMemoryState,
  flight: Flight,
): Option.Option<FlightListing> =>
  Option.fromNullable(state.aircraft.get(flight.aircraftId)).pipe(
    Option.map((aircraft) => ({
      flight,
      aircraftModel: aircraft.model,
      capacity: aircraft.capacity,
      occupied: occupiedSeats(state, flight.id),
    })),
  );

const bumpLedger = (flight: Flight): Flight =>
  new Flight({ ...flight, ledgerVersion: flight.ledgerVersion + 1 });

const byDeparture = (a: Flight, b: Flight) =>
  a.departureAt.getTime() - b.departureAt.getTime();

const matchesPlace = (filter: Option.Option<string>, place: string) =>
  Option.match(filter, {
    onNone: () => true,
    onSome: (wanted) => wanted.toLowerCase() === place.toLowerCase(),
  });

// ============================================================================
// LAYER
// ============================================================================

export type InMemoryServices =
  | AircraftRepository
  | FlightRepository
  | ReservationRepository
  | PaymentRepository
  | UserRepository
  | UnitOfWork
  | FlightCatalogQueries
  | ReportingQueries
  | NotificationGateway
  | IdentityGateway
  | InMemoryStore;

export const makeInMemoryLayer = (
  options: InMemoryOptions = {},
): Layer.Layer<InMemoryServices> =>
  Layer.effectContext(
    Effect.gen(function* () {
      const seed = options.seed ?? {};
      const state = yield* Ref.make<InMemoryState>({
        aircraft: byId(seed.aircraft),
        flights: byId(seed.flights),
        reservations: byId(seed.reservations),
        payments: new Map(
          (seed.payments ?? []).map((payment) => [payment.reservationId, payment]),
        ),
        paymentMethods: new Map(),
        users: byId(seed.users),
        receipts: [],
      });
      const credentials = new Map(Object.entries(seed.credentials ?? {}));

      const read = <A>(f: (s: InMemoryState) => A) => Ref.get(state).pipe(Effect.map(f));
      const write = (f: (s: InMemoryState) => InMemoryState) => Ref.update(state, f);

      // --- Unit of work ---

      const semaphore = yield* Effect.makeSemaphore(1);
      const inTransaction = FiberRef.unsafeMake(false);

      const unitOfWork = UnitOfWork.of({
        transaction: <A, E, R>(effect: Effect.Effect<A, E, R>) =>
          Effect.gen(function* () {
            if (options.interleaved || (yield* FiberRef.get(inTransaction))) {
              return yield* effect;
            }
            return yield* semaphore.withPermits(1)(
              Effect.gen(function* () {
                const snapshot = yield* Ref.get(state);
                return yield* effect.pipe(
                  Effect.locally(inTransaction, true),
                  Effect.onExit((exit) =>
                    Exit.isSuccess(exit) ? Effect.void : Ref.set(state, snapshot),
                  ),
                );
              }),
            );
          }),
      });

      // --- Repositories ---

      const stockAircraft = AircraftRepository.of({
        findById: (id) => read((s) => Option.fromNullable(s.aircraft.get(id))),
        listWithUsage: () =>
          read((s) =>
            [...s.aircraft.values()]
              .sort((a, b) => a.model.localeCompare(b.model))
              .map((aircraft) => ({
                aircraft,
                flightCount: [...s.flights.values()].filter(
                  (flight) => flight.aircraftId === aircraft.id,
                ).length,
              })),
          ),
        save: (aircraft) =>
          write((s) => ({
            ...s,
            aircraft: withEntry(s.aircraft, aircraft.id, aircraft),
          })).pipe(Effect.as(aircraft)),
        delete: (id) =>
          write((s) => ({ ...s, aircraft: withoutEntry(s.aircraft, id) })),
      });

      const stockFlights: FlightRepositoryPort = {
        findById: (id) => read((s) => Option.fromNullable(s.flights.get(id))),
        save: (flight) =>
          Ref.modify(state, (s) => {
            const stored = s.flights.get(flight.id);
            const saved = stored
              ? new Flight({ ...flight, ledgerVersion: stored.ledgerVersion })
              : flight;
            return [saved, { ...s, flights: withEntry(s.flights, flight.id, saved) }];
          }),
        delete: (id) => write((s) => ({ ...s, flights: withoutEntry(s.flights, id) })),
        countByAircraft: (aircraftId) =>
          read(
            (s) =>
              [...s.flights.values()].filter((f) => f.aircraftId === aircraftId)
                .length,
          ),
        blockActiveByAircraft: (aircraftId) =>
          Ref.modify(state, (s) => {
            const flights = new Map(s.flights);
            let changed = 0;
            for (const flight of s.flights.values()) {
              if (flight.aircraftId === aircraftId && flight.isActive()) {
                flights.set(flight.id, flight.block());
                changed++;
              }
            }
            return [changed, { ...s, flights }];
          }),
        ledger: (flightId, exclude) =>
          read((s) =>
            Option.fromNullable(s.flights.get(flightId)).pipe(
              Option.map(
                (flight) =>
                  new SeatLedger({
                    flightId: flight.id,
                    capacity: s.aircraft.get(flight.aircraftId)?.capacity ?? 0,
                    occupied: occupiedSeats(s, flight.id, exclude),
                    version: flight.ledgerVersion,
                  }),
              ),
            ),
          ).pipe(Effect.tap(() => (options.interleaved ? Effect.yieldNow() : Effect.void))),
        advanceLedger: (ledger) =>
          Ref.modify(
            state,
            (s): [Effect.Effect<void, OptimisticLockingError | PersistenceError>, InMemoryState] => {
              const flight = s.flights.get(ledger.flightId);
              if (!flight) {
                return [
                  Effect.fail(
                    new PersistenceError({
                      operation: "advanceLedger",
                      reason: "Flight no longer exists",
                    }),
                  ),
                  s,
                ];
              }
              if (flight.ledgerVersion !== ledger.version) {
                return [
                  Effect.fail(
                    new OptimisticLockingError({
                      entityType: "Flight",
                      id: flight.id,
                      expectedVersion: ledger.version,
                      actualVersion: flight.ledgerVersion,
                    }),
                  ),
                  s,
                ];
              }
              return [
                Effect.void,
                {
                  ...s,
                  flights: withEntry(
                    s.flights,
                    flight.id,
                    bumpLedger(flight),
                  ),
                },
              ];
            },
          ).pipe(Effect.flatten),
        advanceLedgersForAircraft: (aircraftId) =>
          write((s) => {
            const flights = new Map(s.flights);
            for (const flight of s.flights.values()) {
              if (flight.aircraftId === aircraftId) {
                flights.set(flight.id, bumpLedger(flight));
              }
            }
            return { ...s, flights };
          }),
        maxOccupancyForAircraft: (aircraftId) =>
          read((s) =>
            [...s.flights.values()]
              .filter((flight) => flight.aircraftId === aircraftId)
              .reduce((max, flight) => Math.max(max, occupiedSeats(s, flight.id)), 0),
          ),
      };

      const stockReservations: ReservationRepositoryPort = {
        save: (reservation) =>
          Ref.modify(
            state,
            (s): [Effect.Effect<Reservation, OptimisticLockingError>, InMemoryState] => {
              const current = s.reservations.get(reservation.id);
              if (current && current.version !== reservation.version) {
                return [
                  Effect.fail(
                    new OptimisticLockingError({
                      entityType: "Reservation",
                      id: reservation.id,
                      expectedVersion: reservation.version,
                      actualVersion: current.version,
                    }),
                  ),
                  s,
                ];
              }
              const saved = current
                ? new Reservation({ ...reservation, version: current.version + 1 })
                : reservation;
              return [
                Effect.succeed(saved),
                { ...s, reservations: withEntry(s.reservations, saved.id, saved) },
              ];
            },
          ).pipe(Effect.flatten),
        findById: (id) => read((s) => Option.fromNullable(s.reservations.get(id))),
        list: (filter) =>
          read((s) => {
            const matching = [...s.reservations.values()]
              .filter(
                (r) =>
                  (filter.status === undefined || r.status === filter.status) &&
                  (filter.flightId === undefined || r.flightId === filter.flightId) &&
                  (filter.userId === undefined || r.userId === filter.userId),
              )
              .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
            return filter.limit === undefined
              ? matching
              : matching.slice(0, filter.limit);
          }),
        countByFlight: (flightId) =>
          read(
            (s) =>
              [...s.reservations.values()].filter((r) => r.flightId === flightId)
                .length,
          ),
        delete: (id) =>
          write((s) => ({
            ...s,
            reservations: withoutEntry(s.reservations, id),
            payments: withoutEntry(s.payments, id),
          })),
      };

      const stockPayments: PaymentRepositoryPort = {
        findByReservation: (reservationId) =>
          read((s) => Option.fromNullable(s.payments.get(reservationId))),
        referenceExists: (reference) =>
          read((s) =>
            [...s.payments.values()].some((payment) => payment.reference === reference),
          ),
        insert: (payment) =>
          Ref.modify(
            state,
            (s): [Effect.Effect<Payment, DuplicatePaymentError>, InMemoryState] =>
              s.payments.has(payment.reservationId)
                ? [
                    Effect.fail(
                      new DuplicatePaymentError({
                        reservationId: payment.reservationId,
                      }),
                    ),
                    s,
                  ]
                : [
                    Effect.succeed(payment),
                    {
                      ...s,
                      payments: withEntry(s.payments, payment.reservationId, payment),
                    },
                  ],
          ).pipe(Effect.flatten),
        resolveMethod: (label) =>
          Ref.modify(state, (s) => {
            const existing = s.paymentMethods.get(label);
            if (existing) return [existing, s];
            const method = new PaymentMethod({
              id: PaymentMethodId.make(`method-${s.paymentMethods.size + 1}`),
              label,
            });
            return [
              method,
              { ...s, paymentMethods: withEntry(s.paymentMethods, label, method) },
            ];
          }),
      };

      const userRepository = UserRepository.of({
        findById: (id) => read((s) => Option.fromNullable(s.users.get(id))),
        list: (filter) =>
          read((s) =>
            [...s.users.values()]
              .filter(
                (user) =>
                  (filter.role === undefined || user.role === filter.role) &&
                  (filter.status === undefined ||
                    Option.exists(
                      user.status,
                      (status) =>
                        status.toLowerCase() === filter.status?.toLowerCase(),
                    )),
              )
              .sort((a, b) => a.name.localeCompare(b.name)),
          ),
      });

      // --- Queries ---

      const catalog = FlightCatalogQueries.of({
        search: (criteria) =>
          read((s) => {
            const day = Option.map(criteria.departureDate, utcDayRange);
            const direction = criteria.sort === "price_desc" ? -1 : 1;
            const flights = [...s.flights.values()]
              .filter(
                (flight) =>
                  flight.status === FlightStatus.ACTIVE &&
                  matchesPlace(criteria.origin, flight.origin) &&
                  matchesPlace(criteria.destination, flight.destination) &&
                  Option.match(day, {
                    onNone: () => true,
                    onSome: ([start, end]) =>
                      flight.departureAt >= start && flight.departureAt < end,
                  }),
              )
              .sort((a, b) => {
                const byPrice = BigDecimal.Order(a.fare.amount, b.fare.amount);
                return byPrice !== 0 ? byPrice * direction : byDeparture(a, b);
              });
            const offset = (criteria.page - 1) * criteria.limit;
            return flights
              .slice(offset, offset + criteria.limit)
              .flatMap((flight) => Option.toArray(listingOf(s, flight)));
          }),
        findListing: (flightId) =>
          read((s) =>
            Option.fromNullable(s.flights.get(flightId)).pipe(
              Option.flatMap((flight) => listingOf(s, flight)),
            ),
          ),
        board: () =>
          read((s) =>
            [...s.flights.values()]
              .sort(byDeparture)
              .flatMap((flight) => Option.toArray(listingOf(s, flight))),
          ),
      });

      const reporting = ReportingQueries.of({
        countFlightsByStatus: (status) =>
          read((s) => [...s.flights.values()].filter((f) => f.status === status).length),
        countFlightsWithStatusIn: (spellings) =>
          read((s) => {
            const wanted = new Set(spellings.map((spelling) => spelling.toLowerCase()));
            return [...s.flights.values()].filter((f) =>
              wanted.has(f.status.toLowerCase()),
            ).length;
          }),
        countReservationsByStatus: (status) =>
          read(
            (s) =>
              [...s.reservations.values()].filter((r) => r.status === status).length,
          ),
        totalRevenue: () =>
          read((s) =>
            [...s.payments.values()].reduce(
              (sum, payment) => sum.add(payment.amount),
              Money.zero(),
            ),
          ),
        totalSeatsReserved: () =>
          read((s) =>
            [...s.reservations.values()].reduce((sum, r) => sum + r.seats, 0),
          ),
        reservationTimestampsSince: (since) =>
          read((s) =>
            [...s.reservations.values()]
              .map((r) => r.createdAt)
              .filter((createdAt) => createdAt >= since),
          ),
        flightLoadsBetween: (start, end) =>
          read((s) =>
            [...s.flights.values()]
              .filter((f) => f.departureAt >= start && f.departureAt < end)
              .map((f) => ({
                occupied: occupiedSeats(s, f.id),
                capacity: Option.fromNullable(s.aircraft.get(f.aircraftId)?.capacity),
              })),
          ),
      });

      // --- Gateways ---

      const stockNotifications: NotificationGatewayService = {
        sendReceipt: (receipt, recipient) =>
          Ref.modify(state, (s) => [
            { messageId: `msg-${s.receipts.length + 1}` },
            { ...s, receipts: [...s.receipts, { receipt, recipient }] },
          ]),
      };

      const identity = IdentityGateway.of({
        authenticate: (credential) =>
          Option.match(Option.fromNullable(credentials.get(credential)), {
            onNone: () =>
              Effect.fail(new UnauthorizedError({ reason: "Invalid credential" })),
            onSome: (userId) => Effect.succeed(makeUserId(userId)),
          }),
      });

      const decorate = options.decorate ?? {};

      return Context.make(InMemoryStore, state).pipe(
        Context.add(UnitOfWork, unitOfWork),
        Context.add(
          AircraftRepository,
          decorate.aircraft ? decorate.aircraft(stockAircraft) : stockAircraft,
        ),
        Context.add(
          FlightRepository,
          decorate.flights ? decorate.flights(stockFlights) : stockFlights,
        ),
        Context.add(
          ReservationRepository,
          decorate.reservations
            ? decorate.reservations(stockReservations)
            : stockReservations,
        ),
        Context.add(
          PaymentRepository,
          decorate.payments ? decorate.payments(stockPayments) : stockPayments,
        ),
        Context.add(UserRepository, userRepository),
        Context.add(FlightCatalogQueries, catalog),
        Context.add(ReportingQueries, reporting),
        Context.add(
          NotificationGateway,
          decorate.notifications
            ? decorate.notifications(stockNotifications)
            : stockNotifications,
        ),
        Context.add(IdentityGateway, identity),
      );
    }),
  );
