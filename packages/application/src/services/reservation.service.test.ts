import {
  CapacityExceededError,
  ConflictError,
  InvalidInputError,
  NotFoundError,
  OptimisticLockingError,
  ReservationStatusError,
} from "@workspace/domain/errors";
import {
  makeFlightId,
  makeReservationId,
  makeUserId,
  PaymentId,
  PaymentMethodId,
  ReferenceCodeSchema,
  SettlementReferenceSchema,
} from "@workspace/domain/kernel";
import { Payment } from "@workspace/domain/payment";
import { Effect, Either, Option, Ref } from "effect";
import { describe, expect, it } from "vitest";
import {
  createTestAircraft,
  createTestFlight,
  createTestReservation,
  createTestUser,
  makeTestLayer,
  InMemoryStore,
  money,
  type TestLayerOptions,
  type TestServices,
} from "../test/index.js";
import { CapacityLedger } from "./capacity-ledger.service.js";
import { ReservationService } from "./reservation.service.js";

const flightId = makeFlightId("flight-1");
const userId = makeUserId("user-1");

const baseSeed = (capacity = 10) => ({
  aircraft: [createTestAircraft({ capacity })],
  flights: [createTestFlight()],
  users: [createTestUser({ id: "user-1" }), createTestUser({ id: "user-2" })],
});

const run = <A, E>(
  effect: Effect.Effect<A, E, TestServices>,
  options: TestLayerOptions = { seed: baseSeed() },
) => Effect.runPromise(effect.pipe(Effect.provide(makeTestLayer(options))));

const create = (seats: number, user = userId) =>
  ReservationService.pipe(
    Effect.flatMap((service) => service.create({ flightId, userId: user, seats })),
  );

describe("ReservationService.create", () => {
  it("creates a pending reservation priced from the flight fare", async () => {
    const [reservation, occupied] = await run(
      Effect.gen(function* () {
        const reservation = yield* create(4);
        const ledger = yield* CapacityLedger;
        return [reservation, yield* ledger.occupiedSeats(flightId)] as const;
      }),
    );

    expect(reservation.status).toBe("PENDING");
    expect(reservation.seats).toBe(4);
    expect(reservation.price.subtotal.toFixed()).toBe("400.00");
    expect(reservation.price.serviceFee.toFixed()).toBe("12.50");
    expect(reservation.price.total.toFixed()).toBe("412.50");
    expect(occupied).toBe(4);
  });

  it("rejects a request larger than the remaining seats with the exact count", async () => {
    const error = await run(
      Effect.gen(function* () {
        yield* create(7);
        return yield* Effect.flip(create(4));
      }),
    );

    expect(error).toBeInstanceOf(CapacityExceededError);
    expect(error).toMatchObject({ flightId: "flight-1", requested: 4, remaining: 3 });
  });

  it.each([
    { label: "serialized transactions", interleaved: false },
    { label: "interleaved transactions", interleaved: true },
  ])(
    "lets only one of two concurrent 6-seat requests on a 10-seat flight through ($label)",
    async ({ interleaved }) => {
      const { results, occupied } = await run(
        Effect.gen(function* () {
          const results = yield* Effect.all(
            [Effect.either(create(6)), Effect.either(create(6, makeUserId("user-2")))],
            { concurrency: "unbounded" },
          );
          const ledger = yield* CapacityLedger;
          return { results, occupied: yield* ledger.occupiedSeats(flightId) };
        }),
        { seed: baseSeed(), interleaved },
      );

      const failures = results.filter(Either.isLeft).map((r) => r.left);
      expect(results.filter(Either.isRight)).toHaveLength(1);
      expect(failures).toHaveLength(1);
      expect(failures[0]).toBeInstanceOf(CapacityExceededError);
      expect(failures[0]).toMatchObject({ requested: 6, remaining: 4 });
      expect(occupied).toBe(6);
    },
  );

  it("refuses flights that are not active", async () => {
    const error = await run(Effect.flip(create(1)), {
      seed: { ...baseSeed(), flights: [createTestFlight({ status: "blocked" })] },
    });

    expect(error).toBeInstanceOf(InvalidInputError);
    expect(error).toMatchObject({ field: "flightId" });
  });

  it("refuses to book against a flight without a usable capacity", async () => {
    const error = await run(Effect.flip(create(1)), {
      seed: { ...baseSeed(), aircraft: [] },
    });

    expect(error).toBeInstanceOf(InvalidInputError);
    expect(error).toMatchObject({ field: "capacity" });
  });

  it("rejects non-positive seat counts", async () => {
    const error = await run(Effect.flip(create(0)));
    expect(error).toMatchObject({ _tag: "InvalidInputError", field: "seats" });
  });

  it("requires the target user to exist", async () => {
    const error = await run(Effect.flip(create(1, makeUserId("ghost"))));
    expect(error).toBeInstanceOf(NotFoundError);
    expect(error).toMatchObject({ entity: "User", id: "ghost" });
  });

  it("reports an unknown flight", async () => {
    const error = await run(
      ReservationService.pipe(
        Effect.flatMap((service) =>
          service.create({ flightId: makeFlightId("missing"), userId, seats: 1 }),
        ),
        Effect.flip,
      ),
    );
    expect(error).toMatchObject({ _tag: "NotFoundError", entity: "Flight" });
  });
});

describe("ReservationService optimistic retries", () => {
  it("retries a commit that lost the ledger race", async () => {
    let attempts = 0;
    const { reservation, ledgerVersion } = await run(
      Effect.gen(function* () {
        const reservation = yield* create(2);
        const store = yield* InMemoryStore;
        const state = yield* Ref.get(store);
        return { reservation, ledgerVersion: state.flights.get(flightId)?.ledgerVersion };
      }),
      {
        seed: baseSeed(),
        decorate: {
          flights: (base) => ({
            ...base,
            advanceLedger: (ledger) =>
              Effect.suspend(() => {
                attempts++;
                return attempts === 1
                  ? Effect.fail(
                      new OptimisticLockingError({
                        entityType: "Flight",
                        id: ledger.flightId,
                        expectedVersion: ledger.version,
                        actualVersion: ledger.version + 1,
                      }),
                    )
                  : base.advanceLedger(ledger);
              }),
          }),
        },
      },
    );

    expect(attempts).toBe(2);
    expect(reservation.seats).toBe(2);
    expect(ledgerVersion).toBe(1);
  });

  it("surfaces a conflict once retries are exhausted", async () => {
    let attempts = 0;
    const error = await run(Effect.flip(create(2)), {
      seed: baseSeed(),
      config: { BOOKING_MAX_COMMIT_RETRIES: "2" },
      decorate: {
        flights: (base) => ({
          ...base,
          advanceLedger: (ledger) =>
            Effect.suspend(() => {
              attempts++;
              return Effect.fail(
                new OptimisticLockingError({
                  entityType: "Flight",
                  id: ledger.flightId,
                  expectedVersion: ledger.version,
                  actualVersion: ledger.version + 1,
                }),
              );
            }),
        }),
      },
    });

    expect(error).toBeInstanceOf(ConflictError);
    expect(error).toMatchObject({ entity: "Flight", id: "flight-1" });
    expect(attempts).toBe(3);
  });
});

describe("ReservationService.amend", () => {
  it("excludes the reservation's own seats when growing it", async () => {
    const amended = await run(
      Effect.gen(function* () {
        const service = yield* ReservationService;
        const reservation = yield* create(50);
        return yield* service.amend({
          reservationId: reservation.id,
          seats: Option.some(51),
          status: Option.none(),
        });
      }),
      { seed: baseSeed(51) },
    );

    expect(amended.seats).toBe(51);
    expect(amended.price.subtotal.toFixed()).toBe("5100.00");
    expect(amended.price.total.toFixed()).toBe("5112.50");
  });

  it("still rejects growth beyond capacity", async () => {
    const error = await run(
      Effect.gen(function* () {
        const service = yield* ReservationService;
        const reservation = yield* create(50);
        return yield* Effect.flip(
          service.amend({
            reservationId: reservation.id,
            seats: Option.some(52),
            status: Option.none(),
          }),
        );
      }),
      { seed: baseSeed(51) },
    );

    expect(error).toBeInstanceOf(CapacityExceededError);
    expect(error).toMatchObject({ requested: 52, remaining: 51 });
  });

  it("applies seats and status together", async () => {
    const amended = await run(
      Effect.gen(function* () {
        const service = yield* ReservationService;
        const reservation = yield* create(2);
        return yield* service.amend({
          reservationId: reservation.id,
          seats: Option.some(3),
          status: Option.some("CONFIRMED"),
        });
      }),
    );

    expect(amended.status).toBe("CONFIRMED");
    expect(amended.seats).toBe(3);
    expect(amended.price.total.toFixed()).toBe("312.50");
  });

  it("refuses PAID as an amendment target", async () => {
    const error = await run(
      Effect.gen(function* () {
        const service = yield* ReservationService;
        const reservation = yield* create(1);
        return yield* Effect.flip(
          service.amend({
            reservationId: reservation.id,
            seats: Option.none(),
            status: Option.some("PAID"),
          }),
        );
      }),
    );

    expect(error).toBeInstanceOf(InvalidInputError);
    expect(error).toMatchObject({ field: "status" });
  });

  it("refuses seat changes on a cancelled reservation", async () => {
    const cancelled = createTestReservation({ id: "r-1", status: "CANCELLED", seats: 2 });
    const error = await run(
      ReservationService.pipe(
        Effect.flatMap((service) =>
          service.amend({
            reservationId: cancelled.id,
            seats: Option.some(3),
            status: Option.none(),
          }),
        ),
        Effect.flip,
      ),
      { seed: { ...baseSeed(), reservations: [cancelled] } },
    );

    expect(error).toBeInstanceOf(ReservationStatusError);
    expect(error).toMatchObject({ status: "CANCELLED", attempted: "amend seats" });
  });

  it("requires something to change", async () => {
    const error = await run(
      ReservationService.pipe(
        Effect.flatMap((service) =>
          service.amend({
            reservationId: makeReservationId("r-1"),
            seats: Option.none(),
            status: Option.none(),
          }),
        ),
        Effect.flip,
      ),
    );

    expect(error).toMatchObject({ _tag: "InvalidInputError", field: "reservation" });
  });
});

describe("ReservationService.cancel", () => {
  it("frees the seats for other travellers", async () => {
    const second = await run(
      Effect.gen(function* () {
        const service = yield* ReservationService;
        const first = yield* create(6);
        const blocked = yield* Effect.flip(create(6, makeUserId("user-2")));
        expect(blocked).toBeInstanceOf(CapacityExceededError);
        yield* service.cancel(first.id);
        return yield* create(6, makeUserId("user-2"));
      }),
    );

    expect(second.seats).toBe(6);
  });

  it("is idempotent", async () => {
    const [once, twice] = await run(
      Effect.gen(function* () {
        const service = yield* ReservationService;
        const reservation = yield* create(2);
        const once = yield* service.cancel(reservation.id);
        const twice = yield* service.cancel(reservation.id);
        return [once, twice] as const;
      }),
    );

    expect(once.status).toBe("CANCELLED");
    expect(twice.status).toBe("CANCELLED");
    expect(twice.version).toBe(once.version);
  });

  it("cancels a paid reservation, keeps its payment and frees its seats", async () => {
    const paid = createTestReservation({ id: "r-paid", status: "PAID", seats: 10 });
    const { blocked, cancelled, payment, rebooked } = await run(
      Effect.gen(function* () {
        const service = yield* ReservationService;
        const blocked = yield* Effect.flip(create(1, makeUserId("user-2")));
        const cancelled = yield* service.cancel(paid.id);
        const state = yield* Ref.get(yield* InMemoryStore);
        const rebooked = yield* create(10, makeUserId("user-2"));
        return { blocked, cancelled, payment: state.payments.get("r-paid"), rebooked };
      }),
      {
        seed: {
          ...baseSeed(),
          reservations: [paid],
          payments: [
            new Payment({
              id: PaymentId.make("payment-1"),
              reference: ReferenceCodeSchema.make("K7Q2ZD"),
              reservationId: paid.id,
              methodId: PaymentMethodId.make("method-1"),
              amount: money("1012.50"),
              settlementReference: SettlementReferenceSchema.make("970000001"),
              paidAt: new Date("2026-10-17T10:05:00Z"),
            }),
          ],
        },
      },
    );

    expect(blocked).toBeInstanceOf(CapacityExceededError);
    expect(cancelled.status).toBe("CANCELLED");
    expect(payment?.id).toBe("payment-1");
    expect(rebooked.seats).toBe(10);
  });
});

describe("ReservationService.confirm", () => {
  it("moves a pending reservation to confirmed and bumps its version", async () => {
    const confirmed = await run(
      Effect.gen(function* () {
        const service = yield* ReservationService;
        const reservation = yield* create(1);
        return yield* service.confirm(reservation.id);
      }),
    );

    expect(confirmed.status).toBe("CONFIRMED");
    expect(confirmed.version).toBe(2);
  });
});

describe("ReservationService lookups", () => {
  it("hides reservations owned by someone else", async () => {
    const reservation = createTestReservation({ id: "r-1", userId: "user-1" });
    const error = await run(
      ReservationService.pipe(
        Effect.flatMap((service) => service.getOwned(reservation.id, makeUserId("user-2"))),
        Effect.flip,
      ),
      { seed: { ...baseSeed(), reservations: [reservation] } },
    );

    expect(error).toBeInstanceOf(NotFoundError);
    expect(error).toMatchObject({ entity: "Reservation", id: "r-1" });
  });

  it("lists a user's reservations newest first", async () => {
    const older = createTestReservation({
      id: "r-old",
      createdAt: new Date("2026-10-01T10:00:00Z"),
    });
    const newer = createTestReservation({
      id: "r-new",
      createdAt: new Date("2026-10-05T10:00:00Z"),
    });
    const foreign = createTestReservation({ id: "r-foreign", userId: "user-2" });

    const listed = await run(
      ReservationService.pipe(Effect.flatMap((service) => service.list({ userId }))),
      { seed: { ...baseSeed(), reservations: [older, newer, foreign] } },
    );

    expect(listed.map((r) => r.id)).toEqual(["r-new", "r-old"]);
  });

  it("deletes a reservation", async () => {
    const reservation = createTestReservation({ id: "r-1" });
    const remaining = await run(
      Effect.gen(function* () {
        const service = yield* ReservationService;
        yield* service.remove(reservation.id);
        return yield* Effect.flip(service.get(reservation.id));
      }),
      { seed: { ...baseSeed(), reservations: [reservation] } },
    );

    expect(remaining).toBeInstanceOf(NotFoundError);
  });
});
