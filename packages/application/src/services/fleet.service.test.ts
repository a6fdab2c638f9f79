import {
  ConflictError,
  InvalidInputError,
  NotFoundError,
} from "@workspace/domain/errors";
import {
  makeAircraftId,
  makeFlightId,
  makeUserId,
} from "@workspace/domain/kernel";
import { Effect, Option, Ref } from "effect";
import { describe, expect, it } from "vitest";
import {
  createTestAircraft,
  createTestFlight,
  createTestReservation,
  createTestUser,
  InMemoryStore,
  makeTestLayer,
  type TestLayerOptions,
  type TestServices,
} from "../test/index.js";
import { FleetService } from "./fleet.service.js";
import { ReservationService } from "./reservation.service.js";

const aircraftId = makeAircraftId("aircraft-1");

const run = <A, E>(
  effect: Effect.Effect<A, E, TestServices>,
  options: TestLayerOptions,
) => Effect.runPromise(effect.pipe(Effect.provide(makeTestLayer(options))));

const storeState = InMemoryStore.pipe(Effect.flatMap(Ref.get));

describe("FleetService.updateAircraft", () => {
  const seed = {
    aircraft: [createTestAircraft({ capacity: 10 })],
    flights: [
      createTestFlight({ id: "f-active" }),
      createTestFlight({ id: "f-cancelled", status: "cancelled" }),
      createTestFlight({ id: "f-blocked", status: "blocked" }),
    ],
  };

  it("blocks the active flights of an aircraft taken out of service", async () => {
    const { aircraft, state } = await run(
      Effect.gen(function* () {
        const fleet = yield* FleetService;
        const aircraft = yield* fleet.updateAircraft(aircraftId, {
          status: "unavailable",
        });
        return { aircraft, state: yield* storeState };
      }),
      { seed },
    );

    expect(aircraft.status).toBe("unavailable");
    expect(state.flights.get("f-active")?.status).toBe("blocked");
    expect(state.flights.get("f-cancelled")?.status).toBe("cancelled");
    expect(state.flights.get("f-blocked")?.status).toBe("blocked");
  });

  it("blocks active flights when moving between out-of-service statuses", async () => {
    const { state, aircraft } = await run(
      Effect.gen(function* () {
        const fleet = yield* FleetService;
        const aircraft = yield* fleet.updateAircraft(aircraftId, { status: "blocked" });
        return { aircraft, state: yield* storeState };
      }),
      {
        seed: {
          ...seed,
          aircraft: [createTestAircraft({ status: "unavailable" })],
        },
      },
    );

    expect(aircraft.status).toBe("blocked");
    expect(state.flights.get("f-active")?.status).toBe("blocked");
    expect(state.flights.get("f-cancelled")?.status).toBe("cancelled");
  });

  it("leaves flights alone when the status does not change", async () => {
    const state = await run(
      Effect.gen(function* () {
        const fleet = yield* FleetService;
        yield* fleet.updateAircraft(aircraftId, { status: "available", model: "Dash 8" });
        return yield* storeState;
      }),
      { seed },
    );

    expect(state.flights.get("f-active")?.status).toBe("active");
    expect(state.aircraft.get("aircraft-1")?.model).toBe("Dash 8");
  });

  it("rejects a capacity below the seats already reserved and rolls back", async () => {
    const { error, state } = await run(
      Effect.gen(function* () {
        const fleet = yield* FleetService;
        const error = yield* Effect.flip(
          fleet.updateAircraft(aircraftId, { capacity: 5, model: "Dash 8" }),
        );
        return { error, state: yield* storeState };
      }),
      {
        seed: {
          ...seed,
          reservations: [
            createTestReservation({ flightId: "f-active", seats: 6 }),
            createTestReservation({ flightId: "f-active", seats: 3, status: "CANCELLED" }),
          ],
        },
      },
    );

    expect(error).toBeInstanceOf(ConflictError);
    expect(error).toMatchObject({ entity: "Aircraft", id: "aircraft-1" });
    expect(state.aircraft.get("aircraft-1")?.capacity).toBe(10);
    expect(state.aircraft.get("aircraft-1")?.model).toBe("ATR 72-600");
    expect(state.flights.get("f-active")?.ledgerVersion).toBe(0);
  });

  it("invalidates in-flight claims when the capacity changes", async () => {
    const state = await run(
      Effect.gen(function* () {
        const fleet = yield* FleetService;
        yield* fleet.updateAircraft(aircraftId, { capacity: 6 });
        return yield* storeState;
      }),
      {
        seed: {
          ...seed,
          reservations: [createTestReservation({ flightId: "f-active", seats: 6 })],
        },
      },
    );

    expect(state.aircraft.get("aircraft-1")?.capacity).toBe(6);
    expect(state.flights.get("f-active")?.ledgerVersion).toBe(1);
    expect(state.flights.get("f-cancelled")?.ledgerVersion).toBe(1);
  });

  it.each([0, -3, 2.5])("rejects capacity %d", async (capacity) => {
    const error = await run(
      FleetService.pipe(
        Effect.flatMap((fleet) => fleet.updateAircraft(aircraftId, { capacity })),
        Effect.flip,
      ),
      { seed },
    );

    expect(error).toBeInstanceOf(InvalidInputError);
    expect(error).toMatchObject({ field: "capacity" });
  });
});

describe("FleetService aircraft lifecycle", () => {
  it("creates an available aircraft by default", async () => {
    const { created, listed } = await run(
      Effect.gen(function* () {
        const fleet = yield* FleetService;
        const created = yield* fleet.createAircraft({
          model: "  Embraer 175 ",
          capacity: 76,
          airline: "Congo Airways",
        });
        return { created, listed: yield* fleet.listAircraft() };
      }),
      {},
    );

    expect(created.model).toBe("Embraer 175");
    expect(created.status).toBe("available");
    expect(created.airline).toEqual(Option.some("Congo Airways"));
    expect(listed).toHaveLength(1);
    expect(listed[0]?.flightCount).toBe(0);
  });

  it("refuses to delete an aircraft that still has flights", async () => {
    const error = await run(
      FleetService.pipe(
        Effect.flatMap((fleet) => fleet.deleteAircraft(aircraftId)),
        Effect.flip,
      ),
      { seed: { aircraft: [createTestAircraft()], flights: [createTestFlight()] } },
    );

    expect(error).toBeInstanceOf(ConflictError);
    expect(error).toMatchObject({ reason: "Aircraft is assigned to 1 flight(s)" });
  });

  it("deletes an unused aircraft", async () => {
    const state = await run(
      Effect.gen(function* () {
        const fleet = yield* FleetService;
        yield* fleet.deleteAircraft(aircraftId);
        return yield* storeState;
      }),
      { seed: { aircraft: [createTestAircraft()] } },
    );

    expect(state.aircraft.size).toBe(0);
  });

  it("reports a flight assigned during the delete as a conflict", async () => {
    const error = await run(
      FleetService.pipe(
        Effect.flatMap((fleet) => fleet.deleteAircraft(aircraftId)),
        Effect.flip,
      ),
      {
        seed: { aircraft: [createTestAircraft()] },
        decorate: {
          aircraft: (base) => ({
            ...base,
            delete: (id) =>
              Effect.fail(
                new ConflictError({
                  entity: "Aircraft",
                  id,
                  reason: "Aircraft is still referenced by flights",
                }),
              ),
          }),
        },
      },
    );

    expect(error).toBeInstanceOf(ConflictError);
    expect(error).toMatchObject({ entity: "Aircraft", id: "aircraft-1" });
  });
});

describe("FleetService flights", () => {
  const departureAt = new Date("2026-11-10T06:30:00Z");

  it("creates a flight with an exact fare", async () => {
    const flight = await run(
      FleetService.pipe(
        Effect.flatMap((fleet) =>
          fleet.createFlight({
            origin: "Goma",
            destination: "Lubumbashi",
            departureAt,
            arrivalAt: new Date("2026-11-10T09:00:00Z"),
            fare: "149.90",
            aircraftId,
          }),
        ),
      ),
      { seed: { aircraft: [createTestAircraft()] } },
    );

    expect(flight.fare.toFixed()).toBe("149.90");
    expect(flight.status).toBe("active");
    expect(flight.ledgerVersion).toBe(0);
    expect(flight.routeCode()).toBe("GOM-LUB");
  });

  it("blocks a new flight on an aircraft that is out of service", async () => {
    const flight = await run(
      FleetService.pipe(
        Effect.flatMap((fleet) =>
          fleet.createFlight({
            origin: "Goma",
            destination: "Bukavu",
            departureAt,
            fare: "80",
            aircraftId,
          }),
        ),
      ),
      { seed: { aircraft: [createTestAircraft({ status: "unavailable" })] } },
    );

    expect(flight.status).toBe("blocked");
  });

  it.each([
    { field: "fare", fare: "12.345", arrivalAt: undefined },
    { field: "fare", fare: "free", arrivalAt: undefined },
    { field: "arrivalAt", fare: "80.00", arrivalAt: new Date("2026-11-10T06:00:00Z") },
  ])("rejects an invalid $field", async ({ field, fare, arrivalAt }) => {
    const error = await run(
      FleetService.pipe(
        Effect.flatMap((fleet) =>
          fleet.createFlight({
            origin: "Goma",
            destination: "Bukavu",
            departureAt,
            arrivalAt,
            fare,
            aircraftId,
          }),
        ),
        Effect.flip,
      ),
      { seed: { aircraft: [createTestAircraft()] } },
    );

    expect(error).toBeInstanceOf(InvalidInputError);
    expect(error).toMatchObject({ field });
  });

  it("requires an existing aircraft", async () => {
    const error = await run(
      FleetService.pipe(
        Effect.flatMap((fleet) =>
          fleet.createFlight({
            origin: "Goma",
            destination: "Bukavu",
            departureAt,
            fare: "80.00",
            aircraftId: makeAircraftId("missing"),
          }),
        ),
        Effect.flip,
      ),
      {},
    );

    expect(error).toBeInstanceOf(NotFoundError);
    expect(error).toMatchObject({ entity: "Aircraft", id: "missing" });
  });

  describe("reassigning the aircraft", () => {
    const seed = {
      aircraft: [
        createTestAircraft({ id: "aircraft-1", capacity: 10 }),
        createTestAircraft({ id: "small", capacity: 6 }),
        createTestAircraft({ id: "large", capacity: 12 }),
      ],
      flights: [createTestFlight()],
      reservations: [createTestReservation({ seats: 8 })],
    };

    it("refuses an aircraft too small for the reserved seats", async () => {
      const error = await run(
        FleetService.pipe(
          Effect.flatMap((fleet) =>
            fleet.updateFlight(makeFlightId("flight-1"), {
              aircraftId: makeAircraftId("small"),
            }),
          ),
          Effect.flip,
        ),
        { seed },
      );

      expect(error).toBeInstanceOf(ConflictError);
      expect(error).toMatchObject({
        entity: "Flight",
        reason: "8 seats are reserved but the aircraft holds 6",
      });
    });

    it("moves the flight and advances its ledger", async () => {
      const flight = await run(
        FleetService.pipe(
          Effect.flatMap((fleet) =>
            fleet.updateFlight(makeFlightId("flight-1"), {
              aircraftId: makeAircraftId("large"),
              fare: "120.00",
            }),
          ),
        ),
        { seed },
      );

      expect(flight.aircraftId).toBe("large");
      expect(flight.fare.toFixed()).toBe("120.00");
      expect(flight.ledgerVersion).toBe(1);
    });
  });

  describe("on an out-of-service aircraft", () => {
    const seed = {
      aircraft: [createTestAircraft({ status: "unavailable" })],
      flights: [createTestFlight({ status: "blocked" })],
      users: [createTestUser({ id: "user-1" })],
    };

    it("keeps the flight blocked when asked to activate it", async () => {
      const flight = await run(
        FleetService.pipe(
          Effect.flatMap((fleet) =>
            fleet.updateFlight(makeFlightId("flight-1"), { status: "active" }),
          ),
        ),
        { seed },
      );

      expect(flight.status).toBe("blocked");
    });

    it("activates the flight once it moves to an available aircraft", async () => {
      const flight = await run(
        FleetService.pipe(
          Effect.flatMap((fleet) =>
            fleet.updateFlight(makeFlightId("flight-1"), {
              status: "active",
              aircraftId: makeAircraftId("spare"),
            }),
          ),
        ),
        {
          seed: {
            ...seed,
            aircraft: [...seed.aircraft, createTestAircraft({ id: "spare" })],
          },
        },
      );

      expect(flight.status).toBe("active");
      expect(flight.aircraftId).toBe("spare");
    });

    it("accepts no bookings after a later status change", async () => {
      const error = await run(
        Effect.gen(function* () {
          const fleet = yield* FleetService;
          const reservations = yield* ReservationService;
          yield* fleet.updateFlight(makeFlightId("flight-1"), { status: "active" });
          yield* fleet.updateAircraft(aircraftId, { status: "blocked" });
          return yield* Effect.flip(
            reservations.create({
              flightId: makeFlightId("flight-1"),
              userId: makeUserId("user-1"),
              seats: 2,
            }),
          );
        }),
        { seed },
      );

      expect(error).toBeInstanceOf(InvalidInputError);
      expect(error).toMatchObject({ field: "flightId" });
    });
  });

  it("refuses to delete a flight with reservations", async () => {
    const error = await run(
      FleetService.pipe(
        Effect.flatMap((fleet) => fleet.deleteFlight(makeFlightId("flight-1"))),
        Effect.flip,
      ),
      {
        seed: {
          aircraft: [createTestAircraft()],
          flights: [createTestFlight()],
          reservations: [createTestReservation({ status: "CANCELLED" })],
        },
      },
    );

    expect(error).toBeInstanceOf(ConflictError);
    expect(error).toMatchObject({ entity: "Flight", id: "flight-1" });
  });

  it("reports a reservation made during the delete as a conflict", async () => {
    const { error, state } = await run(
      Effect.gen(function* () {
        const fleet = yield* FleetService;
        const error = yield* Effect.flip(fleet.deleteFlight(makeFlightId("flight-1")));
        return { error, state: yield* storeState };
      }),
      {
        seed: { aircraft: [createTestAircraft()], flights: [createTestFlight()] },
        decorate: {
          flights: (base) => ({
            ...base,
            delete: (id) =>
              Effect.fail(
                new ConflictError({
                  entity: "Flight",
                  id,
                  reason: "Flight is still referenced by reservations",
                }),
              ),
          }),
        },
      },
    );

    expect(error).toBeInstanceOf(ConflictError);
    expect(error).toMatchObject({ entity: "Flight", id: "flight-1" });
    expect(state.flights.has("flight-1")).toBe(true);
  });
});
