import { SqlError } from "@effect/sql";
import { fc, test } from "@fast-check/vitest";
import { ConflictError, PersistenceError } from "@workspace/domain/errors";
import { describe, expect, it } from "vitest";
import {
  classifyDatabaseError,
  decodeFailure,
  sanitizeErrorMessage,
  toDeleteError,
  toPersistenceError,
} from "../../../errors/error-mapper.js";
import {
  DatabaseError,
  DataIntegrityError,
  DuplicateEntityError,
  PersistenceTimeoutError,
  ReferenceNotFoundError,
  RowDecodeError,
} from "../../../errors.js";

const pgError = (fields: Record<string, string>) =>
  Object.assign(new Error("driver error"), fields);

describe("classifyDatabaseError", () => {
  it("maps unique violations with the entity taken from the constraint", () => {
    const error = classifyDatabaseError(
      pgError({
        code: "23505",
        constraint: "payments_reference_key",
        detail: "Key (reference)=(K7Q2ZD) already exists.",
      }),
    );

    expect(error).toBeInstanceOf(DuplicateEntityError);
    if (error._tag === "DuplicateEntityError") {
      expect(error.entityType).toBe("payments");
      expect(error.constraint).toBe("payments_reference_key");
      expect(error.id).toBe("K7Q2ZD");
    }
  });

  it("resolves table names containing underscores", () => {
    const error = classifyDatabaseError(
      pgError({ code: "23505", constraint: "payment_methods_label_key" }),
    );

    expect(error._tag).toBe("DuplicateEntityError");
    if (error._tag === "DuplicateEntityError") {
      expect(error.entityType).toBe("payment_methods");
      expect(error.id).toBe("unknown");
    }
  });

  it("unwraps SqlError before reading the driver code", () => {
    const error = classifyDatabaseError(
      new SqlError.SqlError({
        cause: pgError({
          code: "23503",
          constraint: "reservations_flight_id_flights_id_fk",
          detail: 'Key (flight_id)=(f-1) is not present in table "flights".',
        }),
        message: "Failed to execute statement",
      }),
    );

    expect(error).toBeInstanceOf(ReferenceNotFoundError);
    if (error._tag === "ReferenceNotFoundError") {
      expect(error.referencedEntity).toBe("flights");
      expect(error.referencedId).toBe("f-1");
    }
  });

  it("maps statement timeouts", () => {
    expect(classifyDatabaseError(pgError({ code: "57014" }))).toBeInstanceOf(
      PersistenceTimeoutError,
    );
  });

  it.each(["22P02", "22003"])("maps data format code %s", (code) => {
    const error = classifyDatabaseError(pgError({ code }));
    expect(error).toBeInstanceOf(DataIntegrityError);
    expect(error._tag === "DataIntegrityError" && error.message).toBe(
      "Invalid data format",
    );
  });

  it("falls back to a sanitized DatabaseError", () => {
    const error = classifyDatabaseError(
      new Error("connect ECONNREFUSED 10.0.0.12:5432"),
    );

    expect(error).toBeInstanceOf(DatabaseError);
    expect(error._tag === "DatabaseError" && error.message).toBe(
      "connect ECONNREFUSED <ip-address>:5432",
    );
  });

  test.prop([fc.string()])("never throws on arbitrary input", (input) => {
    expect(classifyDatabaseError(input)._tag).toBe("DatabaseError");
  });
});

describe("toPersistenceError", () => {
  it("describes the failure without driver text", () => {
    const error = toPersistenceError("payments.insert")(
      pgError({ code: "23505", constraint: "payments_reference_key" }),
    );

    expect(error).toBeInstanceOf(PersistenceError);
    expect(error.operation).toBe("payments.insert");
    expect(error.reason).toBe("Duplicate payments (payments_reference_key)");
  });

  it("reports timeouts", () => {
    expect(toPersistenceError("flights.ledger")(pgError({ code: "57014" })).reason).toBe(
      "Database query timed out",
    );
  });
});

describe("toDeleteError", () => {
  it("turns a row that is still referenced into a conflict", () => {
    const error = toDeleteError("flights.delete", "Flight", "f-1")(
      new SqlError.SqlError({
        cause: pgError({
          code: "23503",
          constraint: "reservations_flight_id_flights_id_fk",
          detail: 'Key (id)=(f-1) is still referenced from table "reservations".',
        }),
        message: "Failed to execute statement",
      }),
    );

    expect(error).toBeInstanceOf(ConflictError);
    expect(error).toMatchObject({
      entity: "Flight",
      id: "f-1",
      reason: "Flight is still referenced by reservations",
    });
  });

  it("keeps other failures as persistence errors", () => {
    const error = toDeleteError("aircraft.delete", "Aircraft", "a-1")(
      pgError({ code: "57014" }),
    );

    expect(error).toBeInstanceOf(PersistenceError);
    expect(error).toMatchObject({
      operation: "aircraft.delete",
      reason: "Database query timed out",
    });
  });
});

describe("decodeFailure", () => {
  it("names the row and field", () => {
    const error = decodeFailure("flights.findById")(
      new RowDecodeError({ table: "flights", id: "f-1", field: "fare" }),
    );

    expect(error.operation).toBe("flights.findById");
    expect(error.reason).toBe("Stored flights f-1 has an invalid fare");
  });
});

describe("sanitizeErrorMessage", () => {
  it("strips connection strings", () => {
    expect(
      sanitizeErrorMessage(
        "failed for postgres://app:pw@db.internal:5432/bookings",
      ),
    ).toBe("failed for <connection-string>");
  });

  it("redacts the word after a credential keyword", () => {
    expect(sanitizeErrorMessage("password authentication failed")).toBe(
      "password <redacted> failed",
    );
  });

  it("hides file paths", () => {
    expect(sanitizeErrorMessage("at /srv/app/src/db/schema.ts")).toBe(
      "at <file-path>",
    );
  });

  it("keeps ordinary messages", () => {
    expect(sanitizeErrorMessage("relation does not exist")).toBe(
      "relation does not exist",
    );
  });
});
