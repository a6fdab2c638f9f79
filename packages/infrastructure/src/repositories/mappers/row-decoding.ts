import { Money } from "@workspace/domain/kernel";
import { Effect, Option } from "effect";
import { RowDecodeError } from "../../errors.js";

export interface RowRef {
  readonly table: string;
  readonly id: string;
}

// pg returns NUMERIC columns as strings
export const decodeMoney = (
  raw: string,
  ref: RowRef,
  field: string,
): Effect.Effect<Money, RowDecodeError> =>
  Option.match(Money.parse(raw), {
    onNone: () => Effect.fail(new RowDecodeError({ ...ref, field })),
    onSome: Effect.succeed,
  });

/** Builds a domain object, turning constructor validation failures into RowDecodeError. */
export const construct = <A>(
  ref: RowRef,
  build: () => A,
): Effect.Effect<A, RowDecodeError> =>
  Effect.try({
    try: build,
    catch: () => new RowDecodeError({ ...ref, field: "row" }),
  });

const UUID_PATTERN =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

// Lookups by a malformed id find nothing instead of raising 22P02
export const isUuid = (value: string): boolean => UUID_PATTERN.test(value);
