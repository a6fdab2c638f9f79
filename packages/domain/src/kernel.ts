/**
 * @file kernel.ts
 * @module @workspace/domain/kernel
 * @description Shared kernel: identifiers and value objects used by every
 * aggregate (fleet, reservations, payments, reporting).
 */

import { BigDecimal, Option, Schema } from "effect";

// =============================================================================
// AGGREGATE IDS
// =============================================================================

export const AircraftId = Schema.String.pipe(Schema.brand("AircraftId"));
export type AircraftId = typeof AircraftId.Type;
export const makeAircraftId = (id: string): AircraftId => AircraftId.make(id);

export const FlightId = Schema.String.pipe(Schema.brand("FlightId"));
export type FlightId = typeof FlightId.Type;
export const makeFlightId = (id: string): FlightId => FlightId.make(id);

export const ReservationId = Schema.String.pipe(Schema.brand("ReservationId"));
export type ReservationId = typeof ReservationId.Type;
export const makeReservationId = (id: string): ReservationId =>
  ReservationId.make(id);

export const PaymentId = Schema.String.pipe(Schema.brand("PaymentId"));
export type PaymentId = typeof PaymentId.Type;

export const PaymentMethodId = Schema.String.pipe(
  Schema.brand("PaymentMethodId"),
);
export type PaymentMethodId = typeof PaymentMethodId.Type;

export const UserId = Schema.String.pipe(Schema.brand("UserId"));
export type UserId = typeof UserId.Type;
export const makeUserId = (id: string): UserId => UserId.make(id);

// =============================================================================
// SCALARS WITH RULES
// =============================================================================

// City or airport label as entered by fleet administration ("Goma", "Kinshasa")
export const PlaceName = Schema.Trim.pipe(
  Schema.nonEmptyString(),
  Schema.maxLength(100),
);

export const SeatCount = Schema.Int.pipe(Schema.positive());

// --- Payment reference code (printed on receipts) ---
export const ReferenceCodeSchema = Schema.String.pipe(
  Schema.pattern(/^[A-Z0-9]{6}$/),
  Schema.brand("ReferenceCode"),
);
export type ReferenceCode = typeof ReferenceCodeSchema.Type;

// --- Mobile money account (9 digits, no country prefix) ---
export const SettlementReferenceSchema = Schema.String.pipe(
  Schema.pattern(/^\d{9}$/),
  Schema.brand("SettlementReference"),
);
export type SettlementReference = typeof SettlementReferenceSchema.Type;

// =============================================================================
// MONEY
// =============================================================================

const MAX_FRACTION_DIGITS = 2;

const hasCentPrecision = (value: BigDecimal.BigDecimal): boolean =>
  BigDecimal.normalize(value).scale <= MAX_FRACTION_DIGITS;

/**
 * Exact decimal amount in the booking currency.
 * Amounts never carry more than two fraction digits, so sums and integer
 * multiples stay exact and render without rounding.
 */
export class Money extends Schema.Class<Money>("Money")({
  amount: Schema.BigDecimal.pipe(
    Schema.nonNegativeBigDecimal(),
    Schema.filter(hasCentPrecision, {
      message: () => "Money supports at most two fraction digits",
    }),
  ),
}) {
  static zero(): Money {
    return new Money({ amount: BigDecimal.fromBigInt(0n) });
  }

  static of(amount: BigDecimal.BigDecimal): Money {
    return new Money({ amount: BigDecimal.normalize(amount) });
  }

  /**
   * Parses "12.50"-style input. None for malformed, negative or
   * sub-cent amounts.
   */
  static parse(input: string): Option.Option<Money> {
    return BigDecimal.fromString(input.trim()).pipe(
      Option.filter(
        (amount) => !BigDecimal.isNegative(amount) && hasCentPrecision(amount),
      ),
      Option.map(Money.of),
    );
  }

  add(other: Money): Money {
    return Money.of(BigDecimal.sum(this.amount, other.amount));
  }

  multiply(factor: number): Money {
    return Money.of(
      BigDecimal.multiply(this.amount, BigDecimal.fromBigInt(BigInt(factor))),
    );
  }

  equals(other: Money): boolean {
    return BigDecimal.equals(this.amount, other.amount);
  }

  isZero(): boolean {
    return BigDecimal.isZero(this.amount);
  }

  /** Fixed two-digit rendering, e.g. `262.50`. */
  toFixed(): string {
    const cents = BigDecimal.scale(this.amount, MAX_FRACTION_DIGITS).value;
    const whole = cents / 100n;
    const fraction = (cents % 100n).toString().padStart(2, "0");
    return `${whole}.${fraction}`;
  }
}
