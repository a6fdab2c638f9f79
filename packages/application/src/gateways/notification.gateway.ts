/**
 * @file notification.gateway.ts
 * @module @workspace/application/gateways
 * @description Port for outbound customer notifications (payment receipts)
 *
 * The application layer hands over a fully computed receipt; the adapter only
 * renders and delivers it.
 */

import type { Money, PaymentId, ReferenceCode } from "@workspace/domain/kernel";
import { Context, Data, type Effect } from "effect";

// ============================================================================
// Types
// ============================================================================

/**
 * Result of a successful notification send
 */
export interface NotificationResult {
  /** Unique message ID from the notification provider */
  readonly messageId: string;
}

export interface EmailRecipient {
  readonly email: string;
  readonly name?: string;
}

/**
 * Everything printed on a payment receipt. Amounts are the reservation's
 * price snapshot; `taxes` is the service fee charged on top of the fare.
 */
export interface PaymentReceipt {
  readonly paymentId: PaymentId;
  readonly reference: ReferenceCode;
  readonly payerName: string;
  readonly origin: string;
  readonly destination: string;
  readonly departureAt: Date;
  readonly seats: number;
  readonly subtotal: Money;
  readonly taxes: Money;
  readonly total: Money;
  readonly paymentMethod: string;
  readonly paidAt: Date;
}

// ============================================================================
// Errors
// ============================================================================

/**
 * API is unavailable (network error, timeout)
 */
export class NotificationApiUnavailableError extends Data.TaggedError(
  "NotificationApiUnavailableError",
)<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

/**
 * Invalid API key or authentication failure
 */
export class NotificationAuthenticationError extends Data.TaggedError(
  "NotificationAuthenticationError",
)<{
  readonly message: string;
}> {}

export class InvalidRecipientError extends Data.TaggedError(
  "InvalidRecipientError",
)<{
  readonly email: string;
  readonly reason: string;
}> {}

export class NotificationRateLimitError extends Data.TaggedError(
  "NotificationRateLimitError",
)<{
  readonly retryAfterSeconds?: number;
}> {}

export type NotificationError =
  | NotificationApiUnavailableError
  | NotificationAuthenticationError
  | InvalidRecipientError
  | NotificationRateLimitError;

/** Errors worth another attempt. */
export const isTransientNotificationError = (
  error: NotificationError,
): boolean =>
  error._tag === "NotificationApiUnavailableError" ||
  error._tag === "NotificationRateLimitError";

// ============================================================================
// Service Interface
// ============================================================================

export interface NotificationGatewayService {
  readonly sendReceipt: (
    receipt: PaymentReceipt,
    recipient: EmailRecipient,
  ) => Effect.Effect<NotificationResult, NotificationError>;
}

export class NotificationGateway extends Context.Tag("NotificationGateway")<
  NotificationGateway,
  NotificationGatewayService
>() {}
