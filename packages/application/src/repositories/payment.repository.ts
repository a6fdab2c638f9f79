import type {
	DuplicatePaymentError,
	PersistenceError,
} from "@workspace/domain/errors";
import type { ReferenceCode, ReservationId } from "@workspace/domain/kernel";
import type { Payment, PaymentMethod } from "@workspace/domain/payment";
import { Context, type Effect, type Option } from "effect";

export interface PaymentRepositoryPort {
	findByReservation(
		reservationId: ReservationId,
	): Effect.Effect<Option.Option<Payment>, PersistenceError>;

	referenceExists(
		reference: ReferenceCode,
	): Effect.Effect<boolean, PersistenceError>;

	/**
	 * Fails with DuplicatePaymentError when the reservation already has a
	 * payment, including one committed concurrently.
	 */
	insert(
		payment: Payment,
	): Effect.Effect<Payment, DuplicatePaymentError | PersistenceError>;

	/**
	 * Returns the method with this label, creating it on first use.
	 */
	resolveMethod(label: string): Effect.Effect<PaymentMethod, PersistenceError>;
}

export class PaymentRepository extends Context.Tag("PaymentRepository")<
	PaymentRepository,
	PaymentRepositoryPort
>() {}
