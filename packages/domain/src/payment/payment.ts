import { Schema } from "effect";
import {
	Money,
	PaymentId,
	PaymentMethodId,
	ReferenceCodeSchema,
	ReservationId,
	SettlementReferenceSchema,
} from "../kernel.js";
import type { Reservation } from "../reservation/reservation.js";

export class PaymentMethod extends Schema.Class<PaymentMethod>("PaymentMethod")(
	{
		id: PaymentMethodId,
		label: Schema.Trim.pipe(Schema.nonEmptyString(), Schema.maxLength(50)),
	},
) {}

// At most one Payment exists per Reservation
export class Payment extends Schema.Class<Payment>("Payment")({
	id: PaymentId,
	reference: ReferenceCodeSchema,
	reservationId: ReservationId,
	methodId: PaymentMethodId,
	amount: Money,
	settlementReference: SettlementReferenceSchema,
	paidAt: Schema.Date,
}) {
	// The amount is always the reservation total at settlement time
	static record(props: {
		id: PaymentId;
		reference: typeof ReferenceCodeSchema.Type;
		reservation: Reservation;
		method: PaymentMethod;
		settlementReference: typeof SettlementReferenceSchema.Type;
		paidAt?: Date;
	}): Payment {
		return new Payment({
			id: props.id,
			reference: props.reference,
			reservationId: props.reservation.id,
			methodId: props.method.id,
			amount: props.reservation.price.total,
			settlementReference: props.settlementReference,
			paidAt: props.paidAt ?? new Date(),
		});
	}
}
