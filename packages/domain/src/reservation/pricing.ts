import { Schema } from "effect";
import { Money } from "../kernel.js";

/**
 * Price snapshot stored with a reservation.
 *
 * `total = unitFare * seats + serviceFee`. The service fee is charged once
 * per reservation regardless of seat count. A breakdown is always rebuilt
 * from scratch when seats change, never adjusted in place.
 */
export class PriceBreakdown extends Schema.Class<PriceBreakdown>(
	"PriceBreakdown",
)({
	unitFare: Money,
	subtotal: Money,
	serviceFee: Money,
	total: Money,
}) {
	static quote(props: {
		unitFare: Money;
		seats: number;
		serviceFee: Money;
	}): PriceBreakdown {
		const subtotal = props.unitFare.multiply(props.seats);
		return new PriceBreakdown({
			unitFare: props.unitFare,
			subtotal,
			serviceFee: props.serviceFee,
			total: subtotal.add(props.serviceFee),
		});
	}
}
