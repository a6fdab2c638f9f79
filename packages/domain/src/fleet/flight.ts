import { Option, Schema } from "effect";
import { AircraftId, FlightId, Money, PlaceName } from "../kernel.js";

export const FlightStatus = {
	ACTIVE: "active",
	CANCELLED: "cancelled",
	BLOCKED: "blocked",
} as const;

export type FlightStatus = (typeof FlightStatus)[keyof typeof FlightStatus];

export const FlightStatusSchema = Schema.Enums(FlightStatus);

// Spellings of "cancelled" found in imported flight data
export const CANCELLED_FLIGHT_STATUS_SYNONYMS = [
	"annule",
	"annulé",
	"annulee",
	"annulée",
	"cancelled",
	"canceled",
] as const;

export const ACTIVE_FLIGHT_STATUS_SYNONYMS = ["active", "actif"] as const;

export const BLOCKED_FLIGHT_STATUS_SYNONYMS = ["blocked", "bloque", "bloqué"] as const;

const FLIGHT_STATUS_ALIASES: Record<string, FlightStatus> = {
	...Object.fromEntries(
		ACTIVE_FLIGHT_STATUS_SYNONYMS.map((s) => [s, FlightStatus.ACTIVE]),
	),
	...Object.fromEntries(
		BLOCKED_FLIGHT_STATUS_SYNONYMS.map((s) => [s, FlightStatus.BLOCKED]),
	),
	...Object.fromEntries(
		CANCELLED_FLIGHT_STATUS_SYNONYMS.map((s) => [s, FlightStatus.CANCELLED]),
	),
};

/**
 * Maps a stored status string onto the closed flight status set.
 * Matching is case-insensitive; unknown spellings yield None.
 */
export const normalizeFlightStatus = (
	raw: string,
): Option.Option<FlightStatus> =>
	Option.fromNullable(FLIGHT_STATUS_ALIASES[raw.trim().toLowerCase()]);

export class Flight extends Schema.Class<Flight>("Flight")({
	id: FlightId,
	origin: PlaceName,
	destination: PlaceName,
	departureAt: Schema.Date,
	arrivalAt: Schema.Option(Schema.Date),
	fare: Money,
	status: FlightStatusSchema,
	aircraftId: AircraftId,
	ledgerVersion: Schema.Number.pipe(Schema.int(), Schema.nonNegative()),
}) {
	isActive(): boolean {
		return this.status === FlightStatus.ACTIVE;
	}

	// Only active flights are forced to blocked; cancelled ones keep their status.
	block(): Flight {
		if (!this.isActive()) return this;
		return new Flight({ ...this, status: FlightStatus.BLOCKED });
	}

	/** Short route label, e.g. `GOM-KIN`. */
	routeCode(): string {
		const code = (place: string) =>
			place.replace(/[^A-Za-z]/g, "").slice(0, 3).toUpperCase();
		return `${code(this.origin)}-${code(this.destination)}`;
	}

	route(): string {
		return `${this.origin} → ${this.destination}`;
	}
}
