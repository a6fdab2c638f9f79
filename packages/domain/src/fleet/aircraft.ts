import { Option, Schema } from "effect";
import { AircraftId } from "../kernel.js";

export const AircraftStatus = {
	AVAILABLE: "available",
	UNAVAILABLE: "unavailable",
	BLOCKED: "blocked",
} as const;

export type AircraftStatus =
	(typeof AircraftStatus)[keyof typeof AircraftStatus];

export const AircraftStatusSchema = Schema.Enums(AircraftStatus);

export class Aircraft extends Schema.Class<Aircraft>("Aircraft")({
	id: AircraftId,
	model: Schema.Trim.pipe(Schema.nonEmptyString(), Schema.maxLength(100)),
	capacity: Schema.Int.pipe(Schema.positive()),
	status: AircraftStatusSchema,
	airline: Schema.Option(Schema.String),
}) {
	isAvailable(): boolean {
		return this.status === AircraftStatus.AVAILABLE;
	}

	/**
	 * True when `next` is a change into an out-of-service status, which
	 * forces the aircraft's active flights to `blocked`. This holds between
	 * two out-of-service statuses too.
	 */
	leavesServiceWith(next: AircraftStatus): boolean {
		return next !== this.status && next !== AircraftStatus.AVAILABLE;
	}

	static create(props: {
		id: AircraftId;
		model: string;
		capacity: number;
		status?: AircraftStatus;
		airline?: string;
	}): Aircraft {
		return new Aircraft({
			id: props.id,
			model: props.model,
			capacity: props.capacity,
			status: props.status ?? AircraftStatus.AVAILABLE,
			airline: Option.fromNullable(props.airline),
		});
	}
}

const AIRCRAFT_STATUS_ALIASES: Record<string, AircraftStatus> = {
	available: AircraftStatus.AVAILABLE,
	disponible: AircraftStatus.AVAILABLE,
	unavailable: AircraftStatus.UNAVAILABLE,
	indisponible: AircraftStatus.UNAVAILABLE,
	maintenance: AircraftStatus.UNAVAILABLE,
	blocked: AircraftStatus.BLOCKED,
	bloque: AircraftStatus.BLOCKED,
	"bloqué": AircraftStatus.BLOCKED,
};

/** Maps stored status spellings onto the closed aircraft status set. */
export const normalizeAircraftStatus = (
	raw: string,
): Option.Option<AircraftStatus> =>
	Option.fromNullable(AIRCRAFT_STATUS_ALIASES[raw.trim().toLowerCase()]);
