/**
 * @file flight-catalog-queries.ts
 * @module @workspace/infrastructure/queries
 * @description Read side for flight search and the back-office board
 */

import { SqlClient } from "@effect/sql";
import {
  FlightCatalogQueries,
  type FlightCatalogQueriesPort,
  type FlightListing,
} from "@workspace/application/flight-catalog.queries";
import { ACTIVE_FLIGHT_STATUS_SYNONYMS } from "@workspace/domain/flight";
import { utcDayRange } from "@workspace/domain/reporting";
import { ReservationStatus } from "@workspace/domain/reservation";
import { Effect, Layer, Option } from "effect";
import { decodeFailure, toPersistenceError } from "../errors/error-mapper.js";
import { type FlightRow, toFlight } from "../repositories/mappers/fleet.mapper.js";
import { isUuid } from "../repositories/mappers/row-decoding.js";

interface FlightListingRow extends FlightRow {
  readonly aircraft_model: string;
  readonly capacity: number;
  readonly occupied: number;
}

const toListing = (row: FlightListingRow) =>
  toFlight(row).pipe(
    Effect.map(
      (flight): FlightListing => ({
        flight,
        aircraftModel: row.aircraft_model,
        capacity: row.capacity,
        occupied: row.occupied,
      }),
    ),
  );

export class PostgresFlightCatalogQueries {
  /**
   * Live Layer: PostgreSQL implementation.
   */
  static readonly Live = Layer.effect(
    FlightCatalogQueries,
    Effect.gen(function* () {
      const sql = yield* SqlClient.SqlClient;

      const listingSelect = sql`
        SELECT f.id, f.origin, f.destination, f.departure_at, f.arrival_at,
               f.fare, f.status, f.aircraft_id, f.ledger_version,
               a.model AS aircraft_model,
               a.capacity,
               COALESCE((
                 SELECT SUM(r.seats)
                 FROM reservations r
                 WHERE r.flight_id = f.id
                   AND upper(r.status) <> ${ReservationStatus.CANCELLED}
               ), 0)::int AS occupied
        FROM flights f
        JOIN aircraft a ON a.id = f.aircraft_id
      `;

      const decodeListings = (operation: string) =>
        (rows: ReadonlyArray<FlightListingRow>) =>
          Effect.forEach(rows, toListing).pipe(
            Effect.mapError(decodeFailure(operation)),
          );

      const search: FlightCatalogQueriesPort["search"] = (criteria) => {
        const conditions = [
          sql`lower(trim(f.status)) IN ${sql.in([...ACTIVE_FLIGHT_STATUS_SYNONYMS])}`,
          ...Option.toArray(
            Option.map(criteria.origin, (origin) => sql`lower(f.origin) = ${origin.toLowerCase()}`),
          ),
          ...Option.toArray(
            Option.map(
              criteria.destination,
              (destination) => sql`lower(f.destination) = ${destination.toLowerCase()}`,
            ),
          ),
          ...Option.toArray(
            Option.map(criteria.departureDate, (date) => {
              const [start, end] = utcDayRange(date);
              return sql`f.departure_at >= ${start} AND f.departure_at < ${end}`;
            }),
          ),
        ];
        const ordering =
          criteria.sort === "price_desc"
            ? sql`ORDER BY f.fare DESC, f.departure_at ASC`
            : sql`ORDER BY f.fare ASC, f.departure_at ASC`;

        return sql<FlightListingRow>`
          ${listingSelect}
          WHERE ${sql.and(conditions)}
          ${ordering}
          LIMIT ${criteria.limit}
          OFFSET ${(criteria.page - 1) * criteria.limit}
        `.pipe(
          Effect.mapError(toPersistenceError("catalog.search")),
          Effect.flatMap(decodeListings("catalog.search")),
        );
      };

      const findListing: FlightCatalogQueriesPort["findListing"] = (flightId) =>
        isUuid(flightId)
          ? sql<FlightListingRow>`
              ${listingSelect}
              WHERE f.id = ${flightId}
            `.pipe(
              Effect.mapError(toPersistenceError("catalog.findListing")),
              Effect.flatMap(decodeListings("catalog.findListing")),
              Effect.map((listings) => Option.fromNullable(listings[0])),
            )
          : Effect.succeed(Option.none());

      const board: FlightCatalogQueriesPort["board"] = () =>
        sql<FlightListingRow>`
          ${listingSelect}
          ORDER BY f.departure_at ASC
        `.pipe(
          Effect.mapError(toPersistenceError("catalog.board")),
          Effect.flatMap(decodeListings("catalog.board")),
        );

      return FlightCatalogQueries.of({ search, findListing, board });
    }),
  );
}
