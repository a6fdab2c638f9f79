/**
 * @file flight-catalog.queries.ts
 * @module @workspace/application/queries
 * @description Read side for flight listings (public search and admin board)
 */

import type { PersistenceError } from "@workspace/domain/errors";
import type { Flight } from "@workspace/domain/flight";
import type { FlightId } from "@workspace/domain/kernel";
import { Context, type Effect, type Option, Schema } from "effect";

export const FlightSort = Schema.Literal("price_asc", "price_desc");
export type FlightSort = typeof FlightSort.Type;

export const MAX_PAGE_SIZE = 100;
export const DEFAULT_PAGE_SIZE = 20;

export interface FlightSearchCriteria {
  readonly origin: Option.Option<string>;
  readonly destination: Option.Option<string>;
  /** Any instant of the wanted UTC departure day */
  readonly departureDate: Option.Option<Date>;
  readonly sort: FlightSort;
  readonly page: number;
  readonly limit: number;
}

/**
 * A flight joined with its aircraft and current occupancy.
 * `capacity` is the raw aircraft value and may be unusable on legacy rows.
 */
export interface FlightListing {
  readonly flight: Flight;
  readonly aircraftModel: string;
  readonly capacity: number;
  readonly occupied: number;
}

export interface FlightCatalogQueriesPort {
  /**
   * Active flights only. Origin and destination match case-insensitively;
   * ties on price are ordered by departure.
   */
  search(
    criteria: FlightSearchCriteria,
  ): Effect.Effect<ReadonlyArray<FlightListing>, PersistenceError>;

  findListing(
    flightId: FlightId,
  ): Effect.Effect<Option.Option<FlightListing>, PersistenceError>;

  /**
   * Every flight regardless of status, by departure.
   */
  board(): Effect.Effect<ReadonlyArray<FlightListing>, PersistenceError>;
}

export class FlightCatalogQueries extends Context.Tag("FlightCatalogQueries")<
  FlightCatalogQueries,
  FlightCatalogQueriesPort
>() {}
