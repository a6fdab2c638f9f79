import {
  InvalidInputError,
  NotFoundError,
  type PersistenceError,
} from "@workspace/domain/errors";
import type { FlightId } from "@workspace/domain/kernel";
import { Context, Effect, Layer, Option } from "effect";
import {
  DEFAULT_PAGE_SIZE,
  FlightCatalogQueries,
  type FlightListing,
  type FlightSort,
  MAX_PAGE_SIZE,
} from "../queries/flight-catalog.queries.js";

export interface FlightSearchParams {
  readonly origin?: string | undefined;
  readonly destination?: string | undefined;
  readonly date?: Date | undefined;
  readonly sort?: FlightSort | undefined;
  readonly page?: number | undefined;
  readonly limit?: number | undefined;
}

export interface FlightSearchPage {
  readonly listings: ReadonlyArray<FlightListing>;
  readonly page: number;
  readonly limit: number;
  /** True when the page came back full; the next page may be empty. */
  readonly hasMore: boolean;
}

export interface FlightCatalogSignature {
  readonly search: (
    params: FlightSearchParams,
  ) => Effect.Effect<FlightSearchPage, InvalidInputError | PersistenceError>;

  /** Bookable flight detail; flights that are not active are not found. */
  readonly get: (
    id: FlightId,
  ) => Effect.Effect<FlightListing, NotFoundError | PersistenceError>;

  /** Every flight with its occupancy, for the back office. */
  readonly board: () => Effect.Effect<
    ReadonlyArray<FlightListing>,
    PersistenceError
  >;
}

const nonBlank = (value: string | undefined) =>
  Option.fromNullable(value).pipe(
    Option.map((v) => v.trim()),
    Option.filter((v) => v.length > 0),
  );

export class FlightCatalogService extends Context.Tag("FlightCatalogService")<
  FlightCatalogService,
  FlightCatalogSignature
>() {
  static readonly Live = Layer.effect(
    FlightCatalogService,
    Effect.gen(function* () {
      const queries = yield* FlightCatalogQueries;

      return FlightCatalogService.of({
        search: (params) =>
          Effect.gen(function* () {
            const page = params.page ?? 1;
            const limit = params.limit ?? DEFAULT_PAGE_SIZE;

            if (!Number.isInteger(page) || page < 1) {
              return yield* Effect.fail(
                new InvalidInputError({
                  field: "page",
                  reason: "Page must be a positive integer",
                }),
              );
            }
            if (!Number.isInteger(limit) || limit < 1 || limit > MAX_PAGE_SIZE) {
              return yield* Effect.fail(
                new InvalidInputError({
                  field: "limit",
                  reason: `Limit must be between 1 and ${MAX_PAGE_SIZE}`,
                }),
              );
            }

            const listings = yield* queries.search({
              origin: nonBlank(params.origin),
              destination: nonBlank(params.destination),
              departureDate: Option.fromNullable(params.date),
              sort: params.sort ?? "price_asc",
              page,
              limit,
            });

            return {
              listings,
              page,
              limit,
              hasMore: listings.length === limit,
            };
          }),

        get: (id) =>
          queries.findListing(id).pipe(
            Effect.flatMap((found) =>
              Option.match(
                Option.filter(found, (listing) => listing.flight.isActive()),
                {
                  onNone: () =>
                    Effect.fail(new NotFoundError({ entity: "Flight", id })),
                  onSome: Effect.succeed,
                },
              ),
            ),
          ),

        board: () => queries.board(),
      });
    }),
  );
}
