import { HttpApiBuilder } from "@effect/platform";
import { FlightCatalogService } from "@workspace/application/flight-catalog.service";
import { FlightPage, FlightView } from "@workspace/application/read-models";
import { Effect } from "effect";
import { Api } from "../api.js";

export const FlightsApiLive = HttpApiBuilder.group(Api, "flights", (handlers) =>
  handlers
    .handle("search", ({ urlParams }) =>
      Effect.gen(function* () {
        const catalog = yield* FlightCatalogService;
        const result = yield* catalog.search(urlParams);
        return new FlightPage({
          flights: result.listings.map(FlightView.fromListing),
          page: result.page,
          limit: result.limit,
          hasMore: result.hasMore,
        });
      }),
    )
    .handle("get", ({ path }) =>
      Effect.flatMap(FlightCatalogService, (catalog) =>
        catalog.get(path.id),
      ).pipe(Effect.map(FlightView.fromListing)),
    ),
);
