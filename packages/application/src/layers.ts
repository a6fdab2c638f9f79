import { Layer } from "effect";
import { CapacityLedger } from "./services/capacity-ledger.service.js";
import { FleetService } from "./services/fleet.service.js";
import { FlightCatalogService } from "./services/flight-catalog.service.js";
import { PaymentService } from "./services/payment.service.js";
import { ReportingService } from "./services/reporting.service.js";
import { ReservationService } from "./services/reservation.service.js";
import { UserDirectory } from "./services/user-directory.service.js";

/**
 * Every application service. Requires the repository, query, gateway and
 * unit-of-work ports from an adapter layer.
 */
export const ApplicationLive = Layer.mergeAll(
  ReservationService.Live,
  PaymentService.Live,
  FleetService.Live,
  FlightCatalogService.Live,
  ReportingService.Live,
  UserDirectory.Live,
).pipe(Layer.provideMerge(CapacityLedger.Live));
