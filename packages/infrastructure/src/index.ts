import { Layer } from "effect";
import { ConnectionPoolLive } from "./db/connection.js";
import { HmacIdentityGatewayLive } from "./gateways/identity-gateway.js";
import { ResendReceiptGatewayLive } from "./gateways/notification-gateway.js";
import { PostgresFlightCatalogQueries } from "./queries/flight-catalog-queries.js";
import { PostgresReportingQueries } from "./queries/reporting-queries.js";
import { PostgresAircraftRepository } from "./repositories/postgres-aircraft.repository.js";
import { PostgresFlightRepository } from "./repositories/postgres-flight.repository.js";
import { PostgresPaymentRepository } from "./repositories/postgres-payment.repository.js";
import { PostgresReservationRepository } from "./repositories/postgres-reservation.repository.js";
import { PostgresUserRepository } from "./repositories/postgres-user.repository.js";
import { PostgresUnitOfWork } from "./repositories/unit-of-work.js";
import { AuditLogger } from "./services/audit-logger.js";
import { HealthCheck } from "./services/health-check.js";

export { AuditLogger, UserContext } from "./services/audit-logger.js";
export { HealthCheck, type HealthCheckResult } from "./services/health-check.js";

// --- 1. Base Infrastructure Services ---
// Depend on the connection pool and provide: SqlClient, AuditLogger, HealthCheck
const ServicesLive = Layer.mergeAll(AuditLogger.Live, HealthCheck.Live).pipe(
  Layer.provideMerge(ConnectionPoolLive),
);

// --- 2. Application Adapters (Repositories, Queries, Gateways) ---
export const InfrastructureLive = Layer.mergeAll(
  PostgresAircraftRepository.Live,
  PostgresFlightRepository.Live,
  PostgresReservationRepository.Live,
  PostgresPaymentRepository.Live,
  PostgresUserRepository.Live,
  PostgresUnitOfWork.Live,
  PostgresFlightCatalogQueries.Live,
  PostgresReportingQueries.Live,
  ResendReceiptGatewayLive,
  HmacIdentityGatewayLive,
).pipe(Layer.provideMerge(ServicesLive));
