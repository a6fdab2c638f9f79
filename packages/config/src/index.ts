import { BigDecimal, Config, ConfigError, Either, Option, Redacted } from "effect";

// ============================================================================
// Helpers
// ============================================================================

const isDevOrTest =
  process.env.NODE_ENV === "development" || process.env.NODE_ENV === "test";

/**
 * Creates a redacted configuration value with a fallback for development/test.
 */
export const secret = (name: string, mock?: string) => {
  const config = Config.redacted(name);
  if (isDevOrTest && mock) {
    return config.pipe(Config.withDefault(Redacted.make(mock)));
  }
  return config;
};

const SENSITIVE_KEY_PATTERNS = [
  "password",
  "secret",
  "token",
  "apikey",
  "api_key",
  "key",
  "privatekey",
  "signingkey",
];

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

/**
 * Helper to redact sensitive values in logs
 */
export function redactSensitiveConfig(config: unknown): unknown {
  if (config === null || config === undefined) {
    return config;
  }

  if (Redacted.isRedacted(config)) {
    return "<redacted>";
  }

  if (Array.isArray(config)) {
    return config.map(redactSensitiveConfig);
  }

  if (isRecord(config)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(config)) {
      const lowerKey = key.toLowerCase();
      if (SENSITIVE_KEY_PATTERNS.some((p) => lowerKey.includes(p))) {
        result[key] = "<redacted>";
      } else {
        result[key] = redactSensitiveConfig(value);
      }
    }
    return result;
  }

  return config;
}

// ============================================================================
// Shared Configs
// ============================================================================

const nodeEnv = Config.string("NODE_ENV").pipe(
  Config.withDefault("development"),
);

const positiveInt = (name: string, fallback: number) =>
  Config.integer(name).pipe(
    Config.withDefault(fallback),
    Config.mapOrFail((value) =>
      value > 0
        ? Either.right(value)
        : Either.left(
            ConfigError.InvalidData([name], `${name} must be a positive integer`),
          ),
    ),
  );

// ============================================================================
// Database Config
// ============================================================================

/**
 * Standard libpq variables, shared by the SQL client pool and the migrator.
 */
export const DatabaseConfig = Config.all({
  host: Config.string("PGHOST").pipe(Config.withDefault("localhost")),
  port: Config.integer("PGPORT").pipe(Config.withDefault(5432)),
  database: Config.string("PGDATABASE").pipe(Config.withDefault("reservations")),
  user: Config.string("PGUSER").pipe(Config.withDefault("postgres")),
  password: secret("PGPASSWORD", "postgres"),
  ssl: Config.string("PGSSLMODE").pipe(
    Config.withDefault("disable"),
    Config.map((mode) => mode === "require"),
  ),
});

export type DatabaseConfig = Config.Config.Success<typeof DatabaseConfig>;

// ============================================================================
// Gateway Configs
// ============================================================================

export const ResendConfig = Config.all({
  apiKey: secret("RESEND_API_KEY", "resend_test_mock"),
  fromEmail: Config.string("RESEND_FROM_EMAIL").pipe(
    Config.withDefault("receipts@example.com"),
  ),
  timeout: Config.number("RESEND_TIMEOUT").pipe(Config.withDefault(15)),
  maxRetries: Config.number("RESEND_MAX_RETRIES").pipe(Config.withDefault(3)),
});

export type ResendConfig = Config.Config.Success<typeof ResendConfig>;

export const AuthConfig = Config.all({
  jwtSecret: secret("AUTH_JWT_SECRET", "dev-only-signing-secret"),
  issuer: Config.string("AUTH_JWT_ISSUER").pipe(Config.option),
});

export type AuthConfig = Config.Config.Success<typeof AuthConfig>;

// ============================================================================
// Booking Rules
// ============================================================================

/**
 * Fixed fee added once per reservation. Must be a non-negative amount with
 * at most two fraction digits.
 */
const serviceFee = Config.string("BOOKING_SERVICE_FEE").pipe(
  Config.withDefault("12.50"),
  Config.mapOrFail((raw) =>
    BigDecimal.fromString(raw.trim()).pipe(
      Option.filter(
        (amount) =>
          !BigDecimal.isNegative(amount) &&
          BigDecimal.normalize(amount).scale <= 2,
      ),
      Option.match({
        onNone: () =>
          Either.left(
            ConfigError.InvalidData(
              ["BOOKING_SERVICE_FEE"],
              `BOOKING_SERVICE_FEE must be a non-negative amount with at most two decimals, got "${raw}"`,
            ),
          ),
        onSome: (amount) => Either.right(BigDecimal.normalize(amount)),
      }),
    ),
  ),
);

export const BookingConfig = Config.all({
  serviceFee,
  currency: Config.string("BOOKING_CURRENCY").pipe(Config.withDefault("USD")),
  paymentMethodLabel: Config.string("PAYMENT_METHOD_LABEL").pipe(
    Config.withDefault("Mobile Money"),
  ),
  maxCommitRetries: positiveInt("BOOKING_MAX_COMMIT_RETRIES", 10),
});

export type BookingConfig = Config.Config.Success<typeof BookingConfig>;

// ============================================================================
// Internal Service Configs
// ============================================================================

export const HealthConfig = Config.all({
  timeout: Config.number("HEALTH_TIMEOUT").pipe(Config.withDefault(5)),
  cacheTTL: Config.number("HEALTH_CACHE_TTL").pipe(Config.withDefault(10)),
  version: Config.string("APP_VERSION").pipe(Config.withDefault("0.1.0")),
});

export type HealthConfig = Config.Config.Success<typeof HealthConfig>;

// ============================================================================
// API Config
// ============================================================================

export const ApiConfig = Config.all({
  port: Config.number("PORT").pipe(Config.withDefault(3000)),
  corsOrigins: Config.all([
    nodeEnv,
    Config.array(Config.string()).pipe(
      Config.withDefault<Array<string>>([]),
      Config.nested("CORS_ORIGINS"),
    ),
  ]).pipe(
    Config.mapOrFail(([env, origins]) => {
      if (env !== "development" && env !== "test" && origins.length === 0) {
        return Either.left(
          ConfigError.InvalidData(
            [],
            "CORS_ORIGINS must be explicitly set in non-development environments",
          ),
        );
      }
      return Either.right(origins);
    }),
  ),
  nodeEnv,
});

export type ApiConfig = Config.Config.Success<typeof ApiConfig>;

// ============================================================================
// Combined Configs
// ============================================================================

export const InfrastructureConfig = Config.all({
  database: DatabaseConfig,
  resend: ResendConfig,
  auth: AuthConfig,
  health: HealthConfig,
});

export type InfrastructureConfig = Config.Config.Success<
  typeof InfrastructureConfig
>;

export const AppConfig = Config.all({
  api: ApiConfig,
  booking: BookingConfig,
  infrastructure: InfrastructureConfig,
});

export type AppConfig = Config.Config.Success<typeof AppConfig>;
