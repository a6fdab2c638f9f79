/**
 * HS256 bearer token verification.
 *
 * Tokens are issued by the external identity provider with a shared secret.
 * Only the signature, `exp`, `sub` and (when configured) `iss` are checked.
 */

import * as crypto from "node:crypto";
import { IdentityGateway } from "@workspace/application/identity.gateway";
import { AuthConfig } from "@workspace/config";
import { UnauthorizedError } from "@workspace/domain/errors";
import { makeUserId } from "@workspace/domain/kernel";
import { Clock, Effect, Layer, Option, Redacted, Schema } from "effect";

const TokenHeader = Schema.parseJson(
  Schema.Struct({
    alg: Schema.Literal("HS256"),
    typ: Schema.optional(Schema.String),
  }),
);

const TokenClaims = Schema.parseJson(
  Schema.Struct({
    sub: Schema.NonEmptyTrimmedString,
    exp: Schema.Number,
    iss: Schema.optional(Schema.String),
  }),
);

const fromBase64Url = (segment: string): string =>
  Buffer.from(segment, "base64url").toString("utf8");

const reject = (reason: string) =>
  Effect.logWarning("Bearer token rejected", { reason }).pipe(
    Effect.zipRight(Effect.fail(new UnauthorizedError({ reason }))),
  );

export const HmacIdentityGatewayCreateLive = (config: AuthConfig) =>
  Layer.succeed(
    IdentityGateway,
    IdentityGateway.of({
      authenticate: (credential) =>
        Effect.gen(function* () {
          const segments = credential.split(".");
          const [headerSegment, payloadSegment, signatureSegment] = segments;
          if (
            segments.length !== 3 ||
            !headerSegment ||
            !payloadSegment ||
            !signatureSegment
          ) {
            return yield* reject("Malformed token");
          }

          yield* Schema.decodeUnknown(TokenHeader)(fromBase64Url(headerSegment)).pipe(
            Effect.catchTag("ParseError", () => reject("Unsupported token header")),
          );

          const digest = crypto
            .createHmac("sha256", Redacted.value(config.jwtSecret))
            .update(`${headerSegment}.${payloadSegment}`)
            .digest();
          const signature = Buffer.from(signatureSegment, "base64url");

          if (
            signature.length !== digest.length ||
            !crypto.timingSafeEqual(signature, digest)
          ) {
            return yield* reject("Invalid signature");
          }

          const claims = yield* Schema.decodeUnknown(TokenClaims)(
            fromBase64Url(payloadSegment),
          ).pipe(Effect.catchTag("ParseError", () => reject("Invalid claims")));

          const nowSeconds = (yield* Clock.currentTimeMillis) / 1000;
          if (claims.exp <= nowSeconds) {
            return yield* reject("Token expired");
          }

          if (
            Option.isSome(config.issuer) &&
            claims.iss !== config.issuer.value
          ) {
            return yield* reject("Unexpected issuer");
          }

          return makeUserId(claims.sub);
        }),
    }),
  );

/**
 * Live Layer: reads AUTH_JWT_SECRET and AUTH_JWT_ISSUER.
 */
export const HmacIdentityGatewayLive = Layer.unwrapEffect(
  Effect.map(AuthConfig, HmacIdentityGatewayCreateLive),
);
