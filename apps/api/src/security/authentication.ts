import {
  HttpApiMiddleware,
  HttpApiSchema,
  HttpApiSecurity,
} from "@effect/platform";
import { IdentityGateway } from "@workspace/application/identity.gateway";
import { UserRepository } from "@workspace/application/user.repository";
import {
  ForbiddenError,
  PersistenceError,
  UnauthorizedError,
} from "@workspace/domain/errors";
import type { User } from "@workspace/domain/user";
import { UserContext } from "@workspace/infrastructure/audit-logger";
import { Context, Effect, Layer, Option, Redacted, Schema } from "effect";

/**
 * The authenticated caller, loaded from the user directory.
 */
export class CurrentUser extends Context.Tag("CurrentUser")<
  CurrentUser,
  User
>() {}

export class Authentication extends HttpApiMiddleware.Tag<Authentication>()(
  "Authentication",
  {
    failure: Schema.Union(
      UnauthorizedError.annotations(HttpApiSchema.annotations({ status: 401 })),
      PersistenceError.annotations(HttpApiSchema.annotations({ status: 500 })),
    ),
    provides: CurrentUser,
    security: { bearer: HttpApiSecurity.bearer },
  },
) {}

export const AuthenticationLive = Layer.effect(
  Authentication,
  Effect.gen(function* () {
    const identity = yield* IdentityGateway;
    const users = yield* UserRepository;

    return Authentication.of({
      bearer: (token) =>
        identity.authenticate(Redacted.value(token)).pipe(
          Effect.flatMap((userId) => users.findById(userId)),
          Effect.flatMap((found) =>
            Option.match(found, {
              // A valid credential for someone the directory does not know
              onNone: () =>
                Effect.fail(new UnauthorizedError({ reason: "Unknown user" })),
              onSome: Effect.succeed,
            }),
          ),
        ),
    });
  }),
);

// Writes made on behalf of the caller are attributed to them in the audit log
const attributed = <A, E, R>(user: User, effect: Effect.Effect<A, E, R>) =>
  effect.pipe(
    Effect.provideService(UserContext, { userId: user.id }),
    Effect.annotateLogs({ userId: user.id, role: user.role }),
  );

export const asCurrentUser = <A, E, R>(
  run: (user: User) => Effect.Effect<A, E, R>,
) => Effect.flatMap(CurrentUser, (user) => attributed(user, run(user)));

/** Back-office access: only agents get through. */
export const asAgent = <A, E, R>(
  run: (agent: User) => Effect.Effect<A, E, R>,
) =>
  CurrentUser.pipe(
    Effect.filterOrFail(
      (user) => user.isAgent(),
      () => new ForbiddenError({ reason: "Agent role required" }),
    ),
    Effect.flatMap((agent) => attributed(agent, run(agent))),
  );
