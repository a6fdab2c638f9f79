import type { PersistenceError } from "@workspace/domain/errors";
import type { User } from "@workspace/domain/user";
import { Context, Effect, Layer } from "effect";
import {
  type UserFilter,
  UserRepository,
} from "../repositories/user.repository.js";

export interface UserDirectorySignature {
  /** Users ordered by name; the status filter ignores case. */
  readonly list: (
    filter: UserFilter,
  ) => Effect.Effect<ReadonlyArray<User>, PersistenceError>;
}

export class UserDirectory extends Context.Tag("UserDirectory")<
  UserDirectory,
  UserDirectorySignature
>() {
  static readonly Live = Layer.effect(
    UserDirectory,
    Effect.gen(function* () {
      const users = yield* UserRepository;
      return UserDirectory.of({
        list: (filter) => users.list(filter),
      });
    }),
  );
}
