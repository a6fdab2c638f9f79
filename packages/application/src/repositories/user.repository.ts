import type { PersistenceError } from "@workspace/domain/errors";
import type { UserId } from "@workspace/domain/kernel";
import type { User, UserRole } from "@workspace/domain/user";
import { Context, type Effect, type Option } from "effect";

export interface UserFilter {
	readonly role?: UserRole | undefined;
	readonly status?: string | undefined;
}

export interface UserRepositoryPort {
	findById(id: UserId): Effect.Effect<Option.Option<User>, PersistenceError>;

	/**
	 * Ordered by name. `status` matches case-insensitively.
	 */
	list(filter: UserFilter): Effect.Effect<ReadonlyArray<User>, PersistenceError>;
}

export class UserRepository extends Context.Tag("UserRepository")<
	UserRepository,
	UserRepositoryPort
>() {}
