import { Option, Schema } from "effect";
import { UserId } from "../kernel.js";

export const UserRole = {
	CLIENT: "client",
	AGENT: "agent",
} as const;

export type UserRole = (typeof UserRole)[keyof typeof UserRole];

export const UserRoleSchema = Schema.Enums(UserRole);

// Accounts are managed by the identity system; this service only reads them.
export class User extends Schema.Class<User>("User")({
	id: UserId,
	name: Schema.String,
	email: Schema.String,
	role: UserRoleSchema,
	status: Schema.Option(Schema.String),
}) {
	isAgent(): boolean {
		return this.role === UserRole.AGENT;
	}

	initials(): string {
		return this.name
			.split(/\s+/)
			.filter((part) => part.length > 0)
			.slice(0, 2)
			.map((part) => part.charAt(0).toUpperCase())
			.join("");
	}
}

// Any role other than "agent" carries no back-office capability
export const normalizeUserRole = (raw: string): UserRole =>
	raw.trim().toLowerCase() === UserRole.AGENT ? UserRole.AGENT : UserRole.CLIENT;

export const userStatusOf = (raw: string | null): Option.Option<string> =>
	Option.fromNullable(raw).pipe(Option.filter((s) => s.trim().length > 0));
