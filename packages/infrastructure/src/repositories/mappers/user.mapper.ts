import { makeUserId } from "@workspace/domain/kernel";
import { normalizeUserRole, User, userStatusOf } from "@workspace/domain/user";

export interface UserRow {
  readonly id: string;
  readonly name: string;
  readonly email: string;
  readonly role: string;
  readonly status: string | null;
}

export const toUser = (row: UserRow): User =>
  new User({
    id: makeUserId(row.id),
    name: row.name,
    email: row.email,
    role: normalizeUserRole(row.role),
    status: userStatusOf(row.status),
  });
