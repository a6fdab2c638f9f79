import { HttpApiEndpoint, HttpApiGroup } from "@effect/platform";
import { UserView } from "@workspace/application/read-models";
import * as Errors from "@workspace/domain/errors";
import { UserRoleSchema } from "@workspace/domain/user";
import { Schema } from "effect";
import { Authentication } from "../../security/authentication.js";

export class AdminUsersGroup extends HttpApiGroup.make("adminUsers")
  .add(
    HttpApiEndpoint.get("list", "/")
      .setUrlParams(
        Schema.Struct({
          role: Schema.optional(UserRoleSchema),
          status: Schema.optional(Schema.String),
        }),
      )
      .addSuccess(Schema.Array(UserView)),
  )
  .addError(Errors.ForbiddenError, { status: 403 })
  .addError(Errors.PersistenceError, { status: 500 })
  .middleware(Authentication)
  .prefix("/admin/users") {}
