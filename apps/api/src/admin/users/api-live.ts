import { HttpApiBuilder } from "@effect/platform";
import { UserView } from "@workspace/application/read-models";
import { UserDirectory } from "@workspace/application/user-directory.service";
import { Effect } from "effect";
import { Api } from "../../api.js";
import { asAgent } from "../../security/authentication.js";

export const AdminUsersApiLive = HttpApiBuilder.group(Api, "adminUsers", (handlers) =>
  handlers.handle("list", ({ urlParams }) =>
    asAgent(() =>
      Effect.flatMap(UserDirectory, (directory) => directory.list(urlParams)),
    ).pipe(Effect.map((users) => users.map(UserView.fromUser))),
  ),
);
