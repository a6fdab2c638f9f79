/**
 * @file identity.gateway.ts
 * @module @workspace/application/gateways
 * @description Port for credential verification
 *
 * Credentials are issued by an external identity provider. This service only
 * checks them and extracts the subject.
 */

import type { UnauthorizedError } from "@workspace/domain/errors";
import type { UserId } from "@workspace/domain/kernel";
import { Context, type Effect } from "effect";

export interface IdentityGatewayService {
  /**
   * Resolves a bearer credential to the user it was issued for.
   */
  readonly authenticate: (
    credential: string,
  ) => Effect.Effect<UserId, UnauthorizedError>;
}

export class IdentityGateway extends Context.Tag("IdentityGateway")<
  IdentityGateway,
  IdentityGatewayService
>() {}
