/**
 * @file unit-of-work.ts
 * @module @workspace/application/ports
 * @description Unit of Work pattern for transactional boundaries
 */

import type { PersistenceError } from "@workspace/domain/errors";
import { Context, type Effect } from "effect";

/**
 * UnitOfWork provides transactional boundaries for operations
 * that need to be atomic (all-or-nothing).
 *
 * Seat claims, settlement and fleet cascades each run inside one
 * transaction so that their reads and writes commit together.
 */
export interface UnitOfWorkPort {
  /**
   * Execute an effect within a transaction.
   * If the effect fails, all changes are rolled back.
   * If the effect succeeds, all changes are committed.
   * Nested calls join the enclosing transaction.
   */
  readonly transaction: <A, E, R>(
    effect: Effect.Effect<A, E, R>,
  ) => Effect.Effect<A, E | PersistenceError, R>;
}

export class UnitOfWork extends Context.Tag("UnitOfWork")<
  UnitOfWork,
  UnitOfWorkPort
>() {}
