import {
  ConflictError,
  isOptimisticLockingError,
  type OptimisticLockingError,
} from "@workspace/domain/errors";
import { Duration, Effect, Schedule } from "effect";

/**
 * Retry policy for a transaction that lost an optimistic-locking race.
 * Any other failure stops the schedule immediately.
 */
export const commitRetryPolicy = (maxRetries: number) =>
  Schedule.exponential(Duration.millis(10)).pipe(
    Schedule.jittered,
    Schedule.intersect(Schedule.recurs(maxRetries)),
    Schedule.whileInput(isOptimisticLockingError),
  );

// Used once retries are exhausted
export const conflictFromLockingError = (error: OptimisticLockingError) =>
  Effect.fail(
    new ConflictError({
      entity: error.entityType,
      id: error.id,
      reason: "Concurrent update detected, please retry",
    }),
  );
