import { Effect } from "effect";
import { clientLog } from "./logger";
import type { ClientError } from "./Errors";

/**
 * Reusable logging wrapper for record client operations.
 * Successes are logged at debug level, failures at error level.
 */
export const withRecordClientLogging =
  (operation: string, data: object) =>
  <A, R>(
    self: Effect.Effect<A, ClientError, R>,
  ): Effect.Effect<A, ClientError, R> =>
    Effect.tapBoth(self, {
      onFailure: (error) =>
        clientLog(
          "error",
          `[${operation}] Failure: ${error._tag}: ${error.message}`,
          { ...data, url: error.url },
          `RecordClient:${operation}`,
        ),
      onSuccess: () =>
        clientLog(
          "debug",
          `[${operation}] OK`,
          data,
          `RecordClient:${operation}`,
        ),
    });
