// components/pages/records/list/actions.ts
import { Effect, pipe, SubscriptionRef } from "effect";
import { RecordClient } from "../../../../lib/client/recordClient";
import { clientLog } from "../../../../lib/client/logger";
import { transition } from "./transition";
import type { Action, Command, Model } from "./types";

/**
 * Runs one command against the RecordClient and turns its outcome,
 * success or failure, into the action that reports it.
 */
export const runCommand = (
  command: Command,
): Effect.Effect<Action, never, RecordClient> =>
  Effect.flatMap(RecordClient, (client): Effect.Effect<Action> => {
    switch (command.type) {
      case "LIST_RECORDS":
        return Effect.map(
          Effect.either(
            client.list(command.resource, command.sortKeys, command.limit),
          ),
          (payload): Action => ({ type: "RECORDS_FETCHED", payload }),
        );
      case "FETCH_NEXT_PAGE":
        return Effect.map(
          Effect.either(client.getNextPage(command.request)),
          (payload): Action => ({ type: "RECORDS_FETCHED", payload }),
        );
      case "GET_RECORD":
        return Effect.map(
          Effect.either(client.get(command.resource, command.id)),
          (payload): Action => ({ type: "RECORD_FETCHED", payload }),
        );
      case "CREATE_RECORD":
        return Effect.map(
          Effect.either(client.create(command.resource, command.body)),
          (payload): Action => ({ type: "RECORD_CREATED", payload }),
        );
      case "UPDATE_RECORD":
        return Effect.map(
          Effect.either(
            client.update(command.resource, command.id, command.body),
          ),
          (payload): Action => ({ type: "RECORD_EDITED", payload }),
        );
      case "DELETE_RECORD":
        return Effect.map(
          Effect.either(client.delete(command.resource, command.id)),
          (payload): Action => ({ type: "RECORD_DELETED", payload }),
        );
    }
  });

/**
 * Applies the action to the model and forks one fiber per emitted command.
 * Each command fiber proposes its result once the request settles, so
 * results re-enter in completion order.
 */
export const handleAction = (
  action: Action,
  modelRef: SubscriptionRef.SubscriptionRef<Model>,
  propose: (action: Action) => void,
): Effect.Effect<void, never, RecordClient> =>
  Effect.gen(function* () {
    yield* clientLog(
      "debug",
      `Handling action: ${action.type}`,
      {},
      "RecordsView:handleAction",
    );

    const commands = yield* SubscriptionRef.modify(modelRef, (model) => {
      const [next, emitted] = transition(action, model);
      return [emitted, next] as const;
    });

    for (const command of commands) {
      yield* pipe(
        runCommand(command),
        Effect.flatMap((result) => Effect.sync(() => propose(result))),
        Effect.fork,
      );
    }
  });
