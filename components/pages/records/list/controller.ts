// components/pages/records/list/controller.ts
import {
  Clock,
  Effect,
  pipe,
  Queue,
  Runtime,
  type Scope,
  Stream,
  SubscriptionRef,
} from "effect";
import type { RecordClient } from "../../../../lib/client/recordClient";
import { clientLog } from "../../../../lib/client/logger";
import type { Resource } from "../../../../lib/client/resource";
import type { RemoteRecord } from "../../../../lib/shared/schemas";
import { handleAction } from "./actions";
import { initialModel } from "./transition";
import type { Action, Model } from "./types";

export interface ControllerOptions {
  readonly resource: Resource<RemoteRecord>;
  readonly render?: (model: Model, propose: (action: Action) => void) => void;
  /** Timestamps fed to the model as TIME_TICK. Defaults to the clock, every second. */
  readonly ticks?: Stream.Stream<number>;
}

export interface Controller {
  readonly propose: (action: Action) => void;
  readonly snapshot: Effect.Effect<Model>;
  readonly changes: Stream.Stream<Model>;
}

export const clockTicks: Stream.Stream<number> = pipe(
  Stream.tick("1 second"),
  Stream.mapEffect(() => Clock.currentTimeMillis),
);

/**
 * Starts the records page state loop in the current scope.
 * Actions are taken off the queue one at a time; closing the scope
 * interrupts the loop along with any request still in flight.
 */
export const makeController = ({
  resource,
  render = () => undefined,
  ticks = clockTicks,
}: ControllerOptions): Effect.Effect<
  Controller,
  never,
  RecordClient | Scope.Scope
> =>
  Effect.gen(function* () {
    const model = yield* SubscriptionRef.make<Model>(initialModel(resource));
    const actionQueue = yield* Queue.unbounded<Action>();

    // Logs from `propose` run with this fiber's services and config.
    const runFork = Runtime.runFork(yield* Effect.runtime<never>());

    const propose = (action: Action) => {
      Effect.runSync(Queue.offer(actionQueue, action));
      runFork(
        clientLog(
          "debug",
          `Proposing action ${action.type}`,
          {},
          "RecordsView:propose",
        ),
      );
    };

    const renderEffect = pipe(
      SubscriptionRef.get(model),
      Effect.tap((m) => Effect.sync(() => render(m, propose))),
    );

    const actionProcessor = Queue.take(actionQueue).pipe(
      Effect.flatMap((action) =>
        handleAction(action, model, propose).pipe(
          Effect.andThen(renderEffect),
          Effect.catchAllDefect((defect) =>
            clientLog(
              "error",
              `Defect while handling ${action.type}: ${String(defect)}`,
              {},
              "RecordsView:loop",
            ),
          ),
        ),
      ),
      Effect.forever,
    );

    const clock = ticks.pipe(
      Stream.runForEach((time) =>
        Effect.sync(() => propose({ type: "TIME_TICK", payload: time })),
      ),
    );

    yield* renderEffect; // Initial render
    yield* Effect.forkScoped(
      Effect.all([actionProcessor, clock], { concurrency: "unbounded" }).pipe(
        Effect.catchAllDefect((defect) =>
          clientLog(
            "error",
            `[FATAL] Uncaught defect in records loop: ${String(defect)}`,
          ),
        ),
      ),
    );

    return {
      propose,
      snapshot: SubscriptionRef.get(model),
      changes: model.changes,
    };
  });
