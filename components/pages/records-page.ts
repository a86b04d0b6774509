// FILE: components/pages/records-page.ts
import { html } from "lit-html";
import { type ConfigProvider, Effect, Fiber } from "effect";

import { ClientConfig } from "../../lib/client/Config";
import { clientLog } from "../../lib/client/logger";
import { makeResource } from "../../lib/client/resource";
import { runClientUnscoped } from "../../lib/client/runtime";
import { RemoteRecordSchema } from "../../lib/shared/schemas";

import { makeController } from "./records/list/controller";
import { renderView } from "./records/list/view";
import type { ViewResult } from "./records/list/types";

// --- View Entry Point ---
export const RecordsView = (
  configProvider?: ConfigProvider.ConfigProvider,
): ViewResult => {
  const container = document.createElement("div");

  const componentProgram = Effect.gen(function* () {
    const config = yield* ClientConfig;
    const controller = yield* makeController({
      resource: makeResource(
        config.bucket,
        config.collection,
        RemoteRecordSchema,
      ),
      render: (model, propose) => renderView(container, model, propose),
    });
    controller.propose({ type: "FETCH_RECORDS" });
    return yield* Effect.never;
  }).pipe(
    Effect.scoped,
    Effect.tapErrorCause((cause) =>
      clientLog(
        "error",
        `RecordsView failed to start: ${String(cause)}`,
        {},
        "RecordsView",
      ),
    ),
  );

  const fiber = runClientUnscoped(componentProgram, configProvider);
  return {
    template: html`${container}`,
    cleanup: () => {
      Effect.runFork(
        clientLog(
          "debug",
          "RecordsView cleanup running, interrupting fiber.",
          {},
          "RecordsView:cleanup",
        ),
      );
      Effect.runFork(Fiber.interrupt(fiber));
    },
  };
};
