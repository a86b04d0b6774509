import { ConfigProvider, Effect, Layer } from "effect";
import { clientLog } from "./logger";
import { ClientConfig, ClientConfigLive } from "./Config";
import { RecordClient, RecordClientLive } from "./recordClient";

/**
 * A type alias for all services available in the client-side context.
 */
export type ClientContext = RecordClient | ClientConfig;

/**
 * A combined Layer that provides live implementations for all client-side services.
 */
export const ClientLive = RecordClientLive.pipe(
  Layer.provideMerge(ClientConfigLive),
);

/**
 * Reads configuration from a flat string map such as Vite's
 * `import.meta.env`, with the `VITE_` prefix stripped from the keys.
 */
export const configProviderFromEnv = (
  env: object,
): ConfigProvider.ConfigProvider =>
  ConfigProvider.fromMap(
    new Map(
      Object.entries(env).flatMap(([key, value]) =>
        typeof value === "string"
          ? [[key.replace(/^VITE_/, ""), value] as const]
          : [],
      ),
    ),
  );

/**
 * Executes a client-side Effect in “fire-and-forget” mode.
 * Automatically provides all necessary client services, configured from
 * `configProvider` (the process environment by default).
 */
export const runClientUnscoped = <A, E>(
  effect: Effect.Effect<A, E, ClientContext>,
  configProvider: ConfigProvider.ConfigProvider = ConfigProvider.fromEnv(),
) =>
  Effect.runFork(
    Effect.provide(effect, ClientLive).pipe(
      Effect.withConfigProvider(configProvider),
    ),
  );

/**
 * Reports uncaught browser errors through the client logger.
 */
export const setupGlobalErrorLogger = (
  target: Window,
  configProvider: ConfigProvider.ConfigProvider = ConfigProvider.fromEnv(),
) => {
  const log = (effect: Effect.Effect<void>) =>
    Effect.runFork(effect.pipe(Effect.withConfigProvider(configProvider)));

  const handler =
    (errorSource: string) => (event: ErrorEvent | PromiseRejectionEvent) => {
      const errorCandidate: unknown =
        "reason" in event ? event.reason : event.error;
      const message =
        errorCandidate instanceof Error
          ? errorCandidate.message
          : String(errorCandidate);
      const stack =
        errorCandidate instanceof Error ? errorCandidate.stack : undefined;

      log(
        clientLog(
          "error",
          `[GLOBAL CATCH – ${errorSource}] ${message}`,
          stack ? { stack } : {},
          "Runtime",
        ),
      );
    };

  target.addEventListener("error", handler("Uncaught Exception"));
  target.addEventListener("unhandledrejection", handler("Unhandled Rejection"));
  log(clientLog("info", "Global error logger initialized.", {}, "Runtime"));
};
