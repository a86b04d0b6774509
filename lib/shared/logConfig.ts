import { Config, Context, Effect, Layer, Ref } from "effect";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

/**
 * The interface for our logging configuration service.
 * It holds the current log level in a Ref, allowing for safe, concurrent updates.
 */
export interface ILogConfig {
  readonly logLevel: Ref.Ref<LogLevel>;
}

/**
 * The service Tag for LogConfig. This is used to add and retrieve the service
 * from the Context.
 */
export class LogConfig extends Context.Tag("LogConfig")<
  LogConfig,
  ILogConfig
>() {}

const LogLevelConfig = Config.literal(
  "debug",
  "info",
  "warn",
  "error",
  "silent",
)("LOG_LEVEL").pipe(Config.withDefault<LogLevel>("info"));

/**
 * The live implementation of the LogConfig service. The Ref is seeded from
 * `LOG_LEVEL`; an unreadable value falls back to "info".
 */
export const LogConfigLive = Layer.effect(
  LogConfig,
  LogLevelConfig.pipe(
    Effect.orElseSucceed((): LogLevel => "info"),
    Effect.flatMap((level) => Ref.make<LogLevel>(level)),
    Effect.map((logLevel) => ({ logLevel })),
  ),
);

/**
 * An Effect to get the current log level. It requires the LogConfig service.
 */
export const getEffectiveLogLevel = (): Effect.Effect<
  LogLevel,
  never,
  LogConfig
> => Effect.flatMap(LogConfig, (service) => Ref.get(service.logLevel));
