import { Console, Effect, pipe } from "effect";
import type { DestinationStream, Logger } from "pino";
import pino from "pino";
import {
  getEffectiveLogLevel,
  LogConfigLive,
  type LogLevel,
} from "../shared/logConfig";

export type LoggableLevel = Exclude<LogLevel, "silent">;

const isNode =
  typeof window === "undefined" &&
  typeof process !== "undefined" &&
  process.versions?.node !== undefined;

// Pretty output only in a Node development shell; the browser build of
// pino writes to the console on its own.
const prettyStream = (
  level: LogLevel,
): Effect.Effect<DestinationStream | undefined> =>
  isNode && level !== "silent" && process.env.NODE_ENV !== "production"
    ? pipe(
        Effect.tryPromise(() => import("pino-pretty")),
        Effect.map(
          ({ default: pretty }): DestinationStream | undefined =>
            pretty({ colorize: true }),
        ),
        Effect.orElseSucceed(() => undefined),
      )
    : Effect.succeed(undefined);

const buildLogger = (level: LogLevel): Effect.Effect<Logger> =>
  Effect.gen(function* () {
    const stream = yield* prettyStream(level);

    const pinoOptions = {
      level,
      redact: {
        paths: [
          "password",
          "*.password",
          "credentials",
          "*.credentials",
          "headers.Authorization",
        ],
        censor: "[REDACTED]",
      },
    };

    return stream ? pino(pinoOptions, stream) : pino(pinoOptions);
  }).pipe(Effect.tap(() => Console.debug("Record browser logger created")));

const loggers = new Map<LogLevel, Logger>();

/**
 * The logger for the level configured in the current fiber's
 * ConfigProvider, built once per level.
 */
const getLogger: Effect.Effect<Logger> = pipe(
  getEffectiveLogLevel(),
  Effect.provide(LogConfigLive),
  Effect.flatMap((level) => {
    const cached = loggers.get(level);
    return cached
      ? Effect.succeed(cached)
      : Effect.tap(buildLogger(level), (logger) =>
          Effect.sync(() => loggers.set(level, logger)),
        );
  }),
);

export const getLoggerWithContext = (
  data: object,
  context?: string,
): Effect.Effect<Logger> =>
  Effect.map(getLogger, (logger) =>
    logger.child({ ...data, ...(context ? { context } : {}) }),
  );

/**
 * Logs through pino and never fails; a logger that cannot be built is
 * silently skipped.
 */
export function clientLog(
  level: LoggableLevel,
  message: string,
  data: object = {},
  context?: string,
): Effect.Effect<void, never, never> {
  return pipe(
    getLoggerWithContext(data, context),
    Effect.flatMap((logger: Logger) =>
      Effect.sync(() => logger[level](message)),
    ),
    Effect.catchAllDefect(() => Effect.void),
  );
}
