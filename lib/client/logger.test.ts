import { describe, it, expect } from "vitest";
import { ConfigProvider, Effect } from "effect";
import { getLoggerWithContext } from "./logger";
import { configProviderFromEnv } from "./runtime";

describe("getLoggerWithContext", () => {
  it("takes the level from the active ConfigProvider", async () => {
    const logger = await Effect.runPromise(
      getLoggerWithContext({}).pipe(
        Effect.withConfigProvider(
          configProviderFromEnv({ VITE_LOG_LEVEL: "error" }),
        ),
      ),
    );
    expect(logger.level).toBe("error");
  });

  it("builds a separate logger per configured level", async () => {
    const levelUnder = (level: string) =>
      Effect.runPromise(
        getLoggerWithContext({}, "Test").pipe(
          Effect.withConfigProvider(
            ConfigProvider.fromMap(new Map([["LOG_LEVEL", level]])),
          ),
          Effect.map((logger) => logger.level),
        ),
      );
    expect(await levelUnder("warn")).toBe("warn");
    expect(await levelUnder("debug")).toBe("debug");
    expect(await levelUnder("warn")).toBe("warn");
  });

  it("falls back to the process environment without a provider", async () => {
    const logger = await Effect.runPromise(getLoggerWithContext({}));
    expect(logger.level).toBe("silent");
  });
});
