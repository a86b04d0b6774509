import { describe, it, expect } from "vitest";
import { ConfigProvider, Effect, Option, Redacted } from "effect";
import { getEffectiveLogLevel, LogConfigLive } from "../shared/logConfig";
import { RecordClientConfigFromEnv } from "./Config";
import { configProviderFromEnv } from "./runtime";

const load = (entries: ReadonlyArray<readonly [string, string]>) =>
  Effect.runSync(
    RecordClientConfigFromEnv.pipe(
      Effect.withConfigProvider(ConfigProvider.fromMap(new Map(entries))),
    ),
  );

describe("RecordClientConfigFromEnv", () => {
  it("falls back to the local defaults", () => {
    const config = load([]);
    expect(config.serverUrl).toBe("http://localhost:8888/v1");
    expect(config.bucket).toBe("default");
    expect(config.collection).toBe("records");
    expect(Option.isNone(config.credentials)).toBe(true);
  });

  it("strips trailing slashes from the server URL", () => {
    const config = load([["RECORDS_SERVER_URL", "https://records.test/v1//"]]);
    expect(config.serverUrl).toBe("https://records.test/v1");
  });

  it("reads credentials only when both parts are set", () => {
    expect(
      Option.isNone(load([["RECORDS_USERNAME", "demo"]]).credentials),
    ).toBe(true);

    const config = load([
      ["RECORDS_USERNAME", "demo"],
      ["RECORDS_PASSWORD", "test-secret"],
    ]);
    if (Option.isNone(config.credentials)) {
      throw new Error("expected credentials");
    }
    expect(config.credentials.value.username).toBe("demo");
    expect(Redacted.value(config.credentials.value.password)).toBe(
      "test-secret",
    );
    expect(String(config.credentials.value.password)).not.toBe("test-secret");
  });
});

describe("configProviderFromEnv", () => {
  it("strips the VITE_ prefix and ignores non-string entries", () => {
    const config = Effect.runSync(
      RecordClientConfigFromEnv.pipe(
        Effect.withConfigProvider(
          configProviderFromEnv({
            VITE_RECORDS_BUCKET: "groceries",
            RECORDS_COLLECTION: "items",
            DEV: true,
          }),
        ),
      ),
    );
    expect(config.bucket).toBe("groceries");
    expect(config.collection).toBe("items");
  });
});

describe("LogConfigLive", () => {
  const levelFrom = (entries: ReadonlyArray<readonly [string, string]>) =>
    Effect.runSync(
      getEffectiveLogLevel().pipe(
        Effect.provide(LogConfigLive),
        Effect.withConfigProvider(ConfigProvider.fromMap(new Map(entries))),
      ),
    );

  it("seeds the level from LOG_LEVEL", () => {
    expect(levelFrom([["LOG_LEVEL", "warn"]])).toBe("warn");
  });

  it("defaults to info, also for unknown levels", () => {
    expect(levelFrom([])).toBe("info");
    expect(levelFrom([["LOG_LEVEL", "loud"]])).toBe("info");
  });
});
