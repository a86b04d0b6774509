// lib/client/Config.ts
import {
  Config as EffectConfig,
  Context,
  Layer,
  Option,
  pipe,
  type Redacted,
} from "effect";

export interface Credentials {
  readonly username: string;
  readonly password: Redacted.Redacted;
}

/**
 * Everything the record client needs to reach the remote collection.
 */
export interface RecordClientConfig {
  readonly serverUrl: string;
  readonly bucket: string;
  readonly collection: string;
  readonly credentials: Option.Option<Credentials>;
}

const CredentialsConfig = EffectConfig.all({
  username: EffectConfig.string("RECORDS_USERNAME"),
  password: EffectConfig.redacted("RECORDS_PASSWORD"),
});

/**
 * Reads the client configuration from the active ConfigProvider.
 * Credentials are only used when both username and password are set.
 */
export const RecordClientConfigFromEnv: EffectConfig.Config<RecordClientConfig> =
  EffectConfig.all({
    serverUrl: pipe(
      EffectConfig.string("RECORDS_SERVER_URL"),
      EffectConfig.withDefault("http://localhost:8888/v1"),
      EffectConfig.map((url) => url.replace(/\/+$/, "")),
    ),
    bucket: pipe(
      EffectConfig.string("RECORDS_BUCKET"),
      EffectConfig.withDefault("default"),
    ),
    collection: pipe(
      EffectConfig.string("RECORDS_COLLECTION"),
      EffectConfig.withDefault("records"),
    ),
    credentials: EffectConfig.option(CredentialsConfig),
  });

/**
 * The configuration service of the client side.
 */
export class ClientConfig extends Context.Tag("app/ClientConfig")<
  ClientConfig,
  RecordClientConfig
>() {}

/**
 * The live implementation of the ClientConfig service, which loads
 * configuration from the current ConfigProvider.
 */
export const ClientConfigLive = Layer.effect(
  ClientConfig,
  RecordClientConfigFromEnv,
);
