// FILE: lib/client/recordClient.ts
import { Schema } from "@effect/schema";
import { formatErrorSync } from "@effect/schema/TreeFormatter";
import type { ParseError } from "@effect/schema/ParseResult";
import { Context, Effect, Either, Layer, Option, pipe, Redacted } from "effect";
import { toError } from "../shared/toError";
import {
  ErrorBodySchema,
  ListEnvelopeSchema,
  RecordEnvelopeSchema,
  type WireRecord,
} from "../shared/schemas";
import { ClientConfig, type RecordClientConfig } from "./Config";
import {
  BadStatusError,
  type ClientError,
  DecodeError,
  NetworkError,
} from "./Errors";
import type { NextPageRequest, Page } from "./pager";
import { recordPath, recordsPath, type Resource } from "./resource";
import { withRecordClientLogging } from "./wrappers";

export type Fetch = (url: string, init: RequestInit) => Promise<Response>;

export interface RecordClientService {
  readonly list: <A>(
    resource: Resource<A>,
    sortKeys: ReadonlyArray<string>,
    limit: Option.Option<number>,
  ) => Effect.Effect<Page<A>, ClientError>;
  readonly getNextPage: <A>(
    request: NextPageRequest<A>,
  ) => Effect.Effect<Page<A>, ClientError>;
  readonly get: <A>(
    resource: Resource<A>,
    id: string,
  ) => Effect.Effect<A, ClientError>;
  readonly create: <A>(
    resource: Resource<A>,
    body: WireRecord,
  ) => Effect.Effect<A, ClientError>;
  readonly update: <A>(
    resource: Resource<A>,
    id: string,
    body: WireRecord,
  ) => Effect.Effect<A, ClientError>;
  readonly delete: <A>(
    resource: Resource<A>,
    id: string,
  ) => Effect.Effect<A, ClientError>;
}

export class RecordClient extends Context.Tag("app/RecordClient")<
  RecordClient,
  RecordClientService
>() {}

const decodeWith =
  <A>(url: string, decode: (input: unknown) => Either.Either<A, ParseError>) =>
  (input: unknown): Effect.Effect<A, DecodeError> =>
    Either.match(decode(input), {
      onLeft: (e) =>
        Effect.fail(new DecodeError({ url, message: formatErrorSync(e) })),
      onRight: (value) => Effect.succeed(value),
    });

const authorizationHeader = (
  config: RecordClientConfig,
): Record<string, string> =>
  Option.match(config.credentials, {
    onNone: () => ({}),
    onSome: ({ username, password }) => ({
      Authorization: `Basic ${btoa(`${username}:${Redacted.value(password)}`)}`,
    }),
  });

const readJson = (
  response: Response,
  url: string,
): Effect.Effect<unknown, DecodeError> =>
  Effect.tryPromise({
    try: () => response.json(),
    catch: (cause) => new DecodeError({ url, message: toError(cause).message }),
  });

const badStatus = (
  response: Response,
  url: string,
): Effect.Effect<never, BadStatusError> =>
  pipe(
    Effect.tryPromise(() => response.json()),
    Effect.flatMap(Schema.decodeUnknown(ErrorBodySchema)),
    Effect.map((body) => body.message ?? body.error),
    Effect.orElseSucceed(() => undefined),
    Effect.flatMap((message) =>
      Effect.fail(
        new BadStatusError({
          url,
          status: response.status,
          message: message ?? (response.statusText || "Request failed"),
        }),
      ),
    ),
  );

/**
 * Builds a client for the record service described by `config`.
 * `fetchFn` defaults to the global fetch; tests pass a stub.
 */
export const makeRecordClient = (
  config: RecordClientConfig,
  fetchFn: Fetch = (url, init) => fetch(url, init),
): RecordClientService => {
  const send = (
    url: string,
    method: string,
    body?: WireRecord,
  ): Effect.Effect<Response, ClientError> =>
    pipe(
      Effect.tryPromise({
        try: () =>
          fetchFn(url, {
            method,
            headers: {
              Accept: "application/json",
              ...(body ? { "Content-Type": "application/json" } : {}),
              ...authorizationHeader(config),
            },
            ...(body ? { body: JSON.stringify({ data: body }) } : {}),
          }),
        catch: (cause) =>
          new NetworkError({ url, message: toError(cause).message }),
      }),
      Effect.flatMap((response) =>
        response.ok ? Effect.succeed(response) : badStatus(response, url),
      ),
    );

  const fetchPage = <A>(
    resource: Resource<A>,
    url: string,
    origin: Page<A>["origin"],
  ): Effect.Effect<Page<A>, ClientError> =>
    Effect.gen(function* () {
      const response = yield* send(url, "GET");
      const json = yield* readJson(response, url);
      const envelope = yield* decodeWith(
        url,
        Schema.decodeUnknownEither(ListEnvelopeSchema),
      )(json);
      const objects = yield* Effect.forEach(
        envelope.data,
        decodeWith(url, resource.decode),
      );
      const total = Number.parseInt(
        response.headers.get("Total-Records") ?? "",
        10,
      );
      return {
        objects,
        nextPage: Option.fromNullable(response.headers.get("Next-Page")),
        total: Number.isNaN(total) ? objects.length : total,
        origin,
      };
    });

  const fetchOne = <A>(
    resource: Resource<A>,
    url: string,
    method: string,
    body?: WireRecord,
  ): Effect.Effect<A, ClientError> =>
    Effect.gen(function* () {
      const response = yield* send(url, method, body);
      const json = yield* readJson(response, url);
      const envelope = yield* decodeWith(
        url,
        Schema.decodeUnknownEither(RecordEnvelopeSchema),
      )(json);
      return yield* decodeWith(url, resource.decode)(envelope.data);
    });

  return {
    list: (resource, sortKeys, limit) => {
      const query = new URLSearchParams();
      if (sortKeys.length > 0) {
        query.set("_sort", sortKeys.join(","));
      }
      if (Option.isSome(limit)) {
        query.set("_limit", String(limit.value));
      }
      const search = query.toString();
      const url = `${config.serverUrl}${recordsPath(resource)}${search ? `?${search}` : ""}`;
      return pipe(
        fetchPage(resource, url, "first"),
        withRecordClientLogging("List", {
          collection: resource.collection,
          sortKeys,
        }),
      );
    },
    getNextPage: (request) =>
      pipe(
        fetchPage(request.resource, request.url, "next"),
        withRecordClientLogging("NextPage", { url: request.url }),
      ),
    get: (resource, id) =>
      pipe(
        fetchOne(
          resource,
          `${config.serverUrl}${recordPath(resource, id)}`,
          "GET",
        ),
        withRecordClientLogging("Get", { id }),
      ),
    create: (resource, body) =>
      pipe(
        fetchOne(
          resource,
          `${config.serverUrl}${recordsPath(resource)}`,
          "POST",
          body,
        ),
        withRecordClientLogging("Create", { title: body.title }),
      ),
    update: (resource, id, body) =>
      pipe(
        fetchOne(
          resource,
          `${config.serverUrl}${recordPath(resource, id)}`,
          "PATCH",
          body,
        ),
        withRecordClientLogging("Update", { id }),
      ),
    delete: (resource, id) =>
      pipe(
        fetchOne(
          resource,
          `${config.serverUrl}${recordPath(resource, id)}`,
          "DELETE",
        ),
        withRecordClientLogging("Delete", { id }),
      ),
  };
};

/**
 * The live RecordClient, built from the ClientConfig service.
 */
export const RecordClientLive = Layer.effect(
  RecordClient,
  Effect.map(ClientConfig, (config) => makeRecordClient(config)),
);
