import { Effect, Either, Option } from "effect";
import { formatErrorSync } from "@effect/schema/TreeFormatter";
import {
  BadStatusError,
  type ClientError,
  DecodeError,
} from "../../../../lib/client/Errors";
import type { Page } from "../../../../lib/client/pager";
import type { RecordClientService } from "../../../../lib/client/recordClient";
import {
  recordPath,
  recordsPath,
  type Resource,
} from "../../../../lib/client/resource";

/**
 * A record as the server stores it, in wire shape.
 */
export interface StoredRecord {
  readonly id: string;
  readonly title?: string;
  readonly description?: string;
  readonly last_modified: number;
}

type Operation = keyof RecordClientService;

export interface MemoryRecordClient extends RecordClientService {
  readonly records: () => ReadonlyArray<StoredRecord>;
  /** Makes the next call of `operation` fail with `error`. */
  readonly failNext: (operation: Operation, error: ClientError) => void;
}

const fieldOf = (
  row: StoredRecord,
  field: string,
): string | number | undefined => {
  switch (field) {
    case "id":
      return row.id;
    case "title":
      return row.title;
    case "description":
      return row.description;
    case "last_modified":
      return row.last_modified;
    default:
      return undefined;
  }
};

const compareBy =
  (key: string) =>
  (a: StoredRecord, b: StoredRecord): number => {
    const descending = key.startsWith("-");
    const field = descending ? key.slice(1) : key;
    const left = fieldOf(a, field);
    const right = fieldOf(b, field);
    const order =
      typeof left === "number" && typeof right === "number"
        ? left - right
        : String(left ?? "").localeCompare(String(right ?? ""));
    return descending ? -order : order;
  };

/**
 * Test double for the controller tests: an in-process RecordClient over
 * an array of stored records. Listing honours `_sort` and `_limit` and
 * hands out `memory:` cursors for the following pages.
 */
export const makeMemoryRecordClient = (
  initial: ReadonlyArray<StoredRecord> = [],
  startTime = 1_700_000_000_000,
): MemoryRecordClient => {
  let rows = [...initial];
  let clock = startTime;
  let sequence = 0;
  const failures = new Map<Operation, ClientError>();

  const guard = <A>(
    operation: Operation,
    run: () => Effect.Effect<A, ClientError>,
  ): Effect.Effect<A, ClientError> =>
    Effect.suspend(() => {
      const failure = failures.get(operation);
      if (failure) {
        failures.delete(operation);
        return Effect.fail(failure);
      }
      return run();
    });

  const decode = <A>(
    resource: Resource<A>,
    url: string,
    row: unknown,
  ): Effect.Effect<A, DecodeError> =>
    Either.match(resource.decode(row), {
      onLeft: (e) =>
        Effect.fail(new DecodeError({ url, message: formatErrorSync(e) })),
      onRight: (value) => Effect.succeed(value),
    });

  const notFound = (url: string) =>
    new BadStatusError({
      url,
      status: 404,
      message: "The requested resource was not found",
    });

  const page = <A>(
    resource: Resource<A>,
    query: URLSearchParams,
    origin: Page<A>["origin"],
  ): Effect.Effect<Page<A>, ClientError> => {
    const url = `memory:${recordsPath(resource)}?${query.toString()}`;
    const sorted = [...rows];
    for (const key of (query.get("_sort") ?? "").split(",").reverse()) {
      if (key) sorted.sort(compareBy(key));
    }
    const offset = Number(query.get("_offset") ?? "0");
    const limit = query.has("_limit")
      ? Number(query.get("_limit"))
      : sorted.length;
    const slice = sorted.slice(offset, offset + limit);
    const next = new URLSearchParams(query);
    next.set("_offset", String(offset + limit));
    return Effect.map(
      Effect.forEach(slice, (row) => decode(resource, url, row)),
      (objects) => ({
        objects,
        nextPage:
          offset + limit < sorted.length
            ? Option.some(`memory:${recordsPath(resource)}?${next.toString()}`)
            : Option.none(),
        total: sorted.length,
        origin,
      }),
    );
  };

  const find = (id: string) => rows.find((row) => row.id === id);

  return {
    records: () => rows,
    failNext: (operation, error) => {
      failures.set(operation, error);
    },
    list: (resource, sortKeys, limit) =>
      guard("list", () => {
        const query = new URLSearchParams();
        if (sortKeys.length > 0) query.set("_sort", sortKeys.join(","));
        if (Option.isSome(limit)) query.set("_limit", String(limit.value));
        return page(resource, query, "first");
      }),
    getNextPage: (request) =>
      guard("getNextPage", () =>
        page(
          request.resource,
          new URLSearchParams(request.url.split("?")[1] ?? ""),
          "next",
        ),
      ),
    get: (resource, id) =>
      guard("get", () => {
        const url = `memory:${recordPath(resource, id)}`;
        const row = find(id);
        return row ? decode(resource, url, row) : Effect.fail(notFound(url));
      }),
    create: (resource, body) =>
      guard("create", () => {
        sequence += 1;
        clock += 1;
        const row: StoredRecord = {
          id: `record-${sequence}`,
          ...body,
          last_modified: clock,
        };
        rows = [...rows, row];
        return decode(resource, `memory:${recordsPath(resource)}`, row);
      }),
    update: (resource, id, body) =>
      guard("update", () => {
        const url = `memory:${recordPath(resource, id)}`;
        const row = find(id);
        if (!row) return Effect.fail(notFound(url));
        clock += 1;
        const updated: StoredRecord = { ...row, ...body, last_modified: clock };
        rows = rows.map((r) => (r.id === id ? updated : r));
        return decode(resource, url, updated);
      }),
    delete: (resource, id) =>
      guard("delete", () => {
        const url = `memory:${recordPath(resource, id)}`;
        if (!find(id)) return Effect.fail(notFound(url));
        clock += 1;
        rows = rows.filter((r) => r.id !== id);
        return decode(resource, url, {
          id,
          last_modified: clock,
          deleted: true,
        });
      }),
  };
};
