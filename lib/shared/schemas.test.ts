import { describe, it, expect } from "vitest";
import { Schema } from "@effect/schema";
import { Either } from "effect";
import { ErrorBodySchema, RemoteRecordSchema } from "./schemas";

const decodeRecord = Schema.decodeUnknownEither(RemoteRecordSchema);

describe("RemoteRecordSchema", () => {
  it("maps last_modified onto lastModified", () => {
    const record = Either.getOrThrow(
      decodeRecord({
        id: "a",
        title: "Milk",
        description: "semi",
        last_modified: 42,
      }),
    );
    expect(record).toEqual({
      id: "a",
      title: "Milk",
      description: "semi",
      lastModified: 42,
    });
  });

  it("accepts records without title or description", () => {
    const record = Either.getOrThrow(decodeRecord({ id: "a", last_modified: 1 }));
    expect(record.title).toBeUndefined();
    expect(record.description).toBeUndefined();
  });

  it("drops fields it does not know", () => {
    const record = Either.getOrThrow(
      decodeRecord({ id: "a", last_modified: 1, deleted: true, schema: 3 }),
    );
    expect(record).toEqual({ id: "a", lastModified: 1 });
  });

  it("rejects a record without an id or timestamp", () => {
    expect(Either.isLeft(decodeRecord({ title: "x", last_modified: 1 }))).toBe(
      true,
    );
    expect(Either.isLeft(decodeRecord({ id: "a" }))).toBe(true);
    expect(Either.isLeft(decodeRecord({ id: "a", last_modified: 1.5 }))).toBe(
      true,
    );
  });
});

describe("ErrorBodySchema", () => {
  it("reads the server error fields", () => {
    const body = Either.getOrThrow(
      Schema.decodeUnknownEither(ErrorBodySchema)({
        code: 404,
        errno: 110,
        error: "Not Found",
        message: "The requested resource was not found",
      }),
    );
    expect(body).toEqual({
      code: 404,
      error: "Not Found",
      message: "The requested resource was not found",
    });
  });
});
