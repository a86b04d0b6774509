import { Schema } from "@effect/schema";
import type { ParseError } from "@effect/schema/ParseResult";
import type { Either } from "effect";

/**
 * Identifies a remote collection plus the decoder for its records.
 */
export interface Resource<A> {
  readonly bucket: string;
  readonly collection: string;
  readonly decode: (input: unknown) => Either.Either<A, ParseError>;
}

export const makeResource = <A, I>(
  bucket: string,
  collection: string,
  schema: Schema.Schema<A, I>,
): Resource<A> => ({
  bucket,
  collection,
  decode: Schema.decodeUnknownEither(schema),
});

/**
 * Path of the records endpoint, relative to the server URL.
 */
export const recordsPath = (resource: Resource<unknown>): string =>
  `/buckets/${encodeURIComponent(resource.bucket)}/collections/${encodeURIComponent(resource.collection)}/records`;

export const recordPath = (resource: Resource<unknown>, id: string): string =>
  `${recordsPath(resource)}/${encodeURIComponent(id)}`;
