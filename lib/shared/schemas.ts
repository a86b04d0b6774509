// FILE: lib/shared/schemas.ts

import { Schema } from "@effect/schema";

/**
 * A central place for defining the wire schemas of the record service.
 * Response envelopes are decoded in two steps: the envelope first, then
 * `data` with the decoder of the resource being requested.
 */

/**
 * A single record as stored by the remote collection.
 * `title` and `description` may be missing on the wire; a missing field
 * decodes to `undefined` rather than failing.
 */
export const RemoteRecordSchema = Schema.Struct({
  id: Schema.String,
  title: Schema.optional(Schema.String),
  description: Schema.optional(Schema.String),
  lastModified: Schema.propertySignature(Schema.Int).pipe(
    Schema.fromKey("last_modified"),
  ),
});

export type RemoteRecord = typeof RemoteRecordSchema.Type;

/**
 * The body sent on create and update. The id is never part of it.
 */
export const WireRecordSchema = Schema.Struct({
  title: Schema.String,
  description: Schema.String,
});

export type WireRecord = typeof WireRecordSchema.Type;

/**
 * `{ "data": <record> }`, as returned by single-record endpoints.
 */
export const RecordEnvelopeSchema = Schema.Struct({
  data: Schema.Unknown,
});

/**
 * `{ "data": [<record>, ...] }`, as returned by list endpoints.
 */
export const ListEnvelopeSchema = Schema.Struct({
  data: Schema.Array(Schema.Unknown),
});

/**
 * The JSON error body the server sends with non-2xx statuses.
 */
export const ErrorBodySchema = Schema.Struct({
  code: Schema.optional(Schema.Number),
  error: Schema.optional(Schema.String),
  message: Schema.optional(Schema.String),
});
