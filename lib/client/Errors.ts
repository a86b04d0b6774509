// FILE: lib/client/Errors.ts
import { Data } from "effect";

/**
 * The request never produced a response (DNS, connection refused, CORS, ...).
 */
export class NetworkError extends Data.TaggedError("NetworkError")<{
  readonly url: string;
  readonly message: string;
}> {}

/**
 * The server answered with a non-2xx status.
 */
export class BadStatusError extends Data.TaggedError("BadStatusError")<{
  readonly url: string;
  readonly status: number;
  readonly message: string;
}> {}

/**
 * The body was not JSON, or did not match the expected schema.
 */
export class DecodeError extends Data.TaggedError("DecodeError")<{
  readonly url: string;
  readonly message: string;
}> {}

export type ClientError = NetworkError | BadStatusError | DecodeError;

/**
 * Collapses any client failure into the string shown in the error banner.
 */
export const formatClientError = (error: ClientError): string => {
  switch (error._tag) {
    case "NetworkError":
      return `Network error: ${error.message}`;
    case "BadStatusError":
      return `Bad status ${error.status}: ${error.message}`;
    case "DecodeError":
      return `Unexpected response: ${error.message}`;
  }
};
