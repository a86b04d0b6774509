// components/pages/records/list/types.ts
import type { TemplateResult } from "lit-html";
import { Data, type Either, type Option } from "effect";
import type { ClientError } from "../../../../lib/client/Errors";
import type { NextPageRequest, Page, Pager } from "../../../../lib/client/pager";
import type { Resource } from "../../../../lib/client/resource";
import type {
  RemoteRecord,
  WireRecord,
} from "../../../../lib/shared/schemas";

export interface ViewResult {
  template: TemplateResult;
  cleanup?: () => void;
}

export type Sort = Data.TaggedEnum<{
  Ascending: { readonly column: string };
  Descending: { readonly column: string };
}>;

export const Sort = Data.taggedEnum<Sort>();

/**
 * The local draft. A `None` id means the form creates a new record,
 * `Some(id)` means it edits record `id`.
 */
export interface FormData {
  readonly id: Option.Option<string>;
  readonly title: string;
  readonly description: string;
}

export interface Model {
  readonly error: string | null;
  readonly pager: Pager<RemoteRecord>;
  readonly formData: FormData;
  readonly currentTime: number;
  readonly sort: Sort;
  readonly limit: Option.Option<number>;
}

type Result<A> = Either.Either<A, ClientError>;

export type Action =
  | { type: "TIME_TICK"; payload: number }
  | { type: "FETCH_RECORDS" }
  | { type: "FETCH_NEXT_RECORDS" }
  | { type: "RECORD_FETCHED"; payload: Result<RemoteRecord> }
  | { type: "RECORDS_FETCHED"; payload: Result<Page<RemoteRecord>> }
  | { type: "RECORD_CREATED"; payload: Result<RemoteRecord> }
  | { type: "START_EDIT"; payload: string }
  | { type: "RECORD_EDITED"; payload: Result<RemoteRecord> }
  | { type: "START_DELETE"; payload: string }
  | { type: "RECORD_DELETED"; payload: Result<RemoteRecord> }
  | { type: "EDIT_FORM_TITLE"; payload: string }
  | { type: "EDIT_FORM_DESCRIPTION"; payload: string }
  | { type: "SUBMIT" }
  | { type: "CHANGE_SORT_COLUMN"; payload: string }
  | { type: "SET_LIMIT_TEXT"; payload: string }
  | { type: "APPLY_LIMIT" };

/**
 * Requests emitted by the transition function, run by the controller
 * against the RecordClient.
 */
export type Command =
  | {
      type: "LIST_RECORDS";
      resource: Resource<RemoteRecord>;
      sortKeys: ReadonlyArray<string>;
      limit: Option.Option<number>;
    }
  | { type: "FETCH_NEXT_PAGE"; request: NextPageRequest<RemoteRecord> }
  | { type: "GET_RECORD"; resource: Resource<RemoteRecord>; id: string }
  | { type: "CREATE_RECORD"; resource: Resource<RemoteRecord>; body: WireRecord }
  | {
      type: "UPDATE_RECORD";
      resource: Resource<RemoteRecord>;
      id: string;
      body: WireRecord;
    }
  | { type: "DELETE_RECORD"; resource: Resource<RemoteRecord>; id: string };
