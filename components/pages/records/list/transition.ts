// components/pages/records/list/transition.ts
import { Either, Option } from "effect";
import {
  type ClientError,
  formatClientError,
} from "../../../../lib/client/Errors";
import * as Pager from "../../../../lib/client/pager";
import type { Resource } from "../../../../lib/client/resource";
import type { RemoteRecord } from "../../../../lib/shared/schemas";
import {
  emptyForm,
  formToWireRecord,
  recordToForm,
  reflectForm,
} from "./form";
import { type Action, type Command, type Model, Sort } from "./types";

type Transition = readonly [Model, ReadonlyArray<Command>];

export const initialModel = (resource: Resource<RemoteRecord>): Model => ({
  error: null,
  pager: Pager.empty(resource),
  formData: emptyForm,
  currentTime: 0,
  sort: Sort.Descending({ column: "last_modified" }),
  limit: Option.some(5),
});

/**
 * Clicking a column header: the active column flips direction, any other
 * column becomes the ascending sort.
 */
export const nextSort = (current: Sort, column: string): Sort =>
  Sort.$match(current, {
    Ascending: ({ column: active }) =>
      active === column
        ? Sort.Descending({ column: active })
        : Sort.Ascending({ column }),
    Descending: ({ column: active }) =>
      active === column
        ? Sort.Ascending({ column: active })
        : Sort.Ascending({ column }),
  });

export const sortKey = (sort: Sort): string =>
  Sort.$match(sort, {
    Ascending: ({ column }) => column,
    Descending: ({ column }) => `-${column}`,
  });

export const listCommand = (
  model: Model,
  sort: Sort = model.sort,
): Command => ({
  type: "LIST_RECORDS",
  resource: model.pager.resource,
  sortKeys: [sortKey(sort)],
  limit: model.limit,
});

const integerPattern = /^[+-]?\d+$/;

export const parseLimit = (text: string): Option.Option<number> =>
  integerPattern.test(text)
    ? Option.some(Number.parseInt(text, 10))
    : Option.none();

const fail = (model: Model, error: ClientError): Transition => [
  { ...model, error: formatClientError(error) },
  [],
];

/**
 * The whole behaviour of the records page: given an action and the current
 * model, returns the next model and the requests to issue. Pure.
 */
export const transition = (action: Action, model: Model): Transition => {
  switch (action.type) {
    case "TIME_TICK":
      return [{ ...model, currentTime: action.payload }, []];

    case "FETCH_RECORDS":
      return [
        { ...model, pager: Pager.empty(model.pager.resource), error: null },
        [listCommand(model)],
      ];

    case "FETCH_NEXT_RECORDS":
      return [
        { ...model, error: null },
        Option.match(Pager.loadNext(model.pager), {
          onNone: (): Command[] => [],
          onSome: (request): Command[] => [
            { type: "FETCH_NEXT_PAGE", request },
          ],
        }),
      ];

    case "RECORD_FETCHED":
      return Either.match(action.payload, {
        onLeft: (e) => fail(model, e),
        onRight: (record): Transition => [
          { ...model, formData: recordToForm(record), error: null },
          [],
        ],
      });

    case "RECORDS_FETCHED":
      return Either.match(action.payload, {
        onLeft: (e) => fail(model, e),
        onRight: (page): Transition => [
          { ...model, pager: Pager.merge(page, model.pager) },
          [],
        ],
      });

    case "RECORD_CREATED":
      return Either.match(action.payload, {
        onLeft: (e) => fail(model, e),
        onRight: (): Transition => [
          { ...model, formData: emptyForm },
          [listCommand(model)],
        ],
      });

    case "START_EDIT":
      return [
        model,
        [
          {
            type: "GET_RECORD",
            resource: model.pager.resource,
            id: action.payload,
          },
        ],
      ];

    case "RECORD_EDITED":
      return Either.match(action.payload, {
        onLeft: (e) => fail(model, e),
        onRight: (): Transition => [model, [listCommand(model)]],
      });

    case "START_DELETE":
      return [
        model,
        [
          {
            type: "DELETE_RECORD",
            resource: model.pager.resource,
            id: action.payload,
          },
        ],
      ];

    case "RECORD_DELETED":
      return Either.match(action.payload, {
        onLeft: (e) => fail(model, e),
        onRight: (record): Transition => [
          {
            ...model,
            pager: Pager.removeById(model.pager, record.id),
            error: null,
          },
          [],
        ],
      });

    case "EDIT_FORM_TITLE": {
      const formData = { ...model.formData, title: action.payload };
      return [
        { ...model, formData, pager: reflectForm(formData, model.pager) },
        [],
      ];
    }

    case "EDIT_FORM_DESCRIPTION": {
      const formData = { ...model.formData, description: action.payload };
      return [
        { ...model, formData, pager: reflectForm(formData, model.pager) },
        [],
      ];
    }

    case "SUBMIT": {
      const resource = model.pager.resource;
      const body = formToWireRecord(model.formData);
      const command = Option.match(model.formData.id, {
        onNone: (): Command => ({ type: "CREATE_RECORD", resource, body }),
        onSome: (id): Command => ({
          type: "UPDATE_RECORD",
          resource,
          id,
          body,
        }),
      });
      return [{ ...model, formData: emptyForm }, [command]];
    }

    case "CHANGE_SORT_COLUMN": {
      const sort = nextSort(model.sort, action.payload);
      return [{ ...model, sort }, [listCommand(model, sort)]];
    }

    case "SET_LIMIT_TEXT":
      return [{ ...model, limit: parseLimit(action.payload) }, []];

    case "APPLY_LIMIT":
      return [model, [listCommand(model)]];
  }
};
