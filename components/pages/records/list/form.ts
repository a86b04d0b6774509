import { Option } from "effect";
import { updateById, type Pager } from "../../../../lib/client/pager";
import type {
  RemoteRecord,
  WireRecord,
} from "../../../../lib/shared/schemas";
import type { FormData } from "./types";

export const emptyForm: FormData = {
  id: Option.none(),
  title: "",
  description: "",
};

export const recordToForm = (record: RemoteRecord): FormData => ({
  id: Option.some(record.id),
  title: record.title ?? "",
  description: record.description ?? "",
});

export const formToWireRecord = (form: FormData): WireRecord => ({
  title: form.title,
  description: form.description,
});

/**
 * Mirrors the unsaved form into the list entry being edited, so the table
 * shows the edit before it is saved. A form without an id leaves the pager
 * untouched.
 */
export const reflectForm = (
  form: FormData,
  pager: Pager<RemoteRecord>,
): Pager<RemoteRecord> =>
  Option.match(form.id, {
    onNone: () => pager,
    onSome: (id) =>
      updateById(pager, id, (record) => ({
        ...record,
        title: form.title,
        description: form.description,
      })),
  });
