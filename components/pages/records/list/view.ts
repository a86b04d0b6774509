// components/pages/records/list/view.ts
import { html, nothing, render } from "lit-html";
import { repeat } from "lit-html/directives/repeat.js";
import { Option } from "effect";
import * as Pager from "../../../../lib/client/pager";
import type { RemoteRecord } from "../../../../lib/shared/schemas";
import { formatTimeAgo } from "./timeAgo";
import { type Action, type Model, Sort } from "./types";

const columns = [
  { key: "title", label: "Title" },
  { key: "description", label: "Description" },
  { key: "last_modified", label: "Last modified" },
] as const;

const sortIndicator = (sort: Sort, column: string) =>
  Sort.$match(sort, {
    Ascending: (s) => (s.column === column ? " ▲" : ""),
    Descending: (s) => (s.column === column ? " ▼" : ""),
  });

export const renderView = (
  container: HTMLElement,
  currentModel: Model,
  propose: (action: Action) => void,
) => {
  const { pager, formData } = currentModel;
  const isEditing = Option.isSome(formData.id);

  const renderRow = (record: RemoteRecord) => html`
    <tr data-id=${record.id}>
      <td class="title">${record.title ?? ""}</td>
      <td class="description">${record.description ?? ""}</td>
      <td class="modified">
        ${formatTimeAgo(currentModel.currentTime, record.lastModified)}
      </td>
      <td>
        <button
          class="edit"
          @click=${() => propose({ type: "START_EDIT", payload: record.id })}
        >
          Edit
        </button>
        <button
          class="delete"
          @click=${() => propose({ type: "START_DELETE", payload: record.id })}
        >
          Delete
        </button>
      </td>
    </tr>
  `;

  const template = html`
    <div class="records">
      <div class="header">
        <h2>Records</h2>
        <button
          class="refresh"
          @click=${() => propose({ type: "FETCH_RECORDS" })}
        >
          Refresh
        </button>
      </div>
      ${currentModel.error
        ? html`<div class="error">${currentModel.error}</div>`
        : nothing}
      <table>
        <thead>
          <tr>
            ${columns.map(
              (column) => html`
                <th
                  data-column=${column.key}
                  @click=${() =>
                    propose({
                      type: "CHANGE_SORT_COLUMN",
                      payload: column.key,
                    })}
                >
                  ${column.label}${sortIndicator(
                    currentModel.sort,
                    column.key,
                  )}
                </th>
              `,
            )}
            <th></th>
          </tr>
        </thead>
        <tbody>
          ${repeat(pager.objects, (record) => record.id, renderRow)}
        </tbody>
      </table>
      <p class="count">${pager.objects.length} of ${pager.total} records</p>
      ${Pager.hasNext(pager)
        ? html`<button
            class="load-more"
            @click=${() => propose({ type: "FETCH_NEXT_RECORDS" })}
          >
            Load more
          </button>`
        : nothing}
      <div class="limit">
        <label>
          Limit
          <input
            type="text"
            name="limit"
            .value=${Option.match(currentModel.limit, {
              onNone: () => "",
              onSome: (n) => String(n),
            })}
            @input=${(e: Event) => {
              if (e.target instanceof HTMLInputElement) {
                propose({ type: "SET_LIMIT_TEXT", payload: e.target.value });
              }
            }}
          />
        </label>
        <button
          class="apply-limit"
          @click=${() => propose({ type: "APPLY_LIMIT" })}
        >
          Apply
        </button>
      </div>
      <form
        @submit=${(e: Event) => {
          e.preventDefault();
          propose({ type: "SUBMIT" });
        }}
      >
        <input
          type="text"
          name="title"
          placeholder="Title"
          .value=${formData.title}
          @input=${(e: Event) => {
            if (e.target instanceof HTMLInputElement) {
              propose({ type: "EDIT_FORM_TITLE", payload: e.target.value });
            }
          }}
        />
        <textarea
          name="description"
          placeholder="Description"
          .value=${formData.description}
          @input=${(e: Event) => {
            if (e.target instanceof HTMLTextAreaElement) {
              propose({
                type: "EDIT_FORM_DESCRIPTION",
                payload: e.target.value,
              });
            }
          }}
        ></textarea>
        <button type="submit">${isEditing ? "Update" : "Create"}</button>
      </form>
    </div>
  `;

  render(template, container);
};
