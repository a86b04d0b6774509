import { describe, it, expect } from "vitest";
import { Option } from "effect";
import * as Pager from "../../../../lib/client/pager";
import { makeResource } from "../../../../lib/client/resource";
import {
  type RemoteRecord,
  RemoteRecordSchema,
} from "../../../../lib/shared/schemas";
import {
  emptyForm,
  formToWireRecord,
  recordToForm,
  reflectForm,
} from "./form";

const resource = makeResource("default", "records", RemoteRecordSchema);

describe("recordToForm", () => {
  it("copies id, title and description", () => {
    const form = recordToForm({
      id: "a",
      title: "Milk",
      description: "semi-skimmed",
      lastModified: 1,
    });
    expect(Option.getOrNull(form.id)).toBe("a");
    expect(form.title).toBe("Milk");
    expect(form.description).toBe("semi-skimmed");
  });

  it("turns missing fields into empty strings", () => {
    const form = recordToForm({ id: "a", lastModified: 1 });
    expect(form.title).toBe("");
    expect(form.description).toBe("");
  });
});

describe("formToWireRecord", () => {
  it("never sends the id", () => {
    expect(
      formToWireRecord({
        id: Option.some("a"),
        title: "Milk",
        description: "",
      }),
    ).toEqual({ title: "Milk", description: "" });
  });

  it("round-trips a record through the form", () => {
    expect(
      formToWireRecord(recordToForm({ id: "a", title: "Tea", lastModified: 1 })),
    ).toEqual({ title: "Tea", description: "" });
  });

  it("sends the empty draft as empty strings", () => {
    expect(formToWireRecord(emptyForm)).toEqual({
      title: "",
      description: "",
    });
  });
});

describe("reflectForm", () => {
  const pager = Pager.merge<RemoteRecord>(
    {
      objects: [
        { id: "a", title: "A", lastModified: 3 },
        { id: "b", title: "B", description: "bee", lastModified: 2 },
      ],
      nextPage: Option.none(),
      total: 2,
      origin: "first",
    },
    Pager.empty(resource),
  );

  it("overwrites title and description of the matching entry only", () => {
    const next = reflectForm(
      { id: Option.some("a"), title: "Ay", description: "new" },
      pager,
    );
    expect(next.objects).toEqual([
      { id: "a", title: "Ay", description: "new", lastModified: 3 },
      { id: "b", title: "B", description: "bee", lastModified: 2 },
    ]);
    expect(next.total).toBe(2);
  });

  it("returns the pager unchanged for a new draft", () => {
    expect(
      reflectForm({ id: Option.none(), title: "x", description: "y" }, pager),
    ).toBe(pager);
  });

  it("ignores an id that is not loaded", () => {
    const next = reflectForm(
      { id: Option.some("zzz"), title: "x", description: "y" },
      pager,
    );
    expect(next.objects).toEqual(pager.objects);
  });
});
