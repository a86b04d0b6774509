import { Option } from "effect";
import type { Resource } from "./resource";

/**
 * One page of results as returned by the record client.
 * `origin` tells whether it answers a fresh list request or a
 * next-page request.
 */
export interface Page<A> {
  readonly objects: ReadonlyArray<A>;
  readonly nextPage: Option.Option<string>;
  readonly total: number;
  readonly origin: "first" | "next";
}

/**
 * The records currently loaded for a resource, in server order.
 */
export interface Pager<A> {
  readonly resource: Resource<A>;
  readonly objects: ReadonlyArray<A>;
  readonly nextPage: Option.Option<string>;
  readonly total: number;
}

export interface NextPageRequest<A> {
  readonly resource: Resource<A>;
  readonly url: string;
}

export const empty = <A>(resource: Resource<A>): Pager<A> => ({
  resource,
  objects: [],
  nextPage: Option.none(),
  total: 0,
});

/**
 * Folds an incoming page into the pager: a first page replaces the loaded
 * objects, a next page is appended to them. Cursor and total always come
 * from the incoming page.
 */
export const merge = <A>(page: Page<A>, previous: Pager<A>): Pager<A> => ({
  resource: previous.resource,
  objects:
    page.origin === "next"
      ? [...previous.objects, ...page.objects]
      : page.objects,
  nextPage: page.nextPage,
  total: page.total,
});

export const hasNext = <A>(pager: Pager<A>): boolean =>
  Option.isSome(pager.nextPage);

export const loadNext = <A>(
  pager: Pager<A>,
): Option.Option<NextPageRequest<A>> =>
  Option.map(pager.nextPage, (url) => ({ resource: pager.resource, url }));

export const removeById = <A extends { readonly id: string }>(
  pager: Pager<A>,
  id: string,
): Pager<A> => ({
  ...pager,
  objects: pager.objects.filter((object) => object.id !== id),
});

export const updateById = <A extends { readonly id: string }>(
  pager: Pager<A>,
  id: string,
  f: (object: A) => A,
): Pager<A> => ({
  ...pager,
  objects: pager.objects.map((object) =>
    object.id === id ? f(object) : object,
  ),
});
