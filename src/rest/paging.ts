/**
 * Bitbucket-style pagination: each page carries `values` and, unless it is
 * the last one, a `next` URL with the continuation state baked in.
 */

import type { QueryParams, RestClient } from "./client";
import { SchemaMismatchError } from "./errors";
import { isJsonObject, type JsonObject } from "./json";

/**
 * Yield every record across all pages. Params go on the first request only;
 * `next` URLs are followed as-is until a page has none. A page without
 * `values` counts as empty. Non-object records are dropped.
 */
export async function* pagedValues(client: RestClient, params?: QueryParams): AsyncGenerator<JsonObject> {
  let nextUrl: string | null = client.url;
  let pageParams = params;

  while (nextUrl) {
    const pageClient = client.at(nextUrl);
    const page = await pageClient.get("", pageParams);
    if (!isJsonObject(page)) throw new SchemaMismatchError(`Expected a page object from ${pageClient.url}`);

    const values = Array.isArray(page.values) ? page.values : [];
    for (const value of values) {
      if (isJsonObject(value)) yield value;
    }

    nextUrl = typeof page.next === "string" ? page.next : null;
    pageParams = undefined;
  }
}

/**
 * Lazy, finite, re-iterable sequence. Every `for await` starts over from the
 * first page; no iterator state is shared between consumers.
 */
export class PagedSequence<T> implements AsyncIterable<T> {
  private readonly source: () => AsyncGenerator<T>;

  constructor(source: () => AsyncGenerator<T>) {
    this.source = source;
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return this.source();
  }

  async toArray(): Promise<T[]> {
    const items: T[] = [];
    for await (const item of this) items.push(item);
    return items;
  }
}
