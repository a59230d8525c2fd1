/**
 * Lazy resource model for Bitbucket Cloud.
 *
 * A resource object owns one fetched JSON document plus the endpoint it came
 * from. Accessors only read the cached document; anything that needs the
 * network is a method returning a Promise, a PagedSequence or a ResourceRef.
 */

import type { QueryParams, RestClient } from "../rest/client";
import { NotFoundError, SchemaMismatchError } from "../rest/errors";
import { asString, isJsonObject, pluck, type JsonObject, type JsonValue } from "../rest/json";
import { PagedSequence, pagedValues } from "../rest/paging";
import { parseBitbucketTime } from "./time";

/**
 * Records some paged endpoints emit inline in place of a failed item.
 */
export function isErrorMarker(data: JsonObject): boolean {
  return "errors" in data || data.type === "error";
}

function errorMarkerMessage(data: JsonObject): string {
  const message = pluck(data, "error.message");
  return typeof message === "string" ? message : "Resource reported an error";
}

export abstract class BitbucketCloudBase {
  readonly client: RestClient;
  readonly data: JsonObject;

  /**
   * @param expectedType - type tag the document must carry. A document
   *   without any `type` field is accepted as-is.
   */
  constructor(client: RestClient, data: JsonObject, expectedType?: string) {
    const actual = data.type;
    if (expectedType !== undefined && actual !== undefined && actual !== expectedType) {
      const got = typeof actual === "string" ? actual : JSON.stringify(actual);
      throw new SchemaMismatchError(`Expected type of data is [${expectedType}], got [${got}]`);
    }
    this.client = client;
    this.data = data;
  }

  /** API URL of this resource. */
  get url(): string {
    return this.client.url;
  }

  /** Raw field read; dotted paths reach into nested objects. */
  getData(path: string): JsonValue | undefined {
    return pluck(this.data, path);
  }

  /** null when the field is absent or null; throws TimeFormatError when malformed. */
  getTime(path: string): Date | null {
    const value = this.getData(path);
    if (value === undefined || value === null) return null;
    return parseBitbucketTime(asString(value, path));
  }

  /** Endpoint for an embedded document: its own self link, else ours. */
  protected embeddedClient(doc: JsonObject): RestClient {
    const self = pluck(doc, "links.self.href");
    return typeof self === "string" ? this.client.at(self) : this.client;
  }
}

/**
 * A related resource known only by URL. Reading it costs a request,
 * which is why it is not a plain accessor value.
 */
export class ResourceRef<T> {
  readonly url: string;
  private readonly load: () => Promise<T>;

  constructor(url: string, load: () => Promise<T>) {
    this.url = url;
    this.load = load;
  }

  fetch(): Promise<T> {
    return this.load();
  }
}

/**
 * Many items of one type at one endpoint. Holds no cached state:
 * every get() and every iteration of each() hits the server.
 */
export abstract class ResourceCollection<T> {
  readonly client: RestClient;

  constructor(client: RestClient) {
    this.client = client;
  }

  get url(): string {
    return this.client.url;
  }

  protected abstract wrap(client: RestClient, data: JsonObject): T;

  /** Path segment that addresses one item below the collection URL. */
  protected abstract idOf(data: JsonObject): string | number;

  async get(id: string | number): Promise<T> {
    const client = this.client.child(id);
    const data = await client.get();
    if (!isJsonObject(data)) {
      throw new SchemaMismatchError(`Expected a JSON object from ${client.url}`);
    }
    if (isErrorMarker(data)) throw new NotFoundError(errorMarkerMessage(data), client.url);
    return this.wrap(client, data);
  }

  protected paged(params?: QueryParams): PagedSequence<T> {
    return new PagedSequence(() => this.wrapPages(params));
  }

  private async *wrapPages(params?: QueryParams): AsyncGenerator<T> {
    for await (const data of pagedValues(this.client, params)) {
      if (isErrorMarker(data)) continue;
      yield this.wrap(this.client.child(this.idOf(data)), data);
    }
  }
}
