/**
 * REST HTTP primitive shared by every resource and the Service Desk client.
 * Auth: Basic Auth with account email + API token.
 */

import { HttpError, NotFoundError } from "./errors";
import { isJsonObject, type JsonValue } from "./json";

export interface RestSession {
  username: string;
  apiToken: string;
  headers?: Record<string, string>;
  timeoutMs?: number;
  verbose?: boolean;
  /** Replaces the global fetch, e.g. with an in-process stand-in. */
  fetch?: typeof fetch;
}

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export type QueryValue = string | number | boolean | null | undefined | Array<string | number>;
export type QueryParams = Record<string, QueryValue>;

export interface RequestOptions {
  params?: QueryParams;
  json?: JsonValue;
  form?: FormData;
  headers?: Record<string, string>;
}

export type RestResult =
  | { ok: true; status: number; headers: Headers; data: JsonValue | null }
  | { ok: false; status: number; message: string };

export type RestSuccess = Extract<RestResult, { ok: true }>;

/**
 * Append query params to a URL. null/undefined values are dropped,
 * arrays repeat the key.
 */
export function buildUrl(url: string, params?: QueryParams): string {
  if (!params) return url;

  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined || value === null) continue;
    if (Array.isArray(value)) {
      for (const item of value) search.append(key, String(item));
    } else {
      search.append(key, String(value));
    }
  }

  const query = search.toString();
  if (!query) return url;
  return `${url}${url.includes("?") ? "&" : "?"}${query}`;
}

/** URL-encode one path segment taken from caller input. */
export function encodeSegment(segment: string | number): string {
  return encodeURIComponent(String(segment));
}

/** Join a relative path onto a base URL; absolute URLs are returned as-is. */
export function urlJoin(base: string, path: string): string {
  if (!path) return base;
  if (/^https?:\/\//.test(path)) return path;
  return `${base.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;
}

/**
 * Pull the human-readable message out of an Atlassian error body.
 * Service Desk: errorMessage. Bitbucket: error.message (+ detail). Jira: errorMessages[].
 */
export function extractErrorMessage(body: string): string | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return null;
  }
  if (!isJsonObject(parsed)) return null;

  if (typeof parsed.errorMessage === "string") return parsed.errorMessage;

  const error = parsed.error;
  if (isJsonObject(error) && typeof error.message === "string") {
    const detail = error.detail;
    return typeof detail === "string" && detail ? `${error.message}\n${detail}` : error.message;
  }

  const messages = parsed.errorMessages;
  if (Array.isArray(messages)) {
    const text = messages.filter((m): m is string => typeof m === "string");
    if (text.length > 0) return text.join("; ");
  }

  if (typeof parsed.message === "string") return parsed.message;
  return null;
}

function parseBody(text: string): JsonValue | null {
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    // Some endpoints answer 2xx with plain text
    return text;
  }
}

export async function restFetch(
  session: RestSession,
  method: HttpMethod,
  url: string,
  options: RequestOptions = {}
): Promise<RestResult> {
  const target = buildUrl(url, options.params);
  const auth = Buffer.from(`${session.username}:${session.apiToken}`).toString("base64");

  const headers: Record<string, string> = {
    Authorization: `Basic ${auth}`,
    Accept: "application/json",
    ...session.headers,
    ...options.headers,
  };

  let body: string | FormData | undefined;
  if (options.form) {
    // fetch writes the multipart boundary itself
    delete headers["Content-Type"];
    body = options.form;
  } else if (options.json !== undefined) {
    headers["Content-Type"] = "application/json";
    body = JSON.stringify(options.json);
  }

  if (session.verbose) console.log(`${method} ${target}`);

  const doFetch = session.fetch ?? fetch;
  const response = await doFetch(target, {
    method,
    headers,
    body,
    signal: session.timeoutMs ? AbortSignal.timeout(session.timeoutMs) : undefined,
  });

  if (!response.ok) {
    const text = await response.text().catch(() => "");
    const message = extractErrorMessage(text) ?? (text || `HTTP ${response.status}`);
    return { ok: false, status: response.status, message };
  }

  const data = parseBody(await response.text());
  return { ok: true, status: response.status, headers: response.headers, data };
}

export function raiseForStatus(result: RestResult, url: string): RestSuccess {
  if (result.ok) return result;
  if (result.status === 404) throw new NotFoundError(result.message, url);
  throw new HttpError(result.message, result.status, url);
}

/**
 * Endpoint reference: one URL plus the session needed to call it.
 * Immutable; child() and at() return new references.
 */
export class RestClient {
  readonly url: string;
  readonly session: RestSession;

  constructor(url: string, session: RestSession) {
    this.url = url.replace(/\/+$/, "");
    this.session = session;
  }

  /** Reference to `{url}/{segment}/...`, each segment URL-encoded. */
  child(...segments: Array<string | number>): RestClient {
    const path = segments.map(encodeSegment).join("/");
    return new RestClient(urlJoin(this.url, path), this.session);
  }

  /** Reference to a relative path below this URL, or to an absolute URL. */
  at(path: string): RestClient {
    return new RestClient(urlJoin(this.url, path), this.session);
  }

  withHeaders(headers: Record<string, string>): RestClient {
    return new RestClient(this.url, {
      ...this.session,
      headers: { ...this.session.headers, ...headers },
    });
  }

  /** Raw request; non-2xx results are raised. Exposes response headers. */
  async request(method: HttpMethod, path = "", options: RequestOptions = {}): Promise<RestSuccess> {
    const url = urlJoin(this.url, path);
    const result = await restFetch(this.session, method, url, options);
    return raiseForStatus(result, url);
  }

  async get(path = "", params?: QueryParams, headers?: Record<string, string>): Promise<JsonValue | null> {
    return (await this.request("GET", path, { params, headers })).data;
  }

  async post(path = "", json?: JsonValue, options: Omit<RequestOptions, "json" | "form"> = {}): Promise<JsonValue | null> {
    return (await this.request("POST", path, { ...options, json })).data;
  }

  async postForm(path: string, form: FormData, options: Omit<RequestOptions, "json" | "form"> = {}): Promise<JsonValue | null> {
    return (await this.request("POST", path, { ...options, form })).data;
  }

  async put(path = "", json?: JsonValue): Promise<JsonValue | null> {
    return (await this.request("PUT", path, { json })).data;
  }

  async delete(path = "", json?: JsonValue): Promise<JsonValue | null> {
    return (await this.request("DELETE", path, { json })).data;
  }
}
