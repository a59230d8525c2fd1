export { RestClient, restFetch, raiseForStatus, buildUrl, urlJoin, encodeSegment, extractErrorMessage, type RestSession, type RestResult, type RestSuccess, type HttpMethod, type QueryParams, type QueryValue, type RequestOptions } from "./client";
export { HttpError, NotFoundError, SchemaMismatchError, InvalidStateError, InvalidArgumentError, TimeFormatError } from "./errors";
export { isJsonObject, asObject, asOptionalObject, asArray, asString, asOptionalString, asNumber, asOptionalNumber, asBoolean, asOptionalBoolean, pluck, compact, type JsonValue, type JsonObject, type JsonPrimitive } from "./json";
export { pagedValues, PagedSequence } from "./paging";
