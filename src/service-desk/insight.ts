/**
 * Insight (Assets) API reached through the Jira Service Management gateway.
 * The workspace id is looked up on first use and remembered.
 */

import { encodeSegment, type QueryParams, type RestClient } from "../rest/client";
import { NotFoundError } from "../rest/errors";
import { asArray, asObject, asString, compact, pluck, type JsonObject, type JsonValue } from "../rest/json";

export interface IqlOptions {
  page?: number;
  resultPerPage?: number;
  includeAttributes?: boolean;
  /** Levels of referenced objects whose attributes are included. */
  includeAttributesDeep?: number;
  includeTypeAttributes?: boolean;
  /** Flag objects that have open Jira issues connected. */
  includeExtendedInfo?: boolean;
}

export interface InsightObjectChanges {
  objectTypeId?: string;
  attributes?: JsonValue[];
  hasAvatar?: boolean;
  avatarUUID?: string;
}

export interface ObjectTypeChanges {
  name?: string;
  iconId?: string;
  objectSchemaId?: string;
  description?: string;
  parentObjectTypeId?: string;
  inherited?: boolean;
  abstractObjectType?: boolean;
}

export interface ObjectTypeAttributeOptions {
  onlyValueEditable?: boolean;
  orderByName?: boolean;
  query?: string;
  includeValuesExist?: boolean;
  excludeParentAttributes?: boolean;
  includeChildren?: boolean;
  orderByRequired?: boolean;
}

export class Insight {
  private readonly client: RestClient;
  private readonly version: number;
  private endpoint: Promise<RestClient> | undefined;

  constructor(client: RestClient, version = 1) {
    this.client = client;
    this.version = version;
  }

  async getWorkspaceIds(): Promise<string[]> {
    const result = asObject(await this.client.get("rest/servicedeskapi/insight/workspace"), "insight/workspace");
    return asArray(result.values ?? [], "values").map(v => asString(pluck(asObject(v, "values[]"), "workspaceId"), "workspaceId"));
  }

  async getWorkspaceId(): Promise<string> {
    const [first] = await this.getWorkspaceIds();
    if (first === undefined) {
      throw new NotFoundError("No Insight workspace available", `${this.client.url}/rest/servicedeskapi/insight/workspace`);
    }
    return first;
  }

  /** A failed lookup is not remembered, the next call retries it. */
  private api(): Promise<RestClient> {
    if (!this.endpoint) {
      this.endpoint = this.getWorkspaceId()
        .then(id => this.client.at(`gateway/api/jsm/insight/workspace/${encodeSegment(id)}/v${this.version}`))
        .catch((err: unknown) => {
          this.endpoint = undefined;
          throw err;
        });
    }
    return this.endpoint;
  }

  private async get(path: string, params?: QueryParams): Promise<JsonValue | null> {
    return (await this.api()).get(path, params);
  }

  private async getObject(path: string, params?: QueryParams): Promise<JsonObject> {
    return asObject(await this.get(path, params), path);
  }

  // IQL

  /** Find objects with an Insight Query Language expression. */
  getIqlObjects(iql: string, options: IqlOptions = {}): Promise<JsonObject> {
    return this.getObject("iql/objects", {
      iql,
      page: options.page,
      resultperpage: options.resultPerPage,
      includeattributes: options.includeAttributes,
      includeattributesdeep: options.includeAttributesDeep,
      includetypeattributes: options.includeTypeAttributes,
      includeextendedinfo: options.includeExtendedInfo,
    });
  }

  // Objects

  getObjectById(objectId: string): Promise<JsonObject> {
    return this.getObject(`object/${encodeSegment(objectId)}`);
  }

  async putObject(
    objectId: string,
    objectTypeId: string,
    attributes: JsonValue[],
    hasAvatar?: boolean,
    avatarUUID?: string
  ): Promise<JsonValue | null> {
    const body = compact({ objectTypeId, attributes, hasAvatar, avatarUUID });
    return (await this.api()).put(`object/${encodeSegment(objectId)}`, body);
  }

  /**
   * Update an object, filling every field not given from its current state.
   */
  async updateObject(objectId: string, changes: InsightObjectChanges = {}): Promise<JsonValue | null> {
    const current = await this.getObjectById(objectId);
    const currentAvatar = pluck(current, "avatar.mediaClientConfig.fileId");
    const currentHasAvatar = current.hasAvatar;

    return this.putObject(
      objectId,
      changes.objectTypeId ?? asString(pluck(current, "objectType.id"), "objectType.id"),
      changes.attributes ?? asArray(current.attributes ?? [], "attributes"),
      changes.hasAvatar ?? (typeof currentHasAvatar === "boolean" ? currentHasAvatar : undefined),
      changes.avatarUUID ?? (typeof currentAvatar === "string" ? currentAvatar : undefined)
    );
  }

  async deleteObject(objectId: string): Promise<JsonValue | null> {
    return (await this.api()).delete(`object/${encodeSegment(objectId)}`);
  }

  async getObjectAttributes(objectId: string): Promise<JsonValue[]> {
    return asArray(await this.get(`object/${encodeSegment(objectId)}/attributes`), "attributes");
  }

  async getObjectHistory(objectId: string, asc?: boolean, abbreviate?: boolean): Promise<JsonValue[]> {
    return asArray(await this.get(`object/${encodeSegment(objectId)}/history`, { asc, abbreviate }), "history");
  }

  async getObjectReferenceInfo(objectId: string): Promise<JsonValue[]> {
    return asArray(await this.get(`object/${encodeSegment(objectId)}/referenceinfo`), "referenceinfo");
  }

  /** Returns the created object, without attributes. */
  async createObject(
    objectTypeId: string,
    attributes: JsonValue[],
    hasAvatar?: boolean,
    avatarUUID?: string
  ): Promise<JsonValue | null> {
    const body = compact({ objectTypeId, attributes, hasAvatar, avatarUUID });
    return (await this.api()).post("object/create", body);
  }

  getObjectConnectedTickets(objectId: string): Promise<JsonObject> {
    return this.getObject(`objectconnectedtickets/${encodeSegment(objectId)}/tickets`);
  }

  // Object schemas

  listObjectSchemas(): Promise<JsonObject> {
    return this.getObject("objectschema/list");
  }

  async createObjectSchema(name: string, objectSchemaKey: string, description: string): Promise<JsonValue | null> {
    return (await this.api()).post("objectschema/create", { name, objectSchemaKey, description });
  }

  getObjectSchema(schemaId: string): Promise<JsonObject> {
    return this.getObject(`objectschema/${encodeSegment(schemaId)}`);
  }

  async getObjectSchemaAttributes(schemaId: string): Promise<JsonValue[]> {
    return asArray(await this.get(`objectschema/${encodeSegment(schemaId)}/attributes`), "attributes");
  }

  async getObjectSchemaObjectTypesFlat(schemaId: string): Promise<JsonValue[]> {
    return asArray(await this.get(`objectschema/${encodeSegment(schemaId)}/objecttypes/flat`), "objecttypes");
  }

  // Object types

  getObjectType(typeId: string): Promise<JsonObject> {
    return this.getObject(`objecttype/${encodeSegment(typeId)}`);
  }

  /**
   * Update an object type. name, icon and schema default to the current
   * values; the optional fields are only sent when given.
   */
  async updateObjectType(typeId: string, changes: ObjectTypeChanges = {}): Promise<JsonValue | null> {
    let { name, iconId, objectSchemaId } = changes;
    if (name === undefined || iconId === undefined || objectSchemaId === undefined) {
      const current = await this.getObjectType(typeId);
      name ??= asString(current.name, "name");
      iconId ??= asString(pluck(current, "icon.id"), "icon.id");
      objectSchemaId ??= asString(current.objectSchemaId, "objectSchemaId");
    }

    const body = compact({
      id: typeId,
      name,
      iconId,
      objectSchemaId,
      description: changes.description,
      parentObjectTypeId: changes.parentObjectTypeId,
      inherited: changes.inherited,
      abstractObjectType: changes.abstractObjectType,
    });
    return (await this.api()).put(`objecttype/${encodeSegment(typeId)}`, body);
  }

  async getObjectTypeAttributes(typeId: string, options: ObjectTypeAttributeOptions = {}): Promise<JsonValue[]> {
    const result = await this.get(`objecttype/${encodeSegment(typeId)}/attributes`, {
      onlyValueEditable: options.onlyValueEditable,
      orderByName: options.orderByName,
      query: options.query,
      includeValuesExist: options.includeValuesExist,
      excludeParentAttributes: options.excludeParentAttributes,
      includeChildren: options.includeChildren,
      orderByRequired: options.orderByRequired,
    });
    return asArray(result, "attributes");
  }
}
