/**
 * Jira Service Desk REST client (rest/servicedeskapi).
 * Uses Basic Auth with JIRA_EMAIL + JIRA_API_TOKEN from env.
 *
 * Flat one-shot calls returning plain JSON. Paging is caller-driven
 * through start/limit.
 */

import { readFile } from "fs/promises";
import { basename } from "path";
import type { Config } from "../config";
import { RestClient, encodeSegment, type QueryParams, type RestSession } from "../rest/client";
import { SchemaMismatchError } from "../rest/errors";
import { asArray, asObject, asOptionalString, asString, compact, isJsonObject, type JsonObject, type JsonValue } from "../rest/json";
import { Insight } from "./insight";

export interface ServiceDeskClientConfig extends RestSession {
  baseUrl: string;
  insightWorkspaceVersion?: number;
}

export const EXPERIMENTAL_HEADERS = {
  "Content-Type": "application/json",
  "X-ExperimentalApi": "opt-in",
};

export const NO_CHECK_HEADERS = {
  "X-Atlassian-Token": "no-check",
};

export type ApprovalDecision = "approve" | "decline";

export function getServiceDeskConfig(config: Config): ServiceDeskClientConfig | null {
  const sd = config.service_desk;
  if (!sd) return null;

  const email = process.env.JIRA_EMAIL;
  const apiToken = process.env.JIRA_API_TOKEN;

  if (!email || !apiToken) {
    console.log("Service Desk: no credentials found. Set JIRA_EMAIL and JIRA_API_TOKEN");
    return null;
  }

  return {
    baseUrl: sd.base_url,
    insightWorkspaceVersion: sd.insight_workspace_version,
    username: email,
    apiToken,
    timeoutMs: config.http.timeout_ms,
    verbose: config.http.verbose,
  };
}

function pageParams(start?: number, limit?: number): QueryParams {
  return { start, limit };
}

export class ServiceDesk {
  readonly client: RestClient;
  readonly insight: Insight;

  constructor(config: ServiceDeskClientConfig) {
    this.client = new RestClient(config.baseUrl, config).withHeaders(EXPERIMENTAL_HEADERS);
    this.insight = new Insight(this.client, config.insightWorkspaceVersion ?? 1);
  }

  private notice(message: string): void {
    if (this.client.session.verbose) console.log(message);
  }

  private async getObject(path: string, params?: QueryParams): Promise<JsonObject> {
    return asObject(await this.client.get(path, params), path);
  }

  private async getValues(path: string, params?: QueryParams): Promise<JsonValue[]> {
    const page = await this.getObject(path, params);
    return asArray(page.values ?? [], `${path} values`);
  }

  // Information actions

  getInfo(): Promise<JsonValue | null> {
    return this.client.get("rest/servicedeskapi/info");
  }

  getServiceDesks(): Promise<JsonValue[]> {
    return this.getValues("rest/servicedeskapi/servicedesk");
  }

  getServiceDeskById(serviceDeskId: string | number): Promise<JsonObject> {
    return this.getObject(`rest/servicedeskapi/servicedesk/${encodeSegment(serviceDeskId)}`);
  }

  // Customers actions

  createCustomer(fullName: string, email: string): Promise<JsonValue | null> {
    this.notice("Creating customer...");
    return this.client.post("rest/servicedeskapi/customer", { fullName, email });
  }

  getCustomers(serviceDeskId: string | number, query?: string, start = 0, limit = 50): Promise<JsonObject> {
    return this.getObject(`rest/servicedeskapi/servicedesk/${encodeSegment(serviceDeskId)}/customer`, {
      ...pageParams(start, limit),
      query,
    });
  }

  addCustomers(serviceDeskId: string | number, usernames: string[] = [], accountIds: string[] = []): Promise<JsonValue | null> {
    this.notice("Adding customers...");
    return this.client.post(`rest/servicedeskapi/servicedesk/${encodeSegment(serviceDeskId)}/customer`, { usernames, accountIds });
  }

  removeCustomers(serviceDeskId: string | number, usernames: string[] = [], accountIds: string[] = []): Promise<JsonValue | null> {
    this.notice("Removing customers...");
    return this.client.delete(`rest/servicedeskapi/servicedesk/${encodeSegment(serviceDeskId)}/customer`, { usernames, accountIds });
  }

  // Customer requests

  getCustomerRequest(issueIdOrKey: string): Promise<JsonObject> {
    return this.getObject(`rest/servicedeskapi/request/${encodeSegment(issueIdOrKey)}`);
  }

  /** Requests where the current user is involved. */
  getMyCustomerRequests(): Promise<JsonValue[]> {
    return this.getValues("rest/servicedeskapi/request");
  }

  createCustomerRequest(
    serviceDeskId: string | number,
    requestTypeId: string | number,
    requestFieldValues: JsonObject,
    raiseOnBehalfOf?: string,
    requestParticipants?: string[]
  ): Promise<JsonValue | null> {
    this.notice("Creating request...");
    const data = compact({
      serviceDeskId: String(serviceDeskId),
      requestTypeId: String(requestTypeId),
      requestFieldValues,
      raiseOnBehalfOf: raiseOnBehalfOf || undefined,
      requestParticipants: requestParticipants?.length ? requestParticipants : undefined,
    });
    return this.client.post("rest/servicedeskapi/request", data);
  }

  /** Name of the current status, null when the server reports none. */
  async getCustomerRequestStatus(issueIdOrKey: string): Promise<string | null> {
    const page = await this.getObject(`rest/servicedeskapi/request/${encodeSegment(issueIdOrKey)}/status`);
    const first = asArray(page.values ?? [], "values")[0];
    if (!isJsonObject(first)) return null;
    return asOptionalString(first.status, "values[0].status");
  }

  getCustomerTransitions(issueIdOrKey: string): Promise<JsonObject> {
    return this.getObject(`rest/servicedeskapi/request/${encodeSegment(issueIdOrKey)}/transition`);
  }

  performTransition(issueIdOrKey: string, transitionId: string | number, comment?: string): Promise<JsonValue | null> {
    this.notice("Performing transition...");
    return this.client.post(`rest/servicedeskapi/request/${encodeSegment(issueIdOrKey)}/transition`, {
      id: String(transitionId),
      additionalComment: { body: comment ?? null },
    });
  }

  // Request types

  getRequestTypes(serviceDeskId: string | number): Promise<JsonObject> {
    return this.getObject(`rest/servicedeskapi/servicedesk/${encodeSegment(serviceDeskId)}/requesttype`);
  }

  createRequestType(
    serviceDeskId: string | number,
    issueTypeId: string | number,
    name: string,
    description: string,
    helpText: string
  ): Promise<JsonValue | null> {
    this.notice("Creating request type...");
    return this.client.post(`rest/servicedeskapi/servicedesk/${encodeSegment(serviceDeskId)}/requesttype`, {
      issueTypeId: String(issueTypeId),
      name,
      description,
      helpText,
    });
  }

  // Participants actions

  getRequestParticipants(issueIdOrKey: string, start = 0, limit = 50): Promise<JsonValue[]> {
    return this.getValues(`rest/servicedeskapi/request/${encodeSegment(issueIdOrKey)}/participant`, pageParams(start, limit));
  }

  addRequestParticipants(issueIdOrKey: string, usernames: string[]): Promise<JsonValue | null> {
    return this.client.post(`rest/servicedeskapi/request/${encodeSegment(issueIdOrKey)}/participant`, { usernames });
  }

  removeRequestParticipants(issueIdOrKey: string, usernames: string[]): Promise<JsonValue | null> {
    return this.client.delete(`rest/servicedeskapi/request/${encodeSegment(issueIdOrKey)}/participant`, { usernames });
  }

  // Comments actions

  createRequestComment(issueIdOrKey: string, body: string, isPublic = true): Promise<JsonValue | null> {
    this.notice("Creating comment...");
    return this.client.post(`rest/servicedeskapi/request/${encodeSegment(issueIdOrKey)}/comment`, { body, public: isPublic });
  }

  getRequestComments(issueIdOrKey: string): Promise<JsonObject> {
    return this.getObject(`rest/servicedeskapi/request/${encodeSegment(issueIdOrKey)}/comment`);
  }

  getRequestCommentById(issueIdOrKey: string, commentId: string | number): Promise<JsonObject> {
    return this.getObject(`rest/servicedeskapi/request/${encodeSegment(issueIdOrKey)}/comment/${encodeSegment(commentId)}`);
  }

  // Organizations actions

  /**
   * Organizations in the instance, or of one service desk. Non-agents only
   * see organizations they belong to.
   */
  getOrganisations(serviceDeskId?: string | number, start = 0, limit = 50): Promise<JsonObject> {
    const path =
      serviceDeskId === undefined
        ? "rest/servicedeskapi/organization"
        : `rest/servicedeskapi/servicedesk/${encodeSegment(serviceDeskId)}/organization`;
    return this.getObject(path, pageParams(start, limit));
  }

  getOrganization(organizationId: string | number): Promise<JsonObject> {
    return this.getObject(`rest/servicedeskapi/organization/${encodeSegment(organizationId)}`);
  }

  getUsersInOrganization(organizationId: string | number, start = 0, limit = 50): Promise<JsonObject> {
    return this.getObject(`rest/servicedeskapi/organization/${encodeSegment(organizationId)}/user`, pageParams(start, limit));
  }

  createOrganization(name: string): Promise<JsonValue | null> {
    this.notice("Creating organization...");
    return this.client.post("rest/servicedeskapi/organization", { name });
  }

  /** Attach an existing organization to a service desk. */
  addOrganization(serviceDeskId: string | number, organizationId: number): Promise<JsonValue | null> {
    this.notice("Adding organization...");
    return this.client.post(`rest/servicedeskapi/servicedesk/${encodeSegment(serviceDeskId)}/organization`, { organizationId });
  }

  removeOrganization(serviceDeskId: string | number, organizationId: number): Promise<JsonValue | null> {
    this.notice("Removing organization...");
    return this.client.delete(`rest/servicedeskapi/servicedesk/${encodeSegment(serviceDeskId)}/organization`, { organizationId });
  }

  deleteOrganization(organizationId: string | number): Promise<JsonValue | null> {
    this.notice("Deleting organization...");
    return this.client.delete(`rest/servicedeskapi/organization/${encodeSegment(organizationId)}`);
  }

  addUsersToOrganization(organizationId: string | number, usernames: string[] = [], accountIds: string[] = []): Promise<JsonValue | null> {
    this.notice("Adding users...");
    return this.client.post(`rest/servicedeskapi/organization/${encodeSegment(organizationId)}/user`, { usernames, accountIds });
  }

  removeUsersFromOrganization(organizationId: string | number, usernames: string[] = [], accountIds: string[] = []): Promise<JsonValue | null> {
    this.notice("Removing users...");
    return this.client.delete(`rest/servicedeskapi/organization/${encodeSegment(organizationId)}/user`, { usernames, accountIds });
  }

  // Attachments actions

  /**
   * Upload a file as a temporary attachment of a service desk.
   * Returns the temporary attachment id to pass to addAttachments().
   */
  async attachTemporaryFile(serviceDeskId: string | number, filename: string): Promise<string> {
    const content = await readFile(filename);
    const form = new FormData();
    form.append("file", new Blob([new Uint8Array(content)]), basename(filename));

    const path = `rest/servicedeskapi/servicedesk/${encodeSegment(serviceDeskId)}/attachTemporaryFile`;
    const result = asObject(await this.client.postForm(path, form, { headers: NO_CHECK_HEADERS }), path);
    const first = asArray(result.temporaryAttachments, "temporaryAttachments")[0];
    if (!isJsonObject(first)) throw new SchemaMismatchError(`${path}: no temporary attachment returned`);
    return asString(first.temporaryAttachmentId, "temporaryAttachmentId");
  }

  addAttachments(issueIdOrKey: string, temporaryAttachmentIds: string[], isPublic = true, comment?: string): Promise<JsonValue | null> {
    return this.client.post(`rest/servicedeskapi/request/${encodeSegment(issueIdOrKey)}/attachment`, {
      temporaryAttachmentIds,
      public: isPublic,
      additionalComment: { body: comment ?? null },
    });
  }

  addAttachment(issueIdOrKey: string, temporaryAttachmentId: string, isPublic = true, comment?: string): Promise<JsonValue | null> {
    this.notice("Adding attachment");
    return this.addAttachments(issueIdOrKey, [temporaryAttachmentId], isPublic, comment);
  }

  /**
   * Upload local files and attach them to a request in one comment.
   * Files are uploaded one after another.
   */
  async createAttachments(
    serviceDeskId: string | number,
    issueIdOrKey: string,
    filenames: string | string[],
    isPublic = true,
    comment?: string
  ): Promise<JsonValue | null> {
    const files = Array.isArray(filenames) ? filenames : [filenames];
    const temporaryIds: string[] = [];
    for (const filename of files) {
      temporaryIds.push(await this.attachTemporaryFile(serviceDeskId, filename));
    }
    return this.addAttachments(issueIdOrKey, temporaryIds, isPublic, comment);
  }

  createAttachment(
    serviceDeskId: string | number,
    issueIdOrKey: string,
    filename: string,
    isPublic = true,
    comment?: string
  ): Promise<JsonValue | null> {
    this.notice("Creating attachment...");
    return this.createAttachments(serviceDeskId, issueIdOrKey, [filename], isPublic, comment);
  }

  // SLA actions

  getSla(issueIdOrKey: string, start = 0, limit = 50): Promise<JsonObject> {
    return this.getObject(`rest/servicedeskapi/request/${encodeSegment(issueIdOrKey)}/sla`, pageParams(start, limit));
  }

  getSlaById(issueIdOrKey: string, slaId: string | number): Promise<JsonObject> {
    return this.getObject(`rest/servicedeskapi/request/${encodeSegment(issueIdOrKey)}/sla/${encodeSegment(slaId)}`);
  }

  // Approvals

  getApprovals(issueIdOrKey: string, start = 0, limit = 50): Promise<JsonObject> {
    return this.getObject(`rest/servicedeskapi/request/${encodeSegment(issueIdOrKey)}/approval`, pageParams(start, limit));
  }

  getApprovalById(issueIdOrKey: string, approvalId: string | number): Promise<JsonObject> {
    return this.getObject(`rest/servicedeskapi/request/${encodeSegment(issueIdOrKey)}/approval/${encodeSegment(approvalId)}`);
  }

  answerApproval(issueIdOrKey: string, approvalId: string | number, decision: ApprovalDecision): Promise<JsonValue | null> {
    return this.client.post(`rest/servicedeskapi/request/${encodeSegment(issueIdOrKey)}/approval/${encodeSegment(approvalId)}`, { decision });
  }

  // Queues

  getQueueSettings(projectKey: string): Promise<JsonObject> {
    return this.getObject(`rest/servicedeskapi/queues/${encodeSegment(projectKey)}`);
  }

  getQueues(serviceDeskId: string | number, includeCount = false, start = 0, limit = 50): Promise<JsonObject> {
    return this.getObject(`rest/servicedeskapi/servicedesk/${encodeSegment(serviceDeskId)}/queue`, {
      includeCount,
      ...pageParams(start, limit),
    });
  }

  getIssuesInQueue(serviceDeskId: string | number, queueId: string | number, start = 0, limit = 50): Promise<JsonObject> {
    return this.getObject(
      `rest/servicedeskapi/servicedesk/${encodeSegment(serviceDeskId)}/queue/${encodeSegment(queueId)}/issue`,
      pageParams(start, limit)
    );
  }

  /**
   * Upload an app (plugin) jar through the Universal Plugin Manager.
   * The upload token comes from a response header of a preceding GET.
   */
  async uploadPlugin(pluginPath: string): Promise<JsonValue | null> {
    const probe = await this.client.request("GET", "rest/plugins/1.0/", { headers: NO_CHECK_HEADERS });
    const token = probe.headers.get("upm-token");
    if (!token) throw new SchemaMismatchError("rest/plugins/1.0/: response has no upm-token header");

    const content = await readFile(pluginPath);
    const form = new FormData();
    form.append("plugin", new Blob([new Uint8Array(content)]), basename(pluginPath));

    return this.client.postForm(`rest/plugins/1.0/?token=${encodeURIComponent(token)}`, form, {
      headers: NO_CHECK_HEADERS,
    });
  }
}
