/**
 * Bitbucket pull requests: the collection under a repository and the
 * pull request resource with its review actions.
 */

import type { RestClient } from "../rest/client";
import { InvalidArgumentError, InvalidStateError, SchemaMismatchError } from "../rest/errors";
import {
  asArray,
  asNumber,
  asObject,
  asOptionalBoolean,
  asOptionalString,
  asString,
  isJsonObject,
  type JsonObject,
  type JsonValue,
} from "../rest/json";
import type { PagedSequence } from "../rest/paging";
import { BitbucketCloudBase, ResourceCollection, ResourceRef } from "./base";
import { Comments } from "./comments";
import { MERGE_STRATEGIES, isMergeStrategy, type PullRequestState } from "./const";
import { Participant } from "./participants";
import { fetchActivity, type PullRequestActivity } from "./pr-activity";
import { Repository } from "./repositories";
import { User } from "./users";

export class PullRequests extends ResourceCollection<PullRequest> {
  protected wrap(client: RestClient, data: JsonObject): PullRequest {
    return new PullRequest(client, data);
  }

  protected idOf(data: JsonObject): number {
    return asNumber(data.id, "id");
  }

  /**
   * @param q - filter expression, e.g. `author.nickname = "alice"`
   * @param sort - response property to sort by, `-` prefix for descending
   * @param state - server default is OPEN only
   */
  each(q?: string, sort?: string, state?: PullRequestState[]): PagedSequence<PullRequest> {
    return this.paged({ q, sort, state });
  }
}

export class PullRequest extends BitbucketCloudBase {
  constructor(client: RestClient, data: JsonObject) {
    super(client, data, "pullrequest");
  }

  get id(): number {
    return asNumber(this.getData("id"), "id");
  }

  get title(): string {
    return asString(this.getData("title"), "title");
  }

  get description(): string | null {
    return asOptionalString(this.getData("description"), "description");
  }

  /** Raw state string as sent by the server. */
  get state(): string {
    return asString(this.getData("state"), "state");
  }

  // An unrecognized state makes all four predicates false
  private stateIs(expected: PullRequestState): boolean {
    const state = this.getData("state");
    return typeof state === "string" && state.toUpperCase() === expected;
  }

  get isOpen(): boolean {
    return this.stateIs("OPEN");
  }

  get isMerged(): boolean {
    return this.stateIs("MERGED");
  }

  get isDeclined(): boolean {
    return this.stateIs("DECLINED");
  }

  get isSuperseded(): boolean {
    return this.stateIs("SUPERSEDED");
  }

  get createdOn(): Date | null {
    return this.getTime("created_on");
  }

  get updatedOn(): Date | null {
    return this.getTime("updated_on");
  }

  get closeSourceBranch(): boolean {
    return asOptionalBoolean(this.getData("close_source_branch"), "close_source_branch") ?? false;
  }

  get sourceBranch(): string {
    return asString(this.getData("source.branch.name"), "source.branch.name");
  }

  get destinationBranch(): string {
    return asString(this.getData("destination.branch.name"), "destination.branch.name");
  }

  get commentCount(): number {
    return asNumber(this.getData("comment_count") ?? 0, "comment_count");
  }

  get taskCount(): number {
    return asNumber(this.getData("task_count") ?? 0, "task_count");
  }

  get declinedReason(): string | null {
    return asOptionalString(this.getData("reason"), "reason");
  }

  get mergeCommitHash(): string | null {
    return asOptionalString(this.getData("merge_commit.hash"), "merge_commit.hash");
  }

  /** Browser link. */
  get htmlUrl(): string | null {
    return asOptionalString(this.getData("links.html.href"), "links.html.href");
  }

  get author(): User {
    const doc = asObject(this.getData("author"), "author");
    return new User(this.embeddedClient(doc), doc);
  }

  participants(): Participant[] {
    return asArray(this.getData("participants") ?? [], "participants").map(p => {
      const doc = asObject(p, "participants[]");
      return new Participant(this.embeddedClient(doc), doc);
    });
  }

  reviewers(): User[] {
    return asArray(this.getData("reviewers") ?? [], "reviewers").map(r => {
      const doc = asObject(r, "reviewers[]");
      return new User(this.embeddedClient(doc), doc);
    });
  }

  /** Source repository; the embedded summary is not the full document. */
  get sourceRepository(): ResourceRef<Repository> | null {
    return this.repositoryRef("source.repository");
  }

  get destinationRepository(): ResourceRef<Repository> | null {
    return this.repositoryRef("destination.repository");
  }

  private repositoryRef(path: string): ResourceRef<Repository> | null {
    const href = this.getData(`${path}.links.self.href`);
    if (typeof href !== "string") return null;

    const client = this.client.at(href);
    return new ResourceRef(client.url, async () => {
      const data = await client.get();
      if (!isJsonObject(data)) throw new SchemaMismatchError(`Expected a JSON object from ${client.url}`);
      return new Repository(client, data);
    });
  }

  get comments(): Comments {
    return new Comments(this.client.child("comments"));
  }

  activity(): PagedSequence<PullRequestActivity> {
    return fetchActivity(this.client);
  }

  /** Fresh snapshot from the server; this instance is left untouched. */
  async refresh(): Promise<PullRequest> {
    const data = await this.client.get();
    if (!isJsonObject(data)) throw new SchemaMismatchError(`Expected a JSON object from ${this.url}`);
    return new PullRequest(this.client, data);
  }

  // Uses the cached document only; a concurrent server-side change is not detected
  private checkIfOpen(): void {
    if (!this.isOpen) throw new InvalidStateError(`Pull request #${this.id} isn't open`);
  }

  /** Comment the pull request in raw (markdown) format. */
  async comment(rawMessage: string | null | undefined): Promise<JsonValue | null> {
    if (!rawMessage) throw new InvalidArgumentError("No message set");
    return this.client.post("comments", { content: { raw: rawMessage } });
  }

  async approve(): Promise<JsonValue | null> {
    this.checkIfOpen();
    return this.client.post("approve", { approved: true });
  }

  async unapprove(): Promise<JsonValue | null> {
    this.checkIfOpen();
    return this.client.delete("approve");
  }

  async decline(): Promise<JsonValue | null> {
    this.checkIfOpen();
    return this.client.post("decline");
  }

  /**
   * @param mergeStrategy - one of merge_commit, squash, fast_forward
   * @param closeSourceBranch - defaults to the pull request's own setting
   */
  async merge(mergeStrategy: string = "merge_commit", closeSourceBranch?: boolean): Promise<JsonValue | null> {
    if (!isMergeStrategy(mergeStrategy)) {
      throw new InvalidArgumentError(`merge_strategy must be one of ${MERGE_STRATEGIES.join(", ")}`);
    }
    this.checkIfOpen();

    return this.client.post("merge", {
      close_source_branch: closeSourceBranch ?? this.closeSourceBranch,
      merge_strategy: mergeStrategy,
    });
  }
}
