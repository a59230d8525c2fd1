import type { RestClient } from "../rest/client";
import { asOptionalBoolean, asOptionalString, asString, type JsonObject } from "../rest/json";
import type { PagedSequence } from "../rest/paging";
import { BitbucketCloudBase, ResourceCollection } from "./base";
import { PullRequests } from "./pullrequests";

export type RepositoryRole = "member" | "contributor" | "admin" | "owner";

export class Repositories extends ResourceCollection<Repository> {
  protected wrap(client: RestClient, data: JsonObject): Repository {
    return new Repository(client, data);
  }

  protected idOf(data: JsonObject): string {
    return asString(data.slug, "slug");
  }

  each(role?: RepositoryRole, q?: string, sort?: string): PagedSequence<Repository> {
    return this.paged({ role, q, sort });
  }
}

export class Repository extends BitbucketCloudBase {
  constructor(client: RestClient, data: JsonObject) {
    super(client, data, "repository");
  }

  get slug(): string {
    return asString(this.getData("slug"), "slug");
  }

  get name(): string {
    return asString(this.getData("name"), "name");
  }

  /** "workspace/slug" */
  get fullName(): string {
    return asString(this.getData("full_name"), "full_name");
  }

  get isPrivate(): boolean {
    return asOptionalBoolean(this.getData("is_private"), "is_private") ?? false;
  }

  get description(): string | null {
    return asOptionalString(this.getData("description"), "description");
  }

  get mainBranch(): string | null {
    return asOptionalString(this.getData("mainbranch.name"), "mainbranch.name");
  }

  get createdOn(): Date | null {
    return this.getTime("created_on");
  }

  get updatedOn(): Date | null {
    return this.getTime("updated_on");
  }

  get pullRequests(): PullRequests {
    return new PullRequests(this.client.child("pullrequests"));
  }
}
