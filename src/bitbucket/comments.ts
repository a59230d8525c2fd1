/**
 * Pull request comments: general and inline, including threaded replies.
 */

import type { RestClient } from "../rest/client";
import { asNumber, asOptionalNumber, asOptionalObject, asOptionalString, type JsonObject } from "../rest/json";
import type { PagedSequence } from "../rest/paging";
import { BitbucketCloudBase, ResourceCollection } from "./base";
import { User } from "./users";

export class Comment extends BitbucketCloudBase {
  constructor(client: RestClient, data: JsonObject) {
    super(client, data, "pullrequest_comment");
  }

  get id(): number {
    return asNumber(this.getData("id"), "id");
  }

  /** Full content.raw, empty string when the comment has no body. */
  get raw(): string {
    return asOptionalString(this.getData("content.raw"), "content.raw") ?? "";
  }

  get author(): User | null {
    const doc = asOptionalObject(this.getData("user"), "user");
    return doc ? new User(this.embeddedClient(doc), doc) : null;
  }

  get createdOn(): Date | null {
    return this.getTime("created_on");
  }

  get updatedOn(): Date | null {
    return this.getTime("updated_on");
  }

  get isInline(): boolean {
    return asOptionalObject(this.getData("inline"), "inline") !== null;
  }

  get filePath(): string | null {
    return asOptionalString(this.getData("inline.path"), "inline.path");
  }

  /** Line being commented on, in the new version of the file. */
  get lineTo(): number | null {
    return asOptionalNumber(this.getData("inline.to"), "inline.to");
  }

  /** Comment this one replies to. */
  get parentId(): number | null {
    return asOptionalNumber(this.getData("parent.id"), "parent.id");
  }

  get deleted(): boolean {
    return this.getData("deleted") === true;
  }
}

export class Comments extends ResourceCollection<Comment> {
  protected wrap(client: RestClient, data: JsonObject): Comment {
    return new Comment(client, data);
  }

  protected idOf(data: JsonObject): number {
    return asNumber(data.id, "id");
  }

  each(q?: string, sort?: string): PagedSequence<Comment> {
    return this.paged({ q, sort, pagelen: 100 });
  }
}
