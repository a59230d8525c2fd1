import type { RestClient } from "../rest/client";
import { asOptionalString, type JsonObject } from "../rest/json";
import { BitbucketCloudBase } from "./base";

/**
 * Account embedded in another document (author, reviewer, participant).
 * Not type-checked: the tag may be user, team or app_user.
 */
export class User extends BitbucketCloudBase {
  constructor(client: RestClient, data: JsonObject) {
    super(client, data);
  }

  get displayName(): string | null {
    return asOptionalString(this.getData("display_name"), "display_name");
  }

  get nickname(): string | null {
    return asOptionalString(this.getData("nickname"), "nickname");
  }

  get accountId(): string | null {
    return asOptionalString(this.getData("account_id"), "account_id");
  }

  get uuid(): string | null {
    return asOptionalString(this.getData("uuid"), "uuid");
  }

  /** Browser link to the profile. */
  get profileUrl(): string | null {
    return asOptionalString(this.getData("links.html.href"), "links.html.href");
  }
}
