import type { RestClient } from "../rest/client";
import { asBoolean, asObject, asOptionalString, asString, type JsonObject } from "../rest/json";
import { BitbucketCloudBase } from "./base";
import { PARTICIPANT_APPROVED, PARTICIPANT_CHANGES_REQUESTED } from "./const";
import { User } from "./users";

/**
 * A user's involvement in a pull request, embedded in the pull request document.
 */
export class Participant extends BitbucketCloudBase {
  constructor(client: RestClient, data: JsonObject) {
    super(client, data, "participant");
  }

  get user(): User {
    const doc = asObject(this.getData("user"), "user");
    return new User(this.embeddedClient(doc), doc);
  }

  get role(): string {
    return asString(this.getData("role"), "role");
  }

  get isParticipant(): boolean {
    return this.role.toUpperCase() === "PARTICIPANT";
  }

  get isReviewer(): boolean {
    return this.role.toUpperCase() === "REVIEWER";
  }

  /** "approved", "changes_requested" or null. */
  get state(): string | null {
    return asOptionalString(this.getData("state"), "state");
  }

  get hasChangesRequested(): boolean {
    return (this.state ?? "").toLowerCase() === PARTICIPANT_CHANGES_REQUESTED;
  }

  get hasApproved(): boolean {
    return (this.state ?? "").toLowerCase() === PARTICIPANT_APPROVED;
  }

  get approved(): boolean {
    return asBoolean(this.getData("approved"), "approved");
  }

  get participatedOn(): Date | null {
    return this.getTime("participated_on");
  }
}
