/**
 * Bitbucket PR activity timeline.
 * Fetches the /activity endpoint for a PR and normalizes events.
 */

import type { RestClient } from "../rest/client";
import { isJsonObject, pluck, type JsonObject } from "../rest/json";
import { PagedSequence, pagedValues } from "../rest/paging";

export interface PullRequestActivity {
  kind: "approval" | "comment" | "update" | "request_changes";
  actorName: string | null;
  timestamp: string;
  newState: string | null;
  commentText: string | null;
  commitHash: string | null;
}

function text(doc: JsonObject, path: string): string | null {
  const value = pluck(doc, path);
  return typeof value === "string" ? value : null;
}

export function parseActivityEntry(entry: JsonObject): PullRequestActivity | null {
  const { approval, comment, update } = entry;

  if (isJsonObject(approval)) {
    return {
      kind: "approval",
      actorName: text(approval, "user.display_name"),
      timestamp: text(approval, "date") ?? "",
      newState: null,
      commentText: null,
      commitHash: null,
    };
  }

  if (isJsonObject(comment)) {
    return {
      kind: "comment",
      actorName: text(comment, "user.display_name"),
      timestamp: text(comment, "created_on") ?? "",
      newState: null,
      commentText: text(comment, "content.raw") ?? "",
      commitHash: null,
    };
  }

  if (isJsonObject(update)) {
    const state = text(update, "state");
    const changesRequested =
      text(update, "changes.status.new") === "changes_requested" || state === "changes_requested";

    if (changesRequested) {
      return {
        kind: "request_changes",
        actorName: text(update, "author.display_name"),
        timestamp: text(update, "date") ?? "",
        newState: "changes_requested",
        commentText: null,
        commitHash: null,
      };
    }

    // New commits pushed, or title/description edits
    return {
      kind: "update",
      actorName: text(update, "author.display_name"),
      timestamp: text(update, "date") ?? "",
      newState: state,
      commentText: null,
      commitHash: text(update, "source.commit.hash"),
    };
  }

  return null;
}

/**
 * Timeline of a pull request; `client` points at the pull request itself.
 * Entries of unknown shape are skipped.
 */
export function fetchActivity(client: RestClient): PagedSequence<PullRequestActivity> {
  const activity = client.child("activity");

  return new PagedSequence(async function* () {
    for await (const entry of pagedValues(activity, { pagelen: 50 })) {
      const parsed = parseActivityEntry(entry);
      if (parsed) yield parsed;
    }
  });
}
