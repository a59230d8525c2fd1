export const MERGE_STRATEGIES = ["merge_commit", "squash", "fast_forward"] as const;
export type MergeStrategy = (typeof MERGE_STRATEGIES)[number];

export const PULL_REQUEST_STATES = ["OPEN", "MERGED", "DECLINED", "SUPERSEDED"] as const;
export type PullRequestState = (typeof PULL_REQUEST_STATES)[number];

export const PARTICIPANT_APPROVED = "approved";
export const PARTICIPANT_CHANGES_REQUESTED = "changes_requested";

export function isMergeStrategy(value: string): value is MergeStrategy {
  return MERGE_STRATEGIES.some(s => s === value);
}
