export { getBitbucketConfig, BitbucketCloud, type BitbucketClientConfig } from "./client";
export { BitbucketCloudBase, ResourceCollection, ResourceRef, isErrorMarker } from "./base";
export { PullRequests, PullRequest } from "./pullrequests";
export { Participant } from "./participants";
export { User } from "./users";
export { Repositories, Repository, type RepositoryRole } from "./repositories";
export { Comments, Comment } from "./comments";
export { fetchActivity, parseActivityEntry, type PullRequestActivity } from "./pr-activity";
export { parseBitbucketTime } from "./time";
export * from "./const";
