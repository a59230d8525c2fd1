export { loadConfig, buildBitbucketApiUrl, buildBitbucketPullRequestUrl, type Config, type BitbucketConfig, type ServiceDeskConfig, type HttpConfig } from "./config";
export * from "./rest";
export * from "./bitbucket";
export * from "./service-desk";
