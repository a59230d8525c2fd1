/**
 * Bitbucket Cloud entry point.
 * Auth: email + token via Basic Auth.
 * Resolves email from BITBUCKET_EMAIL or JIRA_EMAIL,
 * token from BITBUCKET_API_TOKEN or JIRA_API_TOKEN.
 */

import { buildBitbucketApiUrl, type Config } from "../config";
import { RestClient, type RestSession } from "../rest/client";
import { InvalidArgumentError } from "../rest/errors";
import { PullRequests } from "./pullrequests";
import { Repositories, type Repository } from "./repositories";

export interface BitbucketClientConfig extends RestSession {
  apiUrl: string;       // "https://api.bitbucket.org/2.0"
  browserUrl: string;   // "https://bitbucket.org"
  workspace: string;
}

export function getBitbucketConfig(config: Config): BitbucketClientConfig | null {
  const bb = config.bitbucket;

  // Bitbucket API tokens use Atlassian account email + token (Basic Auth).
  const email = process.env.BITBUCKET_EMAIL ?? process.env.JIRA_EMAIL;
  const token = process.env.BITBUCKET_API_TOKEN ?? process.env.JIRA_API_TOKEN;

  if (email && token) {
    const source = process.env.BITBUCKET_API_TOKEN ? "BITBUCKET_API_TOKEN" : "JIRA_API_TOKEN";
    console.log(`Bitbucket: authenticating as ${email} (${source})`);
    return {
      apiUrl: buildBitbucketApiUrl(config),
      browserUrl: bb.base_url,
      workspace: bb.workspace,
      username: email,
      apiToken: token,
      timeoutMs: config.http.timeout_ms,
      verbose: config.http.verbose,
    };
  }

  console.log("Bitbucket: no credentials found. Set BITBUCKET_API_TOKEN (or JIRA_EMAIL+JIRA_API_TOKEN)");
  return null;
}

export class BitbucketCloud {
  readonly client: RestClient;
  readonly workspace: string;

  constructor(config: BitbucketClientConfig) {
    this.client = new RestClient(config.apiUrl, config);
    this.workspace = config.workspace;
  }

  repositories(workspace: string = this.workspace): Repositories {
    if (!workspace) throw new InvalidArgumentError("No workspace set");
    return new Repositories(this.client.child("repositories", workspace));
  }

  repository(repoSlug: string, workspace?: string): Promise<Repository> {
    return this.repositories(workspace).get(repoSlug);
  }

  /** Pull requests of a repository, without fetching the repository first. */
  pullRequests(repoSlug: string, workspace?: string): PullRequests {
    return new PullRequests(this.repositories(workspace).client.child(repoSlug, "pullrequests"));
  }
}
