/**
 * Shared test fixtures for Config objects.
 */
import type { Config } from "../../src/config";

export const testConfig: Config = {
  bitbucket: { base_url: "https://bitbucket.org", workspace: "myworkspace" },
  service_desk: { base_url: "https://jira.example.com", insight_workspace_version: 1 },
  http: { timeout_ms: 30_000, verbose: false },
};
