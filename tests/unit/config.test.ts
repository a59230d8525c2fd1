import { describe, it, expect, afterAll, afterEach, vi } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { buildBitbucketApiUrl, buildBitbucketPullRequestUrl, loadConfig } from "../../src/config";
import { getBitbucketConfig } from "../../src/bitbucket/client";
import { getServiceDeskConfig } from "../../src/service-desk/client";
import { testConfig } from "../fixtures/config";

const tempDir = mkdtempSync(join(tmpdir(), "config-test-"));

function writeTempToml(name: string, content: string): string {
  const path = join(tempDir, `${name}.toml`);
  writeFileSync(path, content);
  return path;
}

afterAll(() => {
  rmSync(tempDir, { recursive: true, force: true });
});

const ENV_KEYS = ["BITBUCKET_EMAIL", "BITBUCKET_API_TOKEN", "JIRA_EMAIL", "JIRA_API_TOKEN"];

afterEach(() => {
  for (const key of ENV_KEYS) delete process.env[key];
  vi.restoreAllMocks();
});

describe("buildBitbucketApiUrl", () => {
  it("maps the browser URL to the 2.0 API", () => {
    // Act & Assert
    expect(buildBitbucketApiUrl(testConfig)).toBe("https://api.bitbucket.org/2.0");
  });
});

describe("buildBitbucketPullRequestUrl", () => {
  it("constructs correct pull request URL", () => {
    // Act & Assert
    const url = buildBitbucketPullRequestUrl(testConfig, "my-repo", 42);
    expect(url).toBe("https://bitbucket.org/myworkspace/my-repo/pull-requests/42");
  });
});

describe("loadConfig", () => {
  it("throws for nonexistent config file", () => {
    // Act & Assert
    expect(() => loadConfig("/nonexistent/config.toml")).toThrow();
  });

  it("applies defaults for missing optional sections", () => {
    // Arrange
    const path = writeTempToml("defaults", "");

    // Act
    const config = loadConfig(path);

    // Assert
    expect(config).toEqual({
      bitbucket: { base_url: "https://bitbucket.org", workspace: "" },
      http: { timeout_ms: 30000, verbose: false },
    });
  });

  it("reads every section and strips trailing slashes", () => {
    // Arrange
    const path = writeTempToml("full", `
[bitbucket]
base_url = "https://bitbucket.org/"
workspace = "team"

[service_desk]
base_url = "https://help.example.com/"
insight_workspace_version = 2

[http]
timeout_ms = 5000
verbose = true
`);

    // Act
    const config = loadConfig(path);

    // Assert
    expect(config.bitbucket).toEqual({ base_url: "https://bitbucket.org", workspace: "team" });
    expect(config.service_desk).toEqual({ base_url: "https://help.example.com", insight_workspace_version: 2 });
    expect(config.http).toEqual({ timeout_ms: 5000, verbose: true });
  });

  it("throws when service_desk has no base_url", () => {
    // Arrange
    const path = writeTempToml("no-sd-url", `
[service_desk]
insight_workspace_version = 1
`);

    // Act & Assert
    expect(() => loadConfig(path)).toThrow("config.toml: service_desk.base_url must be a non-empty string");
  });

  it("throws when a value has the wrong type", () => {
    // Arrange
    const path = writeTempToml("bad-timeout", `
[http]
timeout_ms = "fast"
`);

    // Act & Assert
    expect(() => loadConfig(path)).toThrow("config.toml: http.timeout_ms must be a number");
  });
});

describe("getBitbucketConfig", () => {
  it("returns null without credentials", () => {
    // Arrange
    vi.spyOn(console, "log").mockImplementation(() => {});

    // Act & Assert
    expect(getBitbucketConfig(testConfig)).toBeNull();
  });

  it("prefers Bitbucket credentials over Jira ones", () => {
    // Arrange
    vi.spyOn(console, "log").mockImplementation(() => {});
    process.env.BITBUCKET_EMAIL = "bb@example.com";
    process.env.BITBUCKET_API_TOKEN = "test-bb-token";
    process.env.JIRA_EMAIL = "jira@example.com";
    process.env.JIRA_API_TOKEN = "test-jira-token";

    // Act
    const bb = getBitbucketConfig(testConfig);

    // Assert
    expect(bb).toEqual({
      apiUrl: "https://api.bitbucket.org/2.0",
      browserUrl: "https://bitbucket.org",
      workspace: "myworkspace",
      username: "bb@example.com",
      apiToken: "test-bb-token",
      timeoutMs: 30000,
      verbose: false,
    });
  });

  it("falls back to Jira credentials", () => {
    // Arrange
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    process.env.JIRA_EMAIL = "jira@example.com";
    process.env.JIRA_API_TOKEN = "test-jira-token";

    // Act
    const bb = getBitbucketConfig(testConfig);

    // Assert
    expect(bb?.username).toBe("jira@example.com");
    expect(bb?.apiToken).toBe("test-jira-token");
    expect(log).toHaveBeenCalledWith("Bitbucket: authenticating as jira@example.com (JIRA_API_TOKEN)");
  });
});

describe("getServiceDeskConfig", () => {
  it("returns null when the section is absent", () => {
    // Arrange
    process.env.JIRA_EMAIL = "jira@example.com";
    process.env.JIRA_API_TOKEN = "test-jira-token";
    const { service_desk: _sd, ...config } = testConfig;

    // Act & Assert
    expect(getServiceDeskConfig(config)).toBeNull();
  });

  it("returns null without Jira credentials", () => {
    // Arrange
    vi.spyOn(console, "log").mockImplementation(() => {});
    process.env.BITBUCKET_EMAIL = "bb@example.com";
    process.env.BITBUCKET_API_TOKEN = "test-bb-token";

    // Act & Assert
    expect(getServiceDeskConfig(testConfig)).toBeNull();
  });

  it("builds the client config from the section and environment", () => {
    // Arrange
    process.env.JIRA_EMAIL = "jira@example.com";
    process.env.JIRA_API_TOKEN = "test-jira-token";

    // Act
    const sd = getServiceDeskConfig(testConfig);

    // Assert
    expect(sd).toEqual({
      baseUrl: "https://jira.example.com",
      insightWorkspaceVersion: 1,
      username: "jira@example.com",
      apiToken: "test-jira-token",
      timeoutMs: 30000,
      verbose: false,
    });
  });
});
