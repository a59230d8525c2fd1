import { describe, it, expect } from "vitest";
import { BitbucketCloud } from "../../src/bitbucket/client";
import { InvalidArgumentError } from "../../src/rest/errors";
import { FakeServer } from "../fixtures/fetch";
import { API, PRS_URL, REPO_URL, makePullRequest, makeRepository } from "../fixtures/bitbucket-responses";

function makeCloud(server: FakeServer, workspace = "myworkspace"): BitbucketCloud {
  return new BitbucketCloud({
    ...server.session(),
    apiUrl: API,
    browserUrl: "https://bitbucket.org",
    workspace,
  });
}

describe("BitbucketCloud", () => {
  it("binds repositories to the configured workspace", () => {
    // Act
    const repos = makeCloud(new FakeServer()).repositories();

    // Assert
    expect(repos.url).toBe(`${API}/repositories/myworkspace`);
  });

  it("accepts another workspace per call", () => {
    // Act
    const repos = makeCloud(new FakeServer()).repositories("other");

    // Assert
    expect(repos.url).toBe(`${API}/repositories/other`);
  });

  it("throws InvalidArgumentError without a workspace", () => {
    // Arrange
    const cloud = makeCloud(new FakeServer(), "");

    // Act & Assert
    expect(() => cloud.repositories()).toThrow(InvalidArgumentError);
    expect(() => cloud.pullRequests("my-repo")).toThrow("No workspace set");
  });

  it("reaches pull requests without fetching the repository", () => {
    // Arrange
    const server = new FakeServer();

    // Act
    const prs = makeCloud(server).pullRequests("my-repo");

    // Assert
    expect(prs.url).toBe(PRS_URL);
    expect(server.requests).toHaveLength(0);
  });
});

describe("Repository", () => {
  it("fetches a repository and reads its fields", async () => {
    // Arrange
    const server = new FakeServer().on("GET", REPO_URL, { body: makeRepository() });

    // Act
    const repo = await makeCloud(server).repository("my-repo");

    // Assert
    expect(repo.slug).toBe("my-repo");
    expect(repo.name).toBe("My Repo");
    expect(repo.fullName).toBe("myworkspace/my-repo");
    expect(repo.isPrivate).toBe(true);
    expect(repo.mainBranch).toBe("main");
    expect(repo.createdOn?.toISOString()).toBe("2025-06-01T08:00:00.000Z");
  });

  it("navigates to its pull requests", async () => {
    // Arrange
    const server = new FakeServer()
      .on("GET", REPO_URL, { body: makeRepository() })
      .on("GET", `${PRS_URL}/42`, { body: makePullRequest() });

    // Act
    const repo = await makeCloud(server).repository("my-repo");
    const pr = await repo.pullRequests.get(42);

    // Assert
    expect(pr.title).toBe("Fix login timeout");
    expect(server.requests.map(r => r.url)).toEqual([REPO_URL, `${PRS_URL}/42`]);
  });
});

describe("Repositories.each", () => {
  it("filters by role and binds each repository to its slug", async () => {
    // Arrange
    const url = `${API}/repositories/myworkspace?role=member`;
    const server = new FakeServer().on("GET", url, {
      body: {
        values: [makeRepository(), makeRepository({ slug: "api", name: "API", full_name: "myworkspace/api" })],
      },
    });

    // Act
    const repos = await makeCloud(server).repositories().each("member").toArray();

    // Assert
    expect(repos.map(r => r.slug)).toEqual(["my-repo", "api"]);
    expect(repos[1]?.url).toBe(`${API}/repositories/myworkspace/api`);
  });
});
