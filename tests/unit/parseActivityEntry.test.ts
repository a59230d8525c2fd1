import { describe, it, expect } from "vitest";
import { fetchActivity, parseActivityEntry } from "../../src/bitbucket/pr-activity";
import { RestClient } from "../../src/rest/client";
import { FakeServer } from "../fixtures/fetch";
import { PRS_URL } from "../fixtures/bitbucket-responses";

describe("parseActivityEntry", () => {
  it("parses an approval event", () => {
    // Arrange
    const entry = {
      approval: {
        user: { display_name: "Alice" },
        date: "2026-02-15T10:00:00Z",
      },
    };

    // Act
    const result = parseActivityEntry(entry);

    // Assert
    expect(result).toEqual({
      kind: "approval",
      actorName: "Alice",
      timestamp: "2026-02-15T10:00:00Z",
      newState: null,
      commentText: null,
      commitHash: null,
    });
  });

  it("parses a comment event", () => {
    // Arrange
    const entry = {
      comment: {
        user: { display_name: "Bob" },
        created_on: "2026-02-15T11:00:00Z",
        content: { raw: "Looks good to me!" },
      },
    };

    // Act
    const result = parseActivityEntry(entry);

    // Assert
    expect(result).toEqual({
      kind: "comment",
      actorName: "Bob",
      timestamp: "2026-02-15T11:00:00Z",
      newState: null,
      commentText: "Looks good to me!",
      commitHash: null,
    });
  });

  it("keeps long comments whole", () => {
    // Arrange
    const longText = "x".repeat(1000);
    const entry = {
      comment: {
        user: { display_name: "Bob" },
        created_on: "2026-02-15T11:00:00Z",
        content: { raw: longText },
      },
    };

    // Act
    const result = parseActivityEntry(entry);

    // Assert
    expect(result?.commentText).toHaveLength(1000);
  });

  it("parses a regular update event (new commits pushed)", () => {
    // Arrange
    const entry = {
      update: {
        author: { display_name: "Charlie" },
        date: "2026-02-15T12:00:00Z",
        state: "OPEN",
        source: { commit: { hash: "abc123" } },
      },
    };

    // Act
    const result = parseActivityEntry(entry);

    // Assert
    expect(result).toEqual({
      kind: "update",
      actorName: "Charlie",
      timestamp: "2026-02-15T12:00:00Z",
      newState: "OPEN",
      commentText: null,
      commitHash: "abc123",
    });
  });

  it("detects changes_requested via changes.status.new", () => {
    // Arrange
    const entry = {
      update: {
        author: { display_name: "Reviewer" },
        date: "2026-02-15T13:00:00Z",
        changes: { status: { new: "changes_requested" } },
      },
    };

    // Act
    const result = parseActivityEntry(entry);

    // Assert
    expect(result?.kind).toBe("request_changes");
    expect(result?.newState).toBe("changes_requested");
  });

  it("detects changes_requested via update.state", () => {
    // Arrange
    const entry = {
      update: {
        author: { display_name: "Reviewer" },
        date: "2026-02-15T13:00:00Z",
        state: "changes_requested",
      },
    };

    // Act
    const result = parseActivityEntry(entry);

    // Assert
    expect(result?.kind).toBe("request_changes");
  });

  it("returns null for unrecognized entry types", () => {
    // Act & Assert
    expect(parseActivityEntry({})).toBeNull();
    expect(parseActivityEntry({ unknown: true })).toBeNull();
  });

  it("handles missing user in approval", () => {
    // Arrange
    const entry = {
      approval: { date: "2026-02-15T10:00:00Z" },
    };

    // Act
    const result = parseActivityEntry(entry);

    // Assert
    expect(result?.actorName).toBeNull();
  });

  it("handles missing content in comment", () => {
    // Arrange
    const entry = {
      comment: {
        user: { display_name: "Bob" },
        created_on: "2026-02-15T11:00:00Z",
      },
    };

    // Act
    const result = parseActivityEntry(entry);

    // Assert
    expect(result?.commentText).toBe("");
  });

  it("handles missing source commit in update", () => {
    // Arrange
    const entry = {
      update: {
        author: { display_name: "Charlie" },
        date: "2026-02-15T12:00:00Z",
        state: "OPEN",
      },
    };

    // Act
    const result = parseActivityEntry(entry);

    // Assert
    expect(result?.commitHash).toBeNull();
  });

  it("handles empty approval date", () => {
    // Arrange
    const entry = { approval: { user: { display_name: "X" } } };

    // Act
    const result = parseActivityEntry(entry);

    // Assert
    expect(result?.timestamp).toBe("");
  });
});

describe("fetchActivity", () => {
  it("pages the activity endpoint and skips unknown entries", async () => {
    // Arrange
    const activityUrl = `${PRS_URL}/42/activity`;
    const page2 = `${activityUrl}?page=abc`;
    const server = new FakeServer()
      .on("GET", `${activityUrl}?pagelen=50`, {
        body: {
          values: [{ approval: { user: { display_name: "Alice" }, date: "2026-02-15T10:00:00Z" } }, { other: {} }],
          next: page2,
        },
      })
      .on("GET", page2, {
        body: { values: [{ comment: { created_on: "2026-02-15T11:00:00Z", content: { raw: "ok" } } }] },
      });

    // Act
    const entries = await fetchActivity(new RestClient(`${PRS_URL}/42`, server.session())).toArray();

    // Assert
    expect(entries.map(e => e.kind)).toEqual(["approval", "comment"]);
    expect(server.requests.map(r => r.url)).toEqual([`${activityUrl}?pagelen=50`, page2]);
  });
});
