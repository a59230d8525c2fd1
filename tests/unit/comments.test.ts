import { describe, it, expect } from "vitest";
import { Comment } from "../../src/bitbucket/comments";
import { PullRequest } from "../../src/bitbucket/pullrequests";
import { RestClient } from "../../src/rest/client";
import { FakeServer } from "../fixtures/fetch";
import { PRS_URL, makeComment, makePullRequest } from "../fixtures/bitbucket-responses";

const COMMENTS_URL = `${PRS_URL}/42/comments`;

function commentsOf(server: FakeServer) {
  return new PullRequest(new RestClient(`${PRS_URL}/42`, server.session()), makePullRequest()).comments;
}

describe("Comment", () => {
  it("reads a general comment", () => {
    // Act
    const comment = new Comment(new RestClient(`${COMMENTS_URL}/101`, new FakeServer().session()), makeComment());

    // Assert
    expect(comment.id).toBe(101);
    expect(comment.raw).toBe("Looks good to me!");
    expect(comment.author?.displayName).toBe("Bob QA");
    expect(comment.createdOn?.toISOString()).toBe("2026-02-15T10:00:00.000Z");
    expect(comment.isInline).toBe(false);
    expect(comment.filePath).toBeNull();
    expect(comment.parentId).toBeNull();
    expect(comment.deleted).toBe(false);
  });

  it("reads inline position and reply parent", () => {
    // Arrange
    const doc = makeComment({ inline: { path: "src/auth.ts", to: 12 }, parent: { id: 100 } });

    // Act
    const comment = new Comment(new RestClient(`${COMMENTS_URL}/101`, new FakeServer().session()), doc);

    // Assert
    expect(comment.isInline).toBe(true);
    expect(comment.filePath).toBe("src/auth.ts");
    expect(comment.lineTo).toBe(12);
    expect(comment.parentId).toBe(100);
  });

  it("returns an empty body and no author when both are missing", () => {
    // Arrange
    const { user: _user, content: _content, ...doc } = makeComment();

    // Act
    const comment = new Comment(new RestClient(`${COMMENTS_URL}/101`, new FakeServer().session()), doc);

    // Assert
    expect(comment.raw).toBe("");
    expect(comment.author).toBeNull();
  });
});

describe("Comments", () => {
  it("lists comments with a page length of 100", async () => {
    // Arrange
    const server = new FakeServer().on("GET", `${COMMENTS_URL}?pagelen=100`, {
      body: { values: [makeComment({ id: 1 }), makeComment({ id: 2 })] },
    });

    // Act
    const comments = await commentsOf(server).each().toArray();

    // Assert
    expect(comments.map(c => c.id)).toEqual([1, 2]);
    expect(comments[1]?.url).toBe(`${COMMENTS_URL}/2`);
  });

  it("passes the filter and sort", async () => {
    // Arrange
    const url = `${COMMENTS_URL}?q=deleted%3Dfalse&sort=-created_on&pagelen=100`;
    const server = new FakeServer().on("GET", url, { body: { values: [] } });

    // Act
    await commentsOf(server).each("deleted=false", "-created_on").toArray();

    // Assert
    expect(server.requests[0]?.url).toBe(url);
  });

  it("fetches one comment by id", async () => {
    // Arrange
    const server = new FakeServer().on("GET", `${COMMENTS_URL}/7`, { body: makeComment({ id: 7 }) });

    // Act
    const comment = await commentsOf(server).get(7);

    // Assert
    expect(comment.id).toBe(7);
  });
});
