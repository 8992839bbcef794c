import { describe, it, expect } from "vitest";
import { GitHubAuth, parseRepoUrl } from "../src/remote/github-auth.js";

describe("GitHubAuth", () => {
  describe("parseRepoUrl", () => {
    it("should accept common URL forms", () => {
      const expected = { owner: "alice", repo: "secrets" };
      expect(parseRepoUrl("https://github.com/alice/secrets")).toEqual(expected);
      expect(parseRepoUrl("https://github.com/alice/secrets.git")).toEqual(expected);
      expect(parseRepoUrl("http://www.github.com/alice/secrets")).toEqual(expected);
      expect(parseRepoUrl("  github.com/alice/secrets  ")).toEqual(expected);
    });

    it("should reject other hosts and paths", () => {
      expect(parseRepoUrl("https://gitlab.com/alice/secrets")).toBeNull();
      expect(parseRepoUrl("https://github.com/alice")).toBeNull();
      expect(parseRepoUrl("https://github.com/alice/secrets/tree/main")).toBeNull();
    });
  });

  it("should build from a URL", () => {
    const auth = GitHubAuth.fromUrl("https://github.com/alice/secrets.git", "test-token");
    expect(auth.owner).toBe("alice");
    expect(auth.repo).toBe("secrets");
    expect(auth.baseUrl).toBe("https://api.github.com");
    expect(auth.toString()).toBe("GitHubAuth(alice/secrets)");
  });

  it("should throw for an invalid URL", () => {
    expect(() => GitHubAuth.fromUrl("not a repo", "test-token")).toThrow(
      "Invalid GitHub repository URL: not a repo"
    );
  });

  it("should build contents paths", () => {
    const auth = new GitHubAuth({ owner: "alice", repo: "secrets", token: "test-token" });
    expect(auth.repoPath).toBe("/repos/alice/secrets");
    expect(auth.contentsPath(".gitvault/index.enc")).toBe(
      "/repos/alice/secrets/contents/.gitvault/index.enc"
    );
    expect(auth.contentsPath("/.gitvault/config.json")).toBe(
      "/repos/alice/secrets/contents/.gitvault/config.json"
    );
  });

  it("should send a bearer token", () => {
    const auth = new GitHubAuth({ owner: "alice", repo: "secrets", token: "test-token" });
    expect(auth.headers).toEqual({
      Authorization: "Bearer test-token",
      Accept: "application/vnd.github+json",
      "X-GitHub-Api-Version": "2022-11-28",
    });
  });
});
