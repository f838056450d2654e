/**
 * Unit tests for utils/github-url.ts
 */

import { describe, it, expect } from "vitest";
import { formatRepository, parseRepositoryUrl } from "./github-url.js";
import { InvalidRepositoryUrlError } from "../errors.js";

describe("parseRepositoryUrl", () => {
  it.each([
    "https://github.com/user/repo",
    "https://github.com/user/repo/",
    "https://github.com/user/repo.git",
    "https://github.com/user/repo.git/",
    "http://github.com/user/repo",
    "https://www.github.com/user/repo",
    "github.com/user/repo",
    "www.github.com/user/repo.git",
    "  https://github.com/user/repo  ",
    "https://GitHub.com/user/repo",
    "https://github.com/user/repo/tree/main/src",
    "https://github.com/user/repo?tab=readme#install",
  ])("parses %s", (input) => {
    expect(parseRepositoryUrl(input)).toEqual({ owner: "user", name: "repo" });
  });

  it("keeps dots and dashes inside names", () => {
    expect(parseRepositoryUrl("https://github.com/my-org/next.js")).toEqual({
      owner: "my-org",
      name: "next.js",
    });
  });

  it("decodes percent-escapes in owner and name", () => {
    expect(parseRepositoryUrl("https://github.com/user/my%2Drepo")).toEqual({
      owner: "user",
      name: "my-repo",
    });
  });

  it.each([
    "https://github.com/user/%E0%A4%A",
    "https://github.com/user%2Fother/repo",
    "",
    "   ",
    "not-a-url",
    "https://gitlab.com/user/repo",
    "https://github.com",
    "https://github.com/",
    "https://github.com/user",
    "https://github.com/user/",
    "https://github.com/user/.git",
    "ftp://github.com/user/repo",
    "git@github.com:user/repo.git",
    "https://github.com:8443/user/repo",
    "https://evilgithub.com/user/repo",
    "https://github.com.evil.example/user/repo",
  ])("rejects %j", (input) => {
    expect(() => parseRepositoryUrl(input)).toThrow(InvalidRepositoryUrlError);
  });

  it("reports the failure kind and the 400 status", () => {
    try {
      parseRepositoryUrl("not-a-url");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidRepositoryUrlError);
      if (error instanceof InvalidRepositoryUrlError) {
        expect(error.kind).toBe("InvalidRepositoryURL");
        expect(error.status).toBe(400);
        expect(error.message).toBe("URL must be from github.com");
      }
    }
  });
});

describe("formatRepository", () => {
  it("joins owner and name", () => {
    expect(formatRepository({ owner: "user", name: "repo" })).toBe("user/repo");
  });
});
