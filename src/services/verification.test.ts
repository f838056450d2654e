/**
 * Unit tests for services/verification.ts
 */

import { describe, it, expect, vi } from "vitest";
import { processJavaScriptTypeScriptRepository, verifyRepository } from "./verification.js";
import {
  InvalidRepositoryUrlError,
  NotJavaScriptTypeScriptError,
  RepositoryNotFoundError,
} from "../errors.js";
import type { LanguageBreakdown, LanguageFetcher } from "../types/github.js";

function stubFetcher(languages: LanguageBreakdown): LanguageFetcher {
  return { fetchLanguages: vi.fn().mockResolvedValue(languages) };
}

describe("verifyRepository", () => {
  it("assembles the verification result", async () => {
    const fetcher = stubFetcher({ JavaScript: 12345, TypeScript: 54321, HTML: 3456 });

    const result = await verifyRepository("https://github.com/user/repo", fetcher);

    expect(result).toEqual({
      repository: "user/repo",
      is_javascript_typescript: true,
      languages: { JavaScript: 12345, TypeScript: 54321, HTML: 3456 },
    });
    expect(fetcher.fetchLanguages).toHaveBeenCalledWith({ owner: "user", name: "repo" });
  });

  it("normalizes the repository name instead of echoing the input", async () => {
    const fetcher = stubFetcher({ Python: 100 });

    const result = await verifyRepository("www.github.com/user/repo.git/", fetcher);

    expect(result.repository).toBe("user/repo");
    expect(result.is_javascript_typescript).toBe(false);
  });

  it("does not call upstream for a malformed URL", async () => {
    const fetcher = stubFetcher({});

    await expect(verifyRepository("not-a-url", fetcher)).rejects.toThrow(
      InvalidRepositoryUrlError
    );
    expect(fetcher.fetchLanguages).not.toHaveBeenCalled();
  });

  it("propagates fetcher errors unchanged", async () => {
    const notFound = new RepositoryNotFoundError("user/missing");
    const fetcher: LanguageFetcher = { fetchLanguages: vi.fn().mockRejectedValue(notFound) };

    await expect(verifyRepository("https://github.com/user/missing", fetcher)).rejects.toBe(
      notFound
    );
  });
});

describe("processJavaScriptTypeScriptRepository", () => {
  it("returns only the JS/TS entries", async () => {
    const fetcher = stubFetcher({ JavaScript: 12345, TypeScript: 54321, HTML: 3456 });

    const result = await processJavaScriptTypeScriptRepository(
      "https://github.com/user/repo",
      fetcher
    );

    expect(result).toEqual({
      repository: "user/repo",
      languages: { JavaScript: 12345, TypeScript: 54321 },
    });
  });

  it("rejects repositories that are not JS/TS based", async () => {
    const fetcher = stubFetcher({ Python: 100, JavaScript: 5 });

    await expect(
      processJavaScriptTypeScriptRepository("https://github.com/user/repo", fetcher)
    ).rejects.toThrow(NotJavaScriptTypeScriptError);
  });
});
