/**
 * GitHub REST API client for repository language statistics
 */

import { fetchJson } from "../utils/fetcher.js";
import { formatRepository } from "../utils/github-url.js";
import {
  AuthenticationFailedError,
  RepositoryNotFoundError,
  UpstreamError,
} from "../errors.js";
import type { AppConfig } from "../config.js";
import type { Headers } from "../types/index.js";
import {
  languageBreakdownSchema,
  type LanguageBreakdown,
  type LanguageFetcher,
  type RepositoryReference,
} from "../types/github.js";

const USER_AGENT = "repo-lang-verifier/1.0";

type GitHubClientConfig = Pick<AppConfig, "githubToken" | "githubApiUrl" | "requestTimeoutMs">;

/**
 * GitHub API headers, authenticated with the configured token
 */
function getHeaders(token: string): Headers {
  return {
    Accept: "application/vnd.github+json",
    "User-Agent": USER_AGENT,
    Authorization: `Bearer ${token}`,
  };
}

export function languagesUrl(apiUrl: string, ref: RepositoryReference): string {
  return `${apiUrl}/repos/${encodeURIComponent(ref.owner)}/${encodeURIComponent(ref.name)}/languages`;
}

export function createGitHubLanguageFetcher(config: GitHubClientConfig): LanguageFetcher {
  return {
    async fetchLanguages(ref: RepositoryReference): Promise<LanguageBreakdown> {
      const repository = formatRepository(ref);
      const { data, error, status, headers, timedOut } = await fetchJson(
        languagesUrl(config.githubApiUrl, ref),
        { headers: getHeaders(config.githubToken), timeout: config.requestTimeoutMs }
      );

      if (error !== null) {
        if (status === 404) {
          throw new RepositoryNotFoundError(repository);
        }
        if (status === 401 || status === 403) {
          const rateLimited = status === 403 && headers?.get("x-ratelimit-remaining") === "0";
          throw new AuthenticationFailedError(status, rateLimited);
        }
        if (timedOut) {
          throw new UpstreamError(
            `GitHub API request for ${repository} timed out after ${config.requestTimeoutMs}ms`,
            "TIMEOUT"
          );
        }
        if (status === null) {
          throw new UpstreamError(`GitHub API request failed: ${error}`, "NETWORK_ERROR");
        }
        if (status >= 200 && status < 300) {
          throw new UpstreamError(
            `GitHub API returned an unreadable body: ${error}`,
            "INVALID_RESPONSE",
            status
          );
        }
        throw new UpstreamError(`GitHub API error: ${error}`, "HTTP_ERROR", status);
      }

      const parsed = languageBreakdownSchema.safeParse(data);
      if (!parsed.success) {
        throw new UpstreamError(
          `GitHub API returned an unexpected language breakdown for ${repository}`,
          "INVALID_RESPONSE",
          status
        );
      }

      return parsed.data;
    },
  };
}
