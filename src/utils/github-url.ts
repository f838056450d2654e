/**
 * GitHub repository URL parsing
 */

import { InvalidRepositoryUrlError } from "../errors.js";
import type { RepositoryReference } from "../types/github.js";

const GITHUB_HOSTS = new Set(["github.com", "www.github.com"]);
const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Extract owner and repository name from a GitHub repository URL.
 *
 * Accepts `https://github.com/owner/repo` with or without the scheme, a
 * `www.` host, a trailing slash, a `.git` suffix or extra path segments
 * such as `/tree/main`.
 */
export function parseRepositoryUrl(input: string): RepositoryReference {
  const trimmed = input.trim();
  if (!trimmed) {
    throw new InvalidRepositoryUrlError(input, "GitHub repository URL is required");
  }

  const withScheme = SCHEME_PATTERN.test(trimmed) ? trimmed : `https://${trimmed}`;

  let url: URL;
  try {
    url = new URL(withScheme);
  } catch {
    throw new InvalidRepositoryUrlError(input);
  }

  if (url.protocol !== "https:" && url.protocol !== "http:") {
    throw new InvalidRepositoryUrlError(input);
  }
  if (!GITHUB_HOSTS.has(url.hostname.toLowerCase()) || url.port || url.username) {
    throw new InvalidRepositoryUrlError(input, "URL must be from github.com");
  }

  const [rawOwner, rawName] = url.pathname.split("/").filter((segment) => segment.length > 0);

  let owner: string;
  let name: string;
  try {
    owner = decodeURIComponent(rawOwner ?? "");
    name = decodeURIComponent(rawName ?? "").replace(/\.git$/i, "");
  } catch {
    throw new InvalidRepositoryUrlError(input);
  }

  // a decoded %2F would split the reference
  if (!owner || !name || owner.includes("/") || name.includes("/")) {
    throw new InvalidRepositoryUrlError(input);
  }

  return { owner, name };
}

export function formatRepository(ref: RepositoryReference): string {
  return `${ref.owner}/${ref.name}`;
}
