/**
 * GitHub repository verification MCP tools
 */

import { z } from "zod";
import {
  errorResponse,
  textResponse,
  formatBytes,
  formatPercent,
} from "../utils/fetcher.js";
import { javascriptTypescriptShare } from "../utils/classifier.js";
import { formatRepository } from "../utils/github-url.js";
import { verifyRepository } from "../services/verification.js";
import { VerificationError } from "../errors.js";
import type { McpTool, McpToolResponse } from "../types/index.js";
import type { LanguageBreakdown, LanguageFetcher } from "../types/github.js";

// Input schemas
const verifySchema = {
  github_url: z
    .string()
    .describe("GitHub repository URL (e.g., 'https://github.com/owner/repo')"),
};

const repoSchema = {
  owner: z.string().min(1).describe("GitHub repository owner/organization"),
  repo: z.string().min(1).describe("GitHub repository name"),
};

function formatLanguages(languages: LanguageBreakdown): string {
  const entries = Object.entries(languages).sort((a, b) => b[1] - a[1]);
  if (entries.length === 0) return "No languages detected.";
  return entries.map(([lang, bytes]) => `- ${lang}: ${formatBytes(bytes)}`).join("\n");
}

function failure(error: unknown): McpToolResponse {
  if (error instanceof VerificationError) {
    return errorResponse(`${error.kind}: ${error.message}`);
  }
  throw error;
}

/**
 * Tool definitions for GitHub, bound to a language fetcher
 */
export function createGithubTools(fetcher: LanguageFetcher): McpTool[] {
  return [
    {
      name: "verify_github_repository",
      description:
        "Check whether a GitHub repository is predominantly TypeScript/JavaScript",
      inputSchema: verifySchema,
      handler: async (args) => {
        const { github_url } = args as { github_url: string };

        try {
          const result = await verifyRepository(github_url, fetcher);
          const verdict = result.is_javascript_typescript
            ? "✅ TypeScript/JavaScript based"
            : "❌ Not TypeScript/JavaScript based";

          const report = `
# ${result.repository}

${verdict}
- TypeScript/JavaScript share: ${formatPercent(javascriptTypescriptShare(result.languages))}

## Languages
${formatLanguages(result.languages)}
`.trim();

          return textResponse(report);
        } catch (error) {
          return failure(error);
        }
      },
    },

    {
      name: "get_repo_languages",
      description: "Get the language breakdown (bytes per language) of a GitHub repository",
      inputSchema: repoSchema,
      handler: async (args) => {
        const { owner, repo } = args as { owner: string; repo: string };
        const ref = { owner, name: repo };

        try {
          const languages = await fetcher.fetchLanguages(ref);
          const header = `Languages of ${formatRepository(ref)}\n${"─".repeat(50)}\n`;
          return textResponse(header + formatLanguages(languages));
        } catch (error) {
          return failure(error);
        }
      },
    },
  ];
}
