/**
 * Process configuration, read once at startup
 */

import { z } from "zod";

const envSchema = z.object({
  GITHUB_TOKEN: z
    .string({ required_error: "GITHUB_TOKEN environment variable is required" })
    .trim()
    .min(1, "GITHUB_TOKEN environment variable is required"),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  GITHUB_API_URL: z.string().url().default("https://api.github.com"),
  GITHUB_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
});

export interface AppConfig {
  readonly githubToken: string;
  readonly port: number;
  readonly githubApiUrl: string;
  readonly requestTimeoutMs: number;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const { GITHUB_TOKEN, PORT, GITHUB_API_URL, GITHUB_REQUEST_TIMEOUT_MS } = parsed.data;
  return {
    githubToken: GITHUB_TOKEN,
    port: PORT,
    githubApiUrl: GITHUB_API_URL.replace(/\/+$/, ""),
    requestTimeoutMs: GITHUB_REQUEST_TIMEOUT_MS,
  };
}
