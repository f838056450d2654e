/**
 * GitHub language statistics and verification result types
 */

import { z } from "zod";

/**
 * Bytes of code per language, as returned by `GET /repos/{owner}/{repo}/languages`
 */
export const languageBreakdownSchema = z.record(z.string(), z.number().int().nonnegative());

export type LanguageBreakdown = z.infer<typeof languageBreakdownSchema>;

export interface RepositoryReference {
  readonly owner: string;
  readonly name: string;
}

export const verificationResultSchema = z.object({
  repository: z.string().regex(/^[^/]+\/[^/]+$/),
  is_javascript_typescript: z.boolean(),
  languages: languageBreakdownSchema,
});

export type VerificationResult = z.infer<typeof verificationResultSchema>;

export const javaScriptTypeScriptLanguagesSchema = z.object({
  repository: z.string(),
  languages: languageBreakdownSchema,
});

export type JavaScriptTypeScriptLanguages = z.infer<typeof javaScriptTypeScriptLanguagesSchema>;

/**
 * Narrow seam over the upstream call so handlers can be exercised with a stub
 */
export interface LanguageFetcher {
  fetchLanguages(ref: RepositoryReference): Promise<LanguageBreakdown>;
}
