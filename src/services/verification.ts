/**
 * Repository verification: parse the URL, fetch languages, classify
 */

import { NotJavaScriptTypeScriptError } from "../errors.js";
import { formatRepository, parseRepositoryUrl } from "../utils/github-url.js";
import { isJavaScriptTypeScript, pickJavaScriptTypeScript } from "../utils/classifier.js";
import {
  javaScriptTypeScriptLanguagesSchema,
  verificationResultSchema,
  type JavaScriptTypeScriptLanguages,
  type LanguageFetcher,
  type VerificationResult,
} from "../types/github.js";

export async function verifyRepository(
  githubUrl: string,
  fetcher: LanguageFetcher
): Promise<VerificationResult> {
  const ref = parseRepositoryUrl(githubUrl);
  const languages = await fetcher.fetchLanguages(ref);

  return verificationResultSchema.parse({
    repository: formatRepository(ref),
    is_javascript_typescript: isJavaScriptTypeScript(languages),
    languages,
  });
}

/**
 * Verify, then reject repositories that are not TypeScript/JavaScript based.
 * Only the TypeScript and JavaScript entries are returned.
 */
export async function processJavaScriptTypeScriptRepository(
  githubUrl: string,
  fetcher: LanguageFetcher
): Promise<JavaScriptTypeScriptLanguages> {
  const result = await verifyRepository(githubUrl, fetcher);

  if (!result.is_javascript_typescript) {
    throw new NotJavaScriptTypeScriptError(result.repository);
  }

  return javaScriptTypeScriptLanguagesSchema.parse({
    repository: result.repository,
    languages: pickJavaScriptTypeScript(result.languages),
  });
}
