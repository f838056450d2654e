/**
 * Decide whether a language breakdown is predominantly TypeScript/JavaScript
 */

import type { LanguageBreakdown } from "../types/github.js";

const JS_TS_LANGUAGES: ReadonlySet<string> = new Set(["TypeScript", "JavaScript"]);

function isJsTsLanguage(language: string): boolean {
  return JS_TS_LANGUAGES.has(language);
}

function totals(languages: LanguageBreakdown): { jsTs: number; total: number } {
  let jsTs = 0;
  let total = 0;
  for (const [language, bytes] of Object.entries(languages)) {
    total += bytes;
    if (isJsTsLanguage(language)) jsTs += bytes;
  }
  return { jsTs, total };
}

/**
 * True when TypeScript and JavaScript bytes together are a strict majority.
 * An empty breakdown is never classified.
 */
export function isJavaScriptTypeScript(languages: LanguageBreakdown): boolean {
  const { jsTs, total } = totals(languages);
  if (total === 0) return false;
  return jsTs * 2 > total;
}

/**
 * Fraction of bytes written in TypeScript or JavaScript, 0 when empty
 */
export function javascriptTypescriptShare(languages: LanguageBreakdown): number {
  const { jsTs, total } = totals(languages);
  return total === 0 ? 0 : jsTs / total;
}

/**
 * Keep only the TypeScript and JavaScript entries, in upstream order
 */
export function pickJavaScriptTypeScript(languages: LanguageBreakdown): LanguageBreakdown {
  return Object.fromEntries(
    Object.entries(languages).filter(([language]) => isJsTsLanguage(language))
  );
}
