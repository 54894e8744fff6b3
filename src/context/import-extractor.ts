/**
 * Import Extractor
 *
 * Pulls raw import strings out of source text with the rules registered for
 * the file's language. Only literal, static import forms are recognized.
 */

import { getLanguageRules, type LanguageTag } from './resolvers/index.js';

/**
 * Extract import strings in the order they appear in the source.
 * Unsupported languages yield an empty list.
 */
export function extractImports(source: string, language: LanguageTag | null): string[] {
  const rules = getLanguageRules(language);
  if (!rules || !source) {
    return [];
  }
  return rules.extractImports(source);
}
