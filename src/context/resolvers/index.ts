/**
 * Language Registry
 *
 * Maps language tags and file extensions to their import rules.
 */
import { extname } from 'path';
import type { LanguageRules, LanguageTag } from './types.js';
import { TypeScriptResolver, JavaScriptResolver } from './typescript-resolver.js';
import { PythonResolver } from './python-resolver.js';
import { JavaResolver } from './java-resolver.js';
import { GoResolver } from './go-resolver.js';

export type { LanguageRules, LanguageTag, ExtensionTable, ImportTarget } from './types.js';
export { TypeScriptResolver, JavaScriptResolver } from './typescript-resolver.js';
export { PythonResolver } from './python-resolver.js';
export { JavaResolver } from './java-resolver.js';
export { GoResolver } from './go-resolver.js';

const registry: ReadonlyMap<LanguageTag, LanguageRules> = new Map<LanguageTag, LanguageRules>([
  ['python', new PythonResolver()],
  ['typescript', new TypeScriptResolver()],
  ['javascript', new JavaScriptResolver()],
  ['java', new JavaResolver()],
  ['go', new GoResolver()],
]);

const extensionMap = new Map<string, LanguageTag>();
for (const rules of registry.values()) {
  for (const ext of rules.extensions) {
    extensionMap.set(ext, rules.language);
  }
}

export function isLanguageTag(value: string): value is LanguageTag {
  return [...registry.keys()].some((tag) => tag === value);
}

/**
 * Get the rules registered for a language tag.
 */
export function getLanguageRules(language: LanguageTag | null): LanguageRules | null {
  if (!language) return null;
  return registry.get(language) ?? null;
}

/**
 * Infer a file's language tag from its extension.
 */
export function detectLanguage(filepath: string): LanguageTag | null {
  return extensionMap.get(extname(filepath).toLowerCase()) ?? null;
}

/**
 * Get all language tags with registered rules.
 */
export function getSupportedLanguages(): LanguageTag[] {
  return [...registry.keys()];
}

/**
 * Get all file extensions supported by registered rules.
 */
export function getSupportedExtensions(): string[] {
  return [...extensionMap.keys()];
}
