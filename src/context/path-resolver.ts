/**
 * Path Resolver
 *
 * Maps a raw import string to one canonical file on disk. Relative imports
 * are probed next to the importing file; everything else is probed under
 * each root in order, and the first root with an existing candidate wins.
 */

import { realpathSync, statSync } from 'fs';
import { isAbsolute, relative, resolve, sep } from 'path';
import { getLanguageRules, type ExtensionTable, type LanguageTag } from './resolvers/index.js';

/**
 * Whether a path names a regular file, following symlinks.
 */
function isFile(candidate: string): boolean {
  try {
    return statSync(candidate, { throwIfNoEntry: false })?.isFile() ?? false;
  } catch {
    // ENOTDIR, EACCES and similar: the candidate is simply not there
    return false;
  }
}

function isInsideRoot(root: string, candidate: string): boolean {
  const rel = relative(root, candidate);
  return rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel);
}

/**
 * Return the canonical path of the first candidate that exists as a file.
 */
export function probeCandidates(candidates: readonly string[]): string | null {
  for (const candidate of candidates) {
    if (isFile(candidate)) {
      return realpathSync(candidate);
    }
  }
  return null;
}

/**
 * Resolve an import string to a canonical absolute path.
 *
 * @param specifier - Import as written in source (e.g. './utils', 'com.example.Util')
 * @param fromFile - Absolute path of the importing file
 * @param roots - Ordered project roots, highest priority first
 * @param language - Language tag of the importing file
 * @param extensionTable - Optional per-language override of probed extensions
 * @returns Canonical path, or null when nothing matches
 */
export function resolveImport(
  specifier: string,
  fromFile: string,
  roots: readonly string[],
  language: LanguageTag | null,
  extensionTable: ExtensionTable = {}
): string | null {
  const rules = getLanguageRules(language);
  if (!rules) return null;

  const target = rules.resolveImportPath(specifier, fromFile);
  if (!target) return null;

  const extensions = extensionTable[rules.language] ?? rules.candidateExtensions;

  if (target.mode === 'relative') {
    return probeCandidates(rules.getCandidatePaths(target.path, extensions));
  }

  for (const root of roots) {
    const base = resolve(root);
    // Root-mode imports never escape their root
    const candidates = rules
      .getCandidatePaths(resolve(base, target.path), extensions)
      .filter((candidate) => isInsideRoot(base, candidate));
    const found = probeCandidates(candidates);
    if (found) {
      return found;
    }
  }

  return null;
}
