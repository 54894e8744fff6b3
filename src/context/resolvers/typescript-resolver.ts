/**
 * TypeScript/JavaScript Import Resolver
 */
import { dirname, resolve } from 'path';
import type { ImportTarget, LanguageRules } from './types.js';
import { buildCandidatePaths, matchInOrder, uniqueInOrder } from './rule-utils.js';

const IMPORT_PATTERNS = [
  // import x from '...' / import { a, b } from '...' / import * as x from '...' / import type ...
  /^[ \t]*import\s+(?:type\s+)?[\w$*{}\s,]+?\s+from\s+['"]([^'"]+)['"]/gm,
  // import '...'
  /^[ \t]*import\s+['"]([^'"]+)['"]/gm,
  // export { a } from '...' / export * from '...' / export * as ns from '...'
  /^[ \t]*export\s+(?:type\s+)?(?:\*(?:\s+as\s+[\w$]+)?|\{[^}]*\})\s+from\s+['"]([^'"]+)['"]/gm,
  // require('...')
  /\brequire\s*\(\s*['"]([^'"]+)['"]\s*\)/g,
];

// TypeScript sources are imported by their emitted name (./foo.js -> ./foo.ts)
const EMITTED_TO_SOURCE: Record<string, string[]> = {
  '.js': ['.ts', '.tsx'],
  '.jsx': ['.tsx'],
  '.mjs': ['.mts'],
  '.cjs': ['.cts'],
};

function extractEcmaScriptImports(source: string): string[] {
  return uniqueInOrder(matchInOrder(source, IMPORT_PATTERNS).map((match) => match[1]));
}

function isRelativeSpecifier(specifier: string): boolean {
  return (
    specifier === '.' ||
    specifier === '..' ||
    specifier.startsWith('./') ||
    specifier.startsWith('../')
  );
}

function resolveSpecifier(specifier: string, fromFile: string): ImportTarget | null {
  if (isRelativeSpecifier(specifier)) {
    return { mode: 'relative', path: resolve(dirname(fromFile), specifier) };
  }
  // node:fs, https://... and friends never live under a root
  if (specifier.includes(':')) return null;

  const rootPath = specifier.replace(/^\/+/, '');
  return rootPath ? { mode: 'root', path: rootPath } : null;
}

function indexFiles(extensions: readonly string[]): string[] {
  return extensions.map((ext) => `index${ext}`);
}

export class TypeScriptResolver implements LanguageRules {
  readonly language = 'typescript';
  readonly extensions = ['.ts', '.tsx', '.mts', '.cts'];
  readonly candidateExtensions = ['.ts', '.tsx', '.d.ts', '.js', '.jsx', '.json'];

  extractImports(source: string): string[] {
    return extractEcmaScriptImports(source);
  }

  resolveImportPath(specifier: string, fromFile: string): ImportTarget | null {
    return resolveSpecifier(specifier, fromFile);
  }

  getCandidatePaths(basePath: string, extensions: readonly string[] = this.candidateExtensions): string[] {
    const candidates = buildCandidatePaths(basePath, extensions, indexFiles(extensions));

    const emitted = basePath.match(/^(.*)(\.[cm]?jsx?)$/);
    if (emitted) {
      const sources = EMITTED_TO_SOURCE[emitted[2]] ?? [];
      candidates.splice(1, 0, ...sources.map((ext) => `${emitted[1]}${ext}`));
    }

    return candidates;
  }
}

export class JavaScriptResolver implements LanguageRules {
  readonly language = 'javascript';
  readonly extensions = ['.js', '.jsx', '.mjs', '.cjs'];
  readonly candidateExtensions = ['.js', '.jsx', '.mjs', '.cjs', '.json'];

  extractImports(source: string): string[] {
    return extractEcmaScriptImports(source);
  }

  resolveImportPath(specifier: string, fromFile: string): ImportTarget | null {
    return resolveSpecifier(specifier, fromFile);
  }

  getCandidatePaths(basePath: string, extensions: readonly string[] = this.candidateExtensions): string[] {
    return buildCandidatePaths(basePath, extensions, indexFiles(extensions));
  }
}
