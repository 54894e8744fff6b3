/**
 * Dependency Traverser
 *
 * Breadth-first, depth-bounded expansion from a set of primary files.
 * Every file is recorded once, at the depth where it was first reached.
 */

import { readFileSync, realpathSync } from 'fs';
import { dirname, resolve } from 'path';
import { ContextBundleError, ErrorCodes } from '../lib/errors.js';
import { extractImports } from './import-extractor.js';
import { resolveImport } from './path-resolver.js';
import { detectLanguage, type ExtensionTable } from './resolvers/index.js';

export interface ResolvedDependency {
  /** Canonical absolute path */
  path: string;
  /** Hops from the nearest primary file (0 for primaries) */
  depth: number;
}

export interface ExtractionFailure {
  path: string;
  reason: string;
}

export interface UnresolvedImport {
  /** File containing the import */
  from: string;
  /** Import as written */
  specifier: string;
}

export interface TraversalResult {
  /** Primary files, depth 0, in input order */
  primary: ResolvedDependency[];
  /** Discovered dependencies, depth >= 1, in discovery order */
  dependencies: ResolvedDependency[];
  /** Files degraded to leaves because they could not be read */
  failures: ExtractionFailure[];
  unresolved: UnresolvedImport[];
}

export interface TraversalOptions {
  /** Per-language override of the extensions probed during resolution */
  extensions?: ExtensionTable;
  /** Log each visited file and every resolution miss to stderr */
  verbose?: boolean;
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Read a file as strict UTF-8 text. Binary content is rejected.
 */
export function readSourceText(filePath: string): string {
  const buffer = readFileSync(filePath);
  if (buffer.includes(0)) {
    throw new Error('binary content');
  }
  return utf8.decode(buffer);
}

function canonicalizePrimary(filePath: string): string {
  try {
    return realpathSync(resolve(filePath));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ContextBundleError(
      `Primary file not found: ${filePath}`,
      ErrorCodes.INVALID_PRIMARY_FILES,
      message
    );
  }
}

function validateDepth(maxDepth: number): void {
  if (Number.isNaN(maxDepth) || maxDepth < 0 || (Number.isFinite(maxDepth) && !Number.isInteger(maxDepth))) {
    throw new ContextBundleError(
      `Maximum depth must be a non-negative integer, got: ${maxDepth}`,
      ErrorCodes.INVALID_DEPTH
    );
  }
}

/**
 * Traverse the dependency graph of the primary files.
 *
 * The first expansion round always runs, so direct dependencies are found
 * even with `maxDepth = 0`; each further round adds one hop, up to
 * `maxDepth + 1`. Pass `Infinity` for an unbounded walk.
 *
 * @param primaryFiles - Files to start from (must exist)
 * @param roots - Ordered project roots, highest priority first; `null` looks
 *   non-relative imports up in the importing file's own directory
 * @param maxDepth - Number of expansion rounds after the first
 */
export function traverseDependencies(
  primaryFiles: readonly string[],
  roots: readonly string[] | null,
  maxDepth: number,
  options: TraversalOptions = {}
): TraversalResult {
  if (primaryFiles.length === 0) {
    throw new ContextBundleError('No primary files given', ErrorCodes.INVALID_PRIMARY_FILES);
  }
  validateDepth(maxDepth);

  const verbose = options.verbose ?? false;
  const visited = new Map<string, number>();
  const primary: ResolvedDependency[] = [];
  const dependencies: ResolvedDependency[] = [];
  const failures: ExtractionFailure[] = [];
  const unresolved: UnresolvedImport[] = [];

  for (const file of primaryFiles) {
    const canonical = canonicalizePrimary(file);
    if (visited.has(canonical)) continue;
    visited.set(canonical, 0);
    primary.push({ path: canonical, depth: 0 });
  }

  let frontier = primary.map((p) => p.path);
  let depth = 0;

  while (frontier.length > 0 && depth <= maxDepth) {
    const next: string[] = [];

    for (const file of frontier) {
      if (verbose) {
        console.error(`🔍 Processing ${file} (depth ${depth})`);
      }

      const language = detectLanguage(file);
      if (!language) continue;

      let imports: string[];
      try {
        imports = extractImports(readSourceText(file), language);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        failures.push({ path: file, reason });
        if (verbose) {
          console.error(`⚠️  Skipping imports of ${file}: ${reason}`);
        }
        continue;
      }

      const lookupRoots = roots ?? [dirname(file)];

      for (const specifier of imports) {
        const resolved = resolveImport(specifier, file, lookupRoots, language, options.extensions);

        if (!resolved) {
          unresolved.push({ from: file, specifier });
          if (verbose) {
            console.error(`   Unresolved: ${specifier}`);
          }
          continue;
        }

        if (visited.has(resolved)) continue;

        visited.set(resolved, depth + 1);
        dependencies.push({ path: resolved, depth: depth + 1 });
        next.push(resolved);
      }
    }

    frontier = next;
    depth++;
  }

  return { primary, dependencies, failures, unresolved };
}
