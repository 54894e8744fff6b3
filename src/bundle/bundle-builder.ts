/**
 * Bundle Builder
 *
 * Ties the traversal engine to the signature generator and renderer:
 * primary files are included in full, their dependencies as signatures.
 */

import { readFileSync, realpathSync } from 'fs';
import { resolve } from 'path';
import { ContextBundleError, ErrorCodes } from '../lib/errors.js';
import { readSourceText, traverseDependencies, type TraversalResult } from '../context/traverser.js';
import type { ExtensionTable } from '../context/resolvers/index.js';
import { generateSignature } from '../signatures/signature-generator.js';
import { renderBundle, type FileSignature, type PrimaryFileContent } from './renderer.js';

export interface BundleOptions {
  /** Primary files, absolute or relative to baseDir */
  files: string[];
  /** Ordered import roots (default: each importing file's own directory) */
  roots?: string[];
  /** Expansion rounds after the first (default: unbounded) */
  maxDepth?: number;
  /** Token budget for the signatures section */
  sigTokens?: number;
  /** Render every file as signatures and skip traversal */
  sigOnly?: boolean;
  /** Keep decorators, docstrings and comments in signatures */
  sigDetailed?: boolean;
  /** Per-language override of the extensions probed during resolution */
  extensions?: ExtensionTable;
  verbose?: boolean;
  /** Directory that relative paths resolve against (default: cwd) */
  baseDir?: string;
}

export interface BundleStats {
  primaryFiles: number;
  dependencyFiles: number;
  failures: number;
  unresolvedImports: number;
  signatureTokens: number;
  omittedSignatures: number;
}

export interface ContextBundle {
  markdown: string;
  /** Null in signatures-only mode */
  traversal: TraversalResult | null;
  stats: BundleStats;
}

function readPrimaryContent(filePath: string): string {
  try {
    return readFileSync(filePath, 'utf-8');
  } catch (error) {
    return `Error reading: ${error instanceof Error ? error.message : String(error)}`;
  }
}

function buildSignature(filePath: string, detailed: boolean): FileSignature {
  try {
    return { path: filePath, lines: generateSignature(filePath, readSourceText(filePath), { detailed }) };
  } catch (error) {
    return {
      path: filePath,
      lines: null,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}

function canonicalize(filePath: string): string {
  try {
    return realpathSync(filePath);
  } catch {
    throw new ContextBundleError(`File not found: ${filePath}`, ErrorCodes.INVALID_PRIMARY_FILES);
  }
}

/**
 * Build a context bundle for the given files.
 */
export function buildContextBundle(options: BundleOptions): ContextBundle {
  const baseDir = resolve(options.baseDir ?? process.cwd());
  const files = options.files.map((file) => resolve(baseDir, file));
  const roots =
    options.roots && options.roots.length > 0 ? options.roots.map((root) => resolve(baseDir, root)) : null;
  const verbose = options.verbose ?? false;
  const detailed = options.sigDetailed ?? false;

  if (options.sigOnly) {
    if (files.length === 0) {
      throw new ContextBundleError('No files given', ErrorCodes.INVALID_PRIMARY_FILES);
    }
    const signatureFiles = [...new Set(files.map(canonicalize))];
    if (verbose) {
      console.error(`✍️  Generating file signatures for ${signatureFiles.length} files...`);
    }

    const rendered = renderBundle({
      primaryFiles: [],
      signatures: signatureFiles.map((file) => buildSignature(file, detailed)),
      sigOnly: true,
      sigTokens: options.sigTokens,
      baseDir,
    });

    return {
      markdown: rendered.markdown,
      traversal: null,
      stats: {
        primaryFiles: 0,
        dependencyFiles: signatureFiles.length,
        failures: 0,
        unresolvedImports: 0,
        signatureTokens: rendered.signatureTokens,
        omittedSignatures: rendered.omittedSignatures,
      },
    };
  }

  if (verbose) {
    console.error(`📦 Processing ${files.length} primary files...`);
    console.error(`   Roots: ${roots ? roots.join(', ') : 'directory of each importing file'}`);
  }

  const traversal = traverseDependencies(files, roots, options.maxDepth ?? Number.POSITIVE_INFINITY, {
    extensions: options.extensions,
    verbose,
  });

  if (verbose) {
    console.error(`✍️  Generating file signatures for ${traversal.dependencies.length} files...`);
  }

  const primaryFiles: PrimaryFileContent[] = traversal.primary.map((file) => ({
    path: file.path,
    content: readPrimaryContent(file.path),
  }));

  const rendered = renderBundle({
    primaryFiles,
    signatures: traversal.dependencies.map((dep) => buildSignature(dep.path, detailed)),
    sigOnly: false,
    sigTokens: options.sigTokens,
    baseDir,
  });

  return {
    markdown: rendered.markdown,
    traversal,
    stats: {
      primaryFiles: traversal.primary.length,
      dependencyFiles: traversal.dependencies.length,
      failures: traversal.failures.length,
      unresolvedImports: traversal.unresolved.length,
      signatureTokens: rendered.signatureTokens,
      omittedSignatures: rendered.omittedSignatures,
    },
  };
}
