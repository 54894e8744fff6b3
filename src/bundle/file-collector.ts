/**
 * Primary File Collection
 *
 * Gathers the files named on the command line and, optionally, the output
 * of a shell command, then applies exclude globs.
 */

import { execSync } from 'child_process';
import { statSync } from 'fs';
import { relative, resolve, sep } from 'path';
import { minimatch } from 'minimatch';
import { ContextBundleError, ErrorCodes } from '../lib/errors.js';

export interface CollectOptions {
  /** Paths given explicitly */
  files: string[];
  /** Shell command whose stdout lists one file per line */
  findBy?: string;
  /** Glob patterns of files to leave out */
  exclude?: string[];
  cwd: string;
}

/**
 * Run the find command and return its non-empty output lines.
 */
export function runFindCommand(command: string, cwd: string): string[] {
  let stdout: string;
  try {
    stdout = execSync(command, { cwd, encoding: 'utf-8', stdio: ['ignore', 'pipe', 'pipe'] });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ContextBundleError(`Find command failed: ${message}`, ErrorCodes.FIND_COMMAND_FAILED);
  }
  return stdout
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean);
}

export function isExcluded(filePath: string, patterns: readonly string[], cwd: string): boolean {
  if (patterns.length === 0) return false;
  const rel = relative(cwd, resolve(cwd, filePath)).split(sep).join('/');
  return patterns.some((pattern) => minimatch(rel, pattern, { matchBase: true, dot: true }));
}

/**
 * Collect absolute primary file paths, deduplicated in first-seen order.
 */
export function collectPrimaryFiles(options: CollectOptions): string[] {
  const found = options.findBy ? runFindCommand(options.findBy, options.cwd) : [];
  const exclude = options.exclude ?? [];
  const collected: string[] = [];
  const seen = new Set<string>();

  for (const file of [...found, ...options.files]) {
    const absolute = resolve(options.cwd, file);
    if (seen.has(absolute)) continue;
    seen.add(absolute);

    if (isExcluded(absolute, exclude, options.cwd)) continue;

    if (!statSync(absolute, { throwIfNoEntry: false })?.isFile()) {
      throw new ContextBundleError(
        `File not found: ${file}`,
        ErrorCodes.INVALID_PRIMARY_FILES,
        'Check the path, or the output of --find-by'
      );
    }
    collected.push(absolute);
  }

  if (collected.length === 0) {
    throw new ContextBundleError('No files selected', ErrorCodes.NO_FILES);
  }

  return collected;
}
