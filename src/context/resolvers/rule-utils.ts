import { join } from 'path';

/**
 * Run every pattern over the source and return the matches sorted by their
 * position, so callers see imports in textual order regardless of which
 * pattern found them. Patterns must carry the `g` flag.
 */
export function matchInOrder(source: string, patterns: readonly RegExp[]): RegExpMatchArray[] {
  const matches: RegExpMatchArray[] = [];
  for (const pattern of patterns) {
    for (const match of source.matchAll(pattern)) {
      matches.push(match);
    }
  }
  return matches.sort((a, b) => (a.index ?? 0) - (b.index ?? 0));
}

/** Drop empty strings and repeats, keeping the first occurrence. */
export function uniqueInOrder(values: Iterable<string>): string[] {
  const seen = new Set<string>();
  for (const value of values) {
    const trimmed = value.trim();
    if (trimmed) seen.add(trimmed);
  }
  return [...seen];
}

/**
 * Exact name first, then each extension appended, then default files
 * inside a same-named directory.
 */
export function buildCandidatePaths(
  basePath: string,
  extensions: readonly string[],
  indexFiles: readonly string[]
): string[] {
  return [
    basePath,
    ...extensions.map((ext) => `${basePath}${ext}`),
    ...indexFiles.map((name) => join(basePath, name)),
  ];
}
