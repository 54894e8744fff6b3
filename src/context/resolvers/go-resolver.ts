/**
 * Go Import Resolver
 */
import { basename, dirname, resolve } from 'path';
import type { ImportTarget, LanguageRules } from './types.js';
import { buildCandidatePaths, matchInOrder, uniqueInOrder } from './rule-utils.js';

const IMPORT_PATTERNS = [
  // Single import: import "path" / import alias "path"
  /^import[ \t]+(?:[\w.]+[ \t]+)?"([^"]+)"/gm,
  // Import block: import ( "path" \n alias "path2" )
  /^import[ \t]*\(([\s\S]*?)\)/gm,
];

export class GoResolver implements LanguageRules {
  readonly language = 'go';
  readonly extensions = ['.go'];
  readonly candidateExtensions = ['.go'];

  extractImports(source: string): string[] {
    const imports: string[] = [];

    for (const match of matchInOrder(source, IMPORT_PATTERNS)) {
      if (!match[0].includes('(')) {
        imports.push(match[1]);
        continue;
      }
      for (const line of match[1].matchAll(/^\s*(?:[\w.]+\s+)?"([^"]+)"/gm)) {
        imports.push(line[1]);
      }
    }

    return uniqueInOrder(imports);
  }

  isRelativeImport(specifier: string): boolean {
    return specifier.startsWith('./') || specifier.startsWith('../');
  }

  resolveImportPath(specifier: string, fromFile: string): ImportTarget | null {
    if (this.isRelativeImport(specifier)) {
      return { mode: 'relative', path: resolve(dirname(fromFile), specifier) };
    }
    // Package path as written, looked up under each root
    return { mode: 'root', path: specifier };
  }

  getCandidatePaths(basePath: string, extensions: readonly string[] = this.candidateExtensions): string[] {
    // Go imports name a package directory; its default file shares the directory name
    return buildCandidatePaths(basePath, extensions, [`${basename(basePath)}.go`]);
  }
}
