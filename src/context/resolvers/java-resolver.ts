/**
 * Java Import Resolver
 *
 * Java has no relative imports: every import is a dotted name mapped
 * onto the configured roots (com.example.Util -> com/example/Util.java).
 */
import type { ImportTarget, LanguageRules } from './types.js';
import { buildCandidatePaths, matchInOrder, uniqueInOrder } from './rule-utils.js';

const IMPORT_PATTERNS = [
  // import a.b.C;  import a.b.*;  import static a.b.C.member;  import static a.b.C.*;
  /^[ \t]*import[ \t]+(static[ \t]+)?([A-Za-z_$][\w$]*(?:\.[A-Za-z_$][\w$]*)*)(\.\*)?[ \t]*;/gm,
];

const QUALIFIED_NAME = /^[A-Za-z_$][\w$]*(?:\.[A-Za-z_$][\w$]*)*$/;

export class JavaResolver implements LanguageRules {
  readonly language = 'java';
  readonly extensions = ['.java'];
  readonly candidateExtensions = ['.java'];

  extractImports(source: string): string[] {
    const imports: string[] = [];

    for (const match of matchInOrder(source, IMPORT_PATTERNS)) {
      const [, isStatic, name, wildcard] = match;
      if (isStatic && !wildcard) {
        // import static a.b.C.member -> the owning class a.b.C
        const owner = name.substring(0, name.lastIndexOf('.'));
        if (owner) imports.push(owner);
        continue;
      }
      // Wildcards keep only the base name: a.b.* -> a.b
      imports.push(name);
    }

    return uniqueInOrder(imports);
  }

  resolveImportPath(specifier: string): ImportTarget | null {
    if (!QUALIFIED_NAME.test(specifier)) return null;
    return { mode: 'root', path: specifier.split('.').join('/') };
  }

  getCandidatePaths(basePath: string, extensions: readonly string[] = this.candidateExtensions): string[] {
    return buildCandidatePaths(basePath, extensions, []);
  }
}
