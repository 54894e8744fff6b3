/**
 * Python Import Resolver
 */
import { dirname, join, resolve } from 'path';
import type { ImportTarget, LanguageRules } from './types.js';
import { buildCandidatePaths, matchInOrder, uniqueInOrder } from './rule-utils.js';

// Only top-level statements; imports nested under if/try/def are ignored.
const IMPORT_PATTERNS = [
  // from x.y import a  /  from .x import a  /  from . import a  /  from x import *
  /^from[ \t]+(\.+[\w.]*|[\w.]+)[ \t]+import\b/gm,
  // import x.y, z as w
  /^import[ \t]+([\w.]+(?:[ \t]+as[ \t]+\w+)?(?:[ \t]*,[ \t]*[\w.]+(?:[ \t]+as[ \t]+\w+)?)*)/gm,
];

const DOTTED_NAME = /^\w+(?:\.\w+)*$/;

export class PythonResolver implements LanguageRules {
  readonly language = 'python';
  readonly extensions = ['.py', '.pyi'];
  readonly candidateExtensions = ['.py', '.pyi'];

  extractImports(source: string): string[] {
    const imports: string[] = [];

    for (const match of matchInOrder(source, IMPORT_PATTERNS)) {
      if (match[0].startsWith('from')) {
        imports.push(match[1]);
        continue;
      }
      // import x, y as z (each is a separate module)
      for (const part of match[1].split(',')) {
        imports.push(part.replace(/\s+as\s+\w+\s*$/, ''));
      }
    }

    return uniqueInOrder(imports);
  }

  isRelativeImport(specifier: string): boolean {
    return specifier.startsWith('.');
  }

  resolveImportPath(specifier: string, fromFile: string): ImportTarget | null {
    if (this.isRelativeImport(specifier)) {
      const dotMatch = specifier.match(/^(\.+)(.*)$/);
      if (!dotMatch) return null;

      const dots = dotMatch[1].length;
      const rest = dotMatch[2];
      if (rest && !DOTTED_NAME.test(rest)) return null;

      // One dot is the current package, each extra dot goes up a level
      const base = resolve(dirname(fromFile), ...Array<string>(dots - 1).fill('..'));

      if (!rest) {
        // from . import x points at the package itself
        return { mode: 'relative', path: join(base, '__init__.py') };
      }
      return { mode: 'relative', path: join(base, ...rest.split('.')) };
    }

    if (!DOTTED_NAME.test(specifier)) return null;

    // myapp.utils -> myapp/utils
    return { mode: 'root', path: specifier.split('.').join('/') };
  }

  getCandidatePaths(basePath: string, extensions: readonly string[] = this.candidateExtensions): string[] {
    return buildCandidatePaths(basePath, extensions, ['__init__.py']);
  }
}
