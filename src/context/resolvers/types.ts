/**
 * LanguageRules interface
 *
 * Language-specific import extraction and resolution for the traverser.
 */

export type LanguageTag = 'python' | 'typescript' | 'javascript' | 'java' | 'go';

/** Per-language override of the extensions probed during resolution. */
export type ExtensionTable = Partial<Record<LanguageTag, readonly string[]>>;

/**
 * Where an import points before any file is probed.
 * `relative` paths are absolute base paths next to the importing file;
 * `root` paths are joined onto each configured root in turn.
 */
export type ImportTarget =
  | { mode: 'relative'; path: string }
  | { mode: 'root'; path: string };

export interface LanguageRules {
  readonly language: LanguageTag;
  /** Extensions that identify a file as this language */
  readonly extensions: readonly string[];
  /** Extensions appended to a base path during resolution, in probe order */
  readonly candidateExtensions: readonly string[];
  extractImports(source: string): string[];
  resolveImportPath(specifier: string, fromFile: string): ImportTarget | null;
  getCandidatePaths(basePath: string, extensions?: readonly string[]): string[];
}
