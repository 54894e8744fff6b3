/**
 * Context System
 *
 * Re-exports for import extraction, resolution and traversal.
 */

export { extractImports } from './import-extractor.js';

export { resolveImport, probeCandidates } from './path-resolver.js';

export {
  traverseDependencies,
  readSourceText,
  type TraversalResult,
  type TraversalOptions,
  type ResolvedDependency,
  type ExtractionFailure,
  type UnresolvedImport,
} from './traverser.js';

export {
  detectLanguage,
  getLanguageRules,
  getSupportedExtensions,
  getSupportedLanguages,
  isLanguageTag,
  type ExtensionTable,
  type LanguageRules,
  type LanguageTag,
} from './resolvers/index.js';

export {
  estimateTokens,
  truncateToTokenBudget,
  fitToTokenBudget,
  type BudgetedSection,
} from './token-budget.js';
