/**
 * Context Bundle
 *
 * Builds markdown context bundles: full content of the requested files plus
 * condensed signatures of everything they import, transitively.
 */

export * from './context/index.js';

export {
  buildContextBundle,
  type BundleOptions,
  type BundleStats,
  type ContextBundle,
} from './bundle/bundle-builder.js';

export { collectPrimaryFiles, type CollectOptions } from './bundle/file-collector.js';

export { renderBundle, type RenderInput, type RenderedBundle } from './bundle/renderer.js';

export { generateSignature, type SignatureOptions } from './signatures/signature-generator.js';

export {
  loadConfigFile,
  parseConfigText,
  validateConfig,
  findConfigFile,
  CONFIG_FILENAME,
  type ContextBundleConfig,
} from './config/config-file.js';

export { ContextBundleError, ErrorCodes } from './lib/errors.js';
