/**
 * Config File
 *
 * Parses `.context-bundle.conf`, an INI-like file of `key = value` lines:
 *
 *   # Comments start with #
 *   # Repeated keys accumulate; for roots, order is priority
 *   root = src/main/java
 *   root = ../shared/src
 *   dep_depth_max = 2
 *   extensions.python = .py, .pyi
 */

import { existsSync, readFileSync, statSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { z } from 'zod';
import { ContextBundleError, ErrorCodes } from '../lib/errors.js';
import { isLanguageTag, type ExtensionTable } from '../context/resolvers/index.js';

export const CONFIG_FILENAME = '.context-bundle.conf';

export type ConfigScalar = string | number | boolean;
export type RawConfig = Record<string, ConfigScalar | ConfigScalar[]>;

const EXTENSIONS_KEY = /^extensions\.(\w+)$/;

// Values are typed while parsing, so `root = 2024` arrives as a number
const text = z.coerce.string();

const stringList = z
  .union([z.array(text), text])
  .transform((value) => (Array.isArray(value) ? value : [value]));

const ConfigFileSchema = z.object({
  root: stringList.optional(),
  dep_depth_max: z.number().int().nonnegative().optional(),
  sig_tokens: z.number().int().nonnegative().optional(),
  output: text.optional(),
  sig_only: z.boolean().optional(),
  sig_detailed: z.boolean().optional(),
  verbose: z.boolean().optional(),
  find_by: text.optional(),
  exclude: stringList.optional(),
});

const ExtensionListSchema = z.array(
  z.string().regex(/^\.[\w.-]+$/, 'Extensions must start with a dot (e.g. .py)')
);

/** Validated configuration, with roots made absolute. */
export interface ContextBundleConfig {
  roots?: string[];
  maxDepth?: number;
  sigTokens?: number;
  output?: string;
  sigOnly?: boolean;
  sigDetailed?: boolean;
  verbose?: boolean;
  findBy?: string;
  exclude?: string[];
  extensions?: ExtensionTable;
}

function coerceValue(value: string): ConfigScalar {
  const lower = value.toLowerCase();
  if (lower === 'true' || lower === 'false') {
    return lower === 'true';
  }
  if (/^\d+$/.test(value)) {
    return parseInt(value, 10);
  }
  return value;
}

/**
 * Parse config text into raw key/value pairs.
 * Keys seen more than once collect their values into a list.
 */
export function parseConfigText(text: string): RawConfig {
  const config: RawConfig = {};
  const lines = text.split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line || line.startsWith('#')) continue;

    const eq = line.indexOf('=');
    if (eq === -1) {
      throw new ContextBundleError(
        `Invalid config format at line ${i + 1}: '${line}'`,
        ErrorCodes.CONFIG_ERROR,
        'Expected format: key = value'
      );
    }

    const key = line.substring(0, eq).trim();
    if (!key) {
      throw new ContextBundleError(`Empty key at line ${i + 1}`, ErrorCodes.CONFIG_ERROR);
    }
    const value = coerceValue(line.substring(eq + 1).trim());

    const existing = config[key];
    if (existing === undefined) {
      config[key] = value;
    } else if (Array.isArray(existing)) {
      existing.push(value);
    } else {
      config[key] = [existing, value];
    }
  }

  return config;
}

function parseExtensionTable(raw: RawConfig): ExtensionTable {
  const table: ExtensionTable = {};

  for (const [key, value] of Object.entries(raw)) {
    const match = key.match(EXTENSIONS_KEY);
    if (!match) continue;

    const language = match[1];
    if (!isLanguageTag(language)) {
      throw new ContextBundleError(`Unknown language in '${key}'`, ErrorCodes.CONFIG_ERROR);
    }

    const values = (Array.isArray(value) ? value : [value]).map(String);
    const parsed = ExtensionListSchema.safeParse(
      values.flatMap((v) => v.split(',')).map((ext) => ext.trim()).filter(Boolean)
    );
    if (!parsed.success) {
      throw new ContextBundleError(
        `Invalid '${key}': ${parsed.error.issues.map((issue) => issue.message).join('; ')}`,
        ErrorCodes.CONFIG_ERROR
      );
    }
    table[language] = parsed.data;
  }

  return table;
}

/**
 * Throw unless every root is an existing directory.
 */
export function validateRoots(roots: readonly string[]): void {
  for (const root of roots) {
    if (!existsSync(root) || !statSync(root).isDirectory()) {
      throw new ContextBundleError(`Root path does not exist: ${root}`, ErrorCodes.CONFIG_ERROR);
    }
  }
}

/**
 * Validate raw config values. Relative roots resolve against `configDir`.
 */
export function validateConfig(raw: RawConfig, configDir: string): ContextBundleConfig {
  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw new ContextBundleError(`Invalid config: ${details}`, ErrorCodes.CONFIG_ERROR);
  }

  const values = parsed.data;
  const roots = values.root?.map((root) => resolve(configDir, root));
  if (roots) {
    validateRoots(roots);
  }

  const extensions = parseExtensionTable(raw);

  return {
    roots,
    maxDepth: values.dep_depth_max,
    sigTokens: values.sig_tokens,
    output: values.output,
    sigOnly: values.sig_only,
    sigDetailed: values.sig_detailed,
    verbose: values.verbose,
    findBy: values.find_by,
    exclude: values.exclude,
    extensions: Object.keys(extensions).length > 0 ? extensions : undefined,
  };
}

/**
 * Load and validate a config file.
 */
export function loadConfigFile(configPath: string): ContextBundleConfig {
  if (!existsSync(configPath)) {
    throw new ContextBundleError(`Config file not found: ${configPath}`, ErrorCodes.CONFIG_ERROR);
  }
  const raw = parseConfigText(readFileSync(configPath, 'utf-8'));
  return validateConfig(raw, dirname(resolve(configPath)));
}

/**
 * Path of the config file in `cwd`, if there is one.
 */
export function findConfigFile(cwd: string): string | null {
  const candidate = join(cwd, CONFIG_FILENAME);
  return existsSync(candidate) ? candidate : null;
}
