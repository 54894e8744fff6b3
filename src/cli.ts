#!/usr/bin/env node
/**
 * Context Bundle - CLI Entry Point
 *
 * Bundles source files with condensed signatures of their dependencies.
 *
 * Usage:
 *   context-bundle src/app.py --root . --dep-depth-max 1
 *   context-bundle --find-by "git ls-files '*.ts'" --sig-only -o context.md
 *   context-bundle --help
 */

import { realpathSync, writeFileSync } from 'fs';
import { resolve } from 'path';
import { fileURLToPath } from 'url';
import { buildContextBundle, type BundleOptions } from './bundle/bundle-builder.js';
import { collectPrimaryFiles } from './bundle/file-collector.js';
import {
  findConfigFile,
  loadConfigFile,
  validateRoots,
  type ContextBundleConfig,
} from './config/config-file.js';
import { ContextBundleError, ErrorCodes, isContextBundleError } from './lib/errors.js';

export interface CLIArgs {
  files: string[];
  config?: string;
  roots: string[];
  output?: string;
  sigTokens?: number;
  findBy?: string;
  maxDepth?: number;
  exclude: string[];
  verbose: boolean;
  sigOnly: boolean;
  sigDetailed: boolean;
  help: boolean;
  /** Flags that were not recognized */
  unknown: string[];
}

export interface RunOptions {
  bundle: BundleOptions;
  output?: string;
  verbose: boolean;
  /** Config file that was applied, if any */
  configPath: string | null;
}

export function parseArgs(argv: string[]): CLIArgs {
  const args: CLIArgs = {
    files: [],
    roots: [],
    exclude: [],
    verbose: false,
    sigOnly: false,
    sigDetailed: false,
    help: false,
    unknown: [],
  };

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--help' || arg === '-h') {
      args.help = true;
    } else if (arg === '--config' || arg === '-c') {
      args.config = argv[++i];
    } else if (arg === '--root' || arg === '-r') {
      const value = argv[++i];
      if (value) args.roots.push(value);
    } else if (arg === '--output' || arg === '-o') {
      args.output = argv[++i];
    } else if (arg === '--sig-tokens' || arg === '-st') {
      const value = argv[++i];
      args.sigTokens = value ? parseInt(value, 10) : undefined;
    } else if (arg === '--find-by' || arg === '-f') {
      args.findBy = argv[++i];
    } else if (arg === '--dep-depth-max' || arg === '-dm') {
      const value = argv[++i];
      args.maxDepth = value ? parseInt(value, 10) : undefined;
    } else if (arg === '--exclude' || arg === '-x') {
      const value = argv[++i];
      if (value) args.exclude.push(value);
    } else if (arg === '--verbose' || arg === '-v') {
      args.verbose = true;
    } else if (arg === '--sig-only' || arg === '-so') {
      args.sigOnly = true;
    } else if (arg === '--sig-detailed' || arg === '-sd') {
      args.sigDetailed = true;
    } else if (arg.startsWith('-') && arg !== '-') {
      args.unknown.push(arg);
    } else {
      args.files.push(arg);
    }
  }

  return args;
}

function printHelp(): void {
  console.log(`
Context Bundle CLI

Usage:
  context-bundle [files...] [options]

Options:
  -c, --config <path>          Config file (default: ./.context-bundle.conf if present)
  -r, --root <dir>             Import root; repeat for several, earlier roots win
                               (default: the importing file's directory)
  -o, --output <path>          Write the bundle to a file (default: stdout)
  -st, --sig-tokens <n>        Token budget for dependency signatures (default: unlimited)
  -f, --find-by <command>      Shell command that prints the files to include
  -dm, --dep-depth-max <n>     Extra dependency rounds after direct imports (default: unlimited)
  -x, --exclude <glob>         Leave out matching files; repeatable
  -so, --sig-only              Only signatures, no full file content
  -sd, --sig-detailed          Keep decorators, docstrings and comments in signatures
  -v, --verbose                Log traversal details to stderr
  -h, --help                   Show this help message

Examples:
  context-bundle app/main.py --root . --dep-depth-max 1
  context-bundle src/Main.java -r module-a/src -r module-b/src -o context.md
  context-bundle --find-by "git ls-files '*.ts'" --exclude "*.test.ts" --sig-only
`);
}

function ensureCount(value: number | undefined, flag: string): number | undefined {
  if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
    throw new ContextBundleError(`${flag} expects a non-negative integer`, ErrorCodes.CONFIG_ERROR);
  }
  return value;
}

/**
 * Merge CLI arguments over config values and collect the primary files.
 * Explicit CLI values always take precedence.
 */
export function resolveRunOptions(args: CLIArgs, cwd: string): RunOptions {
  if (args.unknown.length > 0) {
    throw new ContextBundleError(
      `Unknown option: ${args.unknown.join(', ')}`,
      ErrorCodes.CONFIG_ERROR,
      'Use --help to list the options'
    );
  }

  const configPath = args.config ? resolve(cwd, args.config) : findConfigFile(cwd);
  const config: ContextBundleConfig = configPath ? loadConfigFile(configPath) : {};

  const roots = args.roots.length > 0 ? args.roots.map((root) => resolve(cwd, root)) : config.roots;
  if (roots) {
    validateRoots(roots);
  }

  const sigOnly = args.sigOnly || (config.sigOnly ?? false);
  const verbose = args.verbose || (config.verbose ?? false) || process.env.DEBUG_CONTEXT_BUNDLE === 'true';

  const files = collectPrimaryFiles({
    files: args.files,
    findBy: args.findBy ?? config.findBy,
    exclude: args.exclude.length > 0 ? args.exclude : (config.exclude ?? []),
    cwd,
  });

  return {
    bundle: {
      files,
      roots,
      maxDepth: ensureCount(args.maxDepth, '--dep-depth-max') ?? config.maxDepth,
      sigTokens: ensureCount(args.sigTokens, '--sig-tokens') ?? config.sigTokens,
      sigOnly,
      sigDetailed: args.sigDetailed || (config.sigDetailed ?? false),
      extensions: config.extensions,
      verbose,
      baseDir: cwd,
    },
    output: args.output ?? config.output,
    verbose,
    configPath,
  };
}

function reportError(error: unknown): void {
  if (isContextBundleError(error)) {
    console.error(`❌ Error: ${error.message}`);
    if (error.hint) {
      console.error(`   ${error.hint}`);
    }
    if (error.code === ErrorCodes.NO_FILES) {
      printHelp();
    }
    return;
  }
  console.error(`❌ Error: ${error instanceof Error ? error.message : String(error)}`);
}

/**
 * Run the CLI against an argv array. Returns the process exit code.
 */
export async function runCli(argv: string[], cwd: string = process.cwd()): Promise<number> {
  const args = parseArgs(argv);

  if (args.help) {
    printHelp();
    return 0;
  }

  try {
    const options = resolveRunOptions(args, cwd);
    if (options.verbose && options.configPath) {
      console.error(`⚙️  Loaded configuration from ${options.configPath}`);
    }

    const bundle = buildContextBundle(options.bundle);

    if (bundle.stats.failures > 0) {
      console.error(`⚠️  ${bundle.stats.failures} file(s) could not be read and were treated as leaves`);
    }
    if (bundle.stats.omittedSignatures > 0) {
      console.error(`⚠️  ${bundle.stats.omittedSignatures} dependency signature(s) dropped by --sig-tokens`);
    }

    if (options.output) {
      const outputPath = resolve(cwd, options.output);
      writeFileSync(outputPath, bundle.markdown, 'utf-8');
      console.error(`✅ Context written to ${options.output}`);
    } else {
      process.stdout.write(bundle.markdown);
    }

    return 0;
  } catch (error) {
    reportError(error);
    return 1;
  }
}

function isDirectExecution(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

// Only run when executed directly, not when imported
if (isDirectExecution()) {
  runCli(process.argv).then(
    (code) => process.exit(code),
    (error) => {
      console.error('Failed to run:', error);
      process.exit(1);
    }
  );
}
