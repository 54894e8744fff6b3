import { afterEach, describe, it, expect } from 'vitest';
import {
  CONFIG_FILENAME,
  findConfigFile,
  loadConfigFile,
  parseConfigText,
  validateConfig,
  validateRoots,
} from './config-file.js';
import { ContextBundleError } from '../lib/errors.js';
import { createTempProject, type TempProject } from '../__tests__/helpers/temp-project.js';

describe('parseConfigText', () => {
  it('parses keys, comments and typed values', () => {
    const raw = parseConfigText(
      '# project settings\n' +
        'root = src\n' +
        'root = lib\n' +
        'dep_depth_max = 2\n' +
        'sig_only = TRUE\n' +
        'output = out.md\n' +
        '\n'
    );

    expect(raw).toEqual({
      root: ['src', 'lib'],
      dep_depth_max: 2,
      sig_only: true,
      output: 'out.md',
    });
  });

  it('splits on the first equals sign only', () => {
    expect(parseConfigText('find_by = git ls-files --format=x')).toEqual({
      find_by: 'git ls-files --format=x',
    });
  });

  it('rejects lines without a key/value pair', () => {
    expect(() => parseConfigText('root = .\ngarbage')).toThrow("Invalid config format at line 2: 'garbage'");
  });

  it('rejects empty keys', () => {
    expect(() => parseConfigText('  = value')).toThrow('Empty key at line 1');
  });
});

describe('validateConfig', () => {
  let project: TempProject;

  afterEach(() => {
    project.cleanup();
  });

  it('maps keys and resolves roots against the config directory', () => {
    project = createTempProject({ 'src/a.py': '', 'lib/b.py': '' });

    const config = validateConfig(
      { root: ['src', 'lib'], dep_depth_max: 1, sig_tokens: 500, sig_detailed: true, exclude: '*.pyc' },
      project.root
    );

    expect(config).toEqual({
      roots: [project.path('src'), project.path('lib')],
      maxDepth: 1,
      sigTokens: 500,
      output: undefined,
      sigOnly: undefined,
      sigDetailed: true,
      verbose: undefined,
      findBy: undefined,
      exclude: ['*.pyc'],
      extensions: undefined,
    });
  });

  it('keeps digit-only paths as strings', () => {
    project = createTempProject({ '2024/a.py': '' });

    const config = validateConfig(parseConfigText('root = 2024\noutput = 1\n'), project.root);

    expect(config.roots).toEqual([project.path('2024')]);
    expect(config.output).toBe('1');
  });

  it('rejects roots that do not exist', () => {
    project = createTempProject();
    expect(() => validateConfig({ root: 'missing' }, project.root)).toThrow(
      `Root path does not exist: ${project.path('missing')}`
    );
  });

  it('rejects values of the wrong type', () => {
    project = createTempProject();
    expect(() => validateConfig({ dep_depth_max: 'two' }, project.root)).toThrow(/^Invalid config: dep_depth_max: /);
  });

  it('reads per-language extension lists', () => {
    project = createTempProject();
    const config = validateConfig({ 'extensions.python': ['.py, .pyw', '.pyi'] }, project.root);
    expect(config.extensions).toEqual({ python: ['.py', '.pyw', '.pyi'] });
  });

  it('rejects unknown languages and malformed extensions', () => {
    project = createTempProject();
    expect(() => validateConfig({ 'extensions.rust': '.rs' }, project.root)).toThrow(
      "Unknown language in 'extensions.rust'"
    );
    expect(() => validateConfig({ 'extensions.go': 'go' }, project.root)).toThrow(
      "Invalid 'extensions.go': Extensions must start with a dot (e.g. .py)"
    );
  });
});

describe('validateRoots', () => {
  let project: TempProject;

  afterEach(() => {
    project.cleanup();
  });

  it('rejects files posing as roots', () => {
    project = createTempProject({ 'file.txt': '' });
    expect(() => validateRoots([project.root])).not.toThrow();
    expect(() => validateRoots([project.path('file.txt')])).toThrow(ContextBundleError);
  });
});

describe('loadConfigFile', () => {
  let project: TempProject;

  afterEach(() => {
    project.cleanup();
  });

  it('loads a config file from disk', () => {
    project = createTempProject({
      'shared/util.py': '',
      [`conf/${CONFIG_FILENAME}`]: 'root = ../shared\nverbose = false\n',
    });

    const config = loadConfigFile(project.path(`conf/${CONFIG_FILENAME}`));

    expect(config.roots).toEqual([project.path('shared')]);
    expect(config.verbose).toBe(false);
  });

  it('fails for a missing file', () => {
    project = createTempProject();
    expect(() => loadConfigFile(project.path('nope.conf'))).toThrow(
      `Config file not found: ${project.path('nope.conf')}`
    );
  });

  it('finds the config file in a directory', () => {
    project = createTempProject({ [CONFIG_FILENAME]: 'verbose = true\n' });
    expect(findConfigFile(project.root)).toBe(project.path(CONFIG_FILENAME));
    expect(findConfigFile(project.path('elsewhere'))).toBeNull();
  });
});
