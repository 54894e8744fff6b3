import { describe, it, expect } from 'vitest';
import { PythonResolver } from './python-resolver.js';

const resolver = new PythonResolver();

describe('PythonResolver', () => {
  describe('extractImports', () => {
    it('keeps textual order across import forms', () => {
      const source = [
        'import os',
        'import sys, json',
        'import myapp.models as models',
        'from myapp.utils import helper',
        'from . import sibling',
        'from ..pkg.mod import thing',
      ].join('\n');
      expect(resolver.extractImports(source)).toEqual([
        'os',
        'sys',
        'json',
        'myapp.models',
        'myapp.utils',
        '.',
        '..pkg.mod',
      ]);
    });

    it('puts a from-import before a later plain import', () => {
      expect(resolver.extractImports('from c import x\nimport b\n')).toEqual(['c', 'b']);
    });

    it('keeps only the base module of a wildcard import', () => {
      expect(resolver.extractImports('from pkg.sub import *')).toEqual(['pkg.sub']);
    });

    it('ignores imports nested inside blocks', () => {
      const source = 'try:\n    import ujson\nexcept ImportError:\n    import json\n';
      expect(resolver.extractImports(source)).toEqual([]);
    });

    it('reports a repeated module once', () => {
      expect(resolver.extractImports('import a\nfrom a import b\nimport a')).toEqual(['a']);
    });
  });

  describe('isRelativeImport', () => {
    it('treats leading dots as relative', () => {
      expect(resolver.isRelativeImport('.')).toBe(true);
      expect(resolver.isRelativeImport('..utils')).toBe(true);
      expect(resolver.isRelativeImport('myapp.utils')).toBe(false);
    });
  });

  describe('resolveImportPath', () => {
    it('resolves relative single-dot import', () => {
      expect(resolver.resolveImportPath('.utils', '/proj/myapp/views.py')).toEqual({
        mode: 'relative',
        path: '/proj/myapp/utils',
      });
    });

    it('resolves relative double-dot import', () => {
      expect(resolver.resolveImportPath('..utils', '/proj/myapp/sub/views.py')).toEqual({
        mode: 'relative',
        path: '/proj/myapp/utils',
      });
    });

    it('resolves bare dot import to the package init file', () => {
      expect(resolver.resolveImportPath('.', '/proj/myapp/sub/views.py')).toEqual({
        mode: 'relative',
        path: '/proj/myapp/sub/__init__.py',
      });
    });

    it('maps dotted names onto root paths', () => {
      expect(resolver.resolveImportPath('myapp.utils', '/any/file.py')).toEqual({
        mode: 'root',
        path: 'myapp/utils',
      });
      expect(resolver.resolveImportPath('os', '/any/file.py')).toEqual({ mode: 'root', path: 'os' });
    });

    it('rejects malformed names', () => {
      expect(resolver.resolveImportPath('.a-b', '/proj/x.py')).toBeNull();
      expect(resolver.resolveImportPath('a..b', '/proj/x.py')).toBeNull();
    });
  });

  describe('getCandidatePaths', () => {
    it('tries exact name, extensions, then __init__.py', () => {
      expect(resolver.getCandidatePaths('/p/myapp/utils')).toEqual([
        '/p/myapp/utils',
        '/p/myapp/utils.py',
        '/p/myapp/utils.pyi',
        '/p/myapp/utils/__init__.py',
      ]);
    });

    it('uses overridden extensions', () => {
      expect(resolver.getCandidatePaths('/p/u', ['.py'])).toEqual(['/p/u', '/p/u.py', '/p/u/__init__.py']);
    });
  });
});
