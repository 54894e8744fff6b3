import { describe, it, expect } from 'vitest';
import { GoResolver } from './go-resolver.js';

const resolver = new GoResolver();

describe('GoResolver', () => {
  describe('extractImports', () => {
    it('extracts single imports and import blocks in order', () => {
      const source = [
        'package main',
        '',
        'import "fmt"',
        'import (',
        '\t"os"',
        '\tlog "myproject/logger"',
        '\t_ "myproject/driver"',
        ')',
      ].join('\n');
      expect(resolver.extractImports(source)).toEqual([
        'fmt',
        'os',
        'myproject/logger',
        'myproject/driver',
      ]);
    });
  });

  describe('resolveImportPath', () => {
    it('resolves relative package paths', () => {
      expect(resolver.resolveImportPath('./utils', '/p/cmd/main.go')).toEqual({
        mode: 'relative',
        path: '/p/cmd/utils',
      });
    });

    it('keeps module paths for root lookup', () => {
      expect(resolver.resolveImportPath('myproject/utils', '/p/cmd/main.go')).toEqual({
        mode: 'root',
        path: 'myproject/utils',
      });
    });
  });

  describe('getCandidatePaths', () => {
    it('falls back to the file named after the package directory', () => {
      expect(resolver.getCandidatePaths('/p/utils')).toEqual(['/p/utils', '/p/utils.go', '/p/utils/utils.go']);
    });
  });
});
