import { describe, it, expect } from 'vitest';
import { JavaResolver } from './java-resolver.js';

const resolver = new JavaResolver();

describe('JavaResolver', () => {
  describe('extractImports', () => {
    it('extracts class, wildcard and static imports', () => {
      const source = [
        'package com.app;',
        '',
        'import com.example.Util;',
        'import com.example.model.*;',
        'import static com.example.Constants.MAX;',
        'import static com.example.Helpers.*;',
        'import java.util.List;',
        '',
        'public class App {}',
      ].join('\n');
      expect(resolver.extractImports(source)).toEqual([
        'com.example.Util',
        'com.example.model',
        'com.example.Constants',
        'com.example.Helpers',
        'java.util.List',
      ]);
    });
  });

  describe('resolveImportPath', () => {
    it('never treats an import as relative', () => {
      expect(resolver.resolveImportPath('.Util')).toBeNull();
    });

    it('maps dotted names to root paths', () => {
      expect(resolver.resolveImportPath('com.example.Util')).toEqual({
        mode: 'root',
        path: 'com/example/Util',
      });
    });

    it('rejects names that are not qualified identifiers', () => {
      expect(resolver.resolveImportPath('com..Util')).toBeNull();
    });
  });

  describe('getCandidatePaths', () => {
    it('tries the exact name then .java', () => {
      expect(resolver.getCandidatePaths('/r/com/example/Util')).toEqual([
        '/r/com/example/Util',
        '/r/com/example/Util.java',
      ]);
    });
  });
});
