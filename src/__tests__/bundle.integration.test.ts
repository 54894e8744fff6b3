import { afterEach, describe, it, expect } from 'vitest';
import { buildContextBundle } from '../bundle/bundle-builder.js';
import { collectPrimaryFiles } from '../bundle/file-collector.js';
import { createTempProject, type TempProject } from './helpers/temp-project.js';

describe('Bundle Integration Tests', () => {
  let project: TempProject;

  afterEach(() => {
    project.cleanup();
  });

  describe('TypeScript project', () => {
    const files = {
      'src/index.ts':
        "import { add } from './math.js';\nimport type { Shape } from './shapes';\nimport express from 'express';\n",
      'src/math.ts': 'export function add(a: number, b: number): number {\n  return a + b;\n}\n',
      'src/shapes/index.ts': "import { add } from '../math.js';\n\nexport interface Shape {\n  area(): number;\n}\n",
    };

    it('follows emitted-name and directory imports', () => {
      project = createTempProject(files);

      const bundle = buildContextBundle({ files: ['src/index.ts'], baseDir: project.root });

      expect(bundle.traversal?.dependencies).toEqual([
        { path: project.path('src/math.ts'), depth: 1 },
        { path: project.path('src/shapes/index.ts'), depth: 1 },
      ]);
      expect(bundle.traversal?.unresolved).toEqual([
        { from: project.path('src/index.ts'), specifier: 'express' },
      ]);
      expect(bundle.markdown).toBe(
        '# Context\n\n' +
          '## Primary Files (Full Content)\n\n' +
          `### src/index.ts\n\`\`\`typescript\n${files['src/index.ts']}\n\`\`\`\n\n` +
          '## Dependencies (Signatures)\n\n' +
          '### src/math.ts\n```typescript\nexport function add(a: number, b: number): number\n```\n\n' +
          '### src/shapes/index.ts\n```typescript\nexport interface Shape\n```\n\n'
      );
    });

    it('selects files through a find command', () => {
      project = createTempProject(files);

      const selected = collectPrimaryFiles({
        files: [],
        findBy: 'echo src/math.ts; echo src/index.ts',
        exclude: ['src/index.ts'],
        cwd: project.root,
      });
      const bundle = buildContextBundle({ files: selected, sigOnly: true, baseDir: project.root });

      expect(bundle.markdown).toBe(
        '# Context\n\n## File Signatures\n\n' +
          '### src/math.ts\n```typescript\nexport function add(a: number, b: number): number\n```\n\n'
      );
    });
  });

  describe('Python package', () => {
    it('resolves relative imports inside a package', () => {
      project = createTempProject({
        'pkg/__init__.py': '',
        'pkg/core.py': 'from . import helpers\nfrom .models import User\n',
        'pkg/models.py': 'class User:\n    pass\n',
      });

      const bundle = buildContextBundle({ files: ['pkg/core.py'], baseDir: project.root });

      expect(bundle.traversal?.dependencies).toEqual([
        { path: project.path('pkg/__init__.py'), depth: 1 },
        { path: project.path('pkg/models.py'), depth: 1 },
      ]);
      expect(bundle.markdown).toContain('### pkg/__init__.py\n```python\n(no signatures)\n```\n\n');
      expect(bundle.markdown).toContain('### pkg/models.py\n```python\nclass User\n```\n\n');
    });
  });

  describe('Multi-root Java project', () => {
    it('prefers the first root and honours extension overrides', () => {
      project = createTempProject({
        'app/src/App.java': 'import com.acme.Config;\nimport com.acme.Extra;\n\npublic class App {}\n',
        'core/src/com/acme/Config.java': 'public class Config {}\n',
        'shared/src/com/acme/Config.java': 'public class SharedConfig {}\n',
        'shared/src/com/acme/Extra.jav': 'public class Extra {}\n',
      });

      const bundle = buildContextBundle({
        files: ['app/src/App.java'],
        roots: ['core/src', 'shared/src'],
        extensions: { java: ['.java', '.jav'] },
        baseDir: project.root,
      });

      expect(bundle.traversal?.dependencies).toEqual([
        { path: project.path('core/src/com/acme/Config.java'), depth: 1 },
        { path: project.path('shared/src/com/acme/Extra.jav'), depth: 1 },
      ]);
    });
  });
});
