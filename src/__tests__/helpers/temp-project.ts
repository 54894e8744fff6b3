import { mkdirSync, mkdtempSync, realpathSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { dirname, join } from 'path';

export interface TempProject {
  /** Canonical path of the project directory */
  root: string;
  /** Absolute path of a file inside the project */
  path(relativePath: string): string;
  write(relativePath: string, content: string | Buffer): string;
  cleanup(): void;
}

/**
 * Create a throwaway directory tree under the OS temp dir.
 */
export function createTempProject(files: Record<string, string> = {}): TempProject {
  // realpath so /tmp symlinks (macOS /var -> /private/var) match canonical results
  const root = realpathSync(mkdtempSync(join(tmpdir(), 'context-bundle-')));

  const project: TempProject = {
    root,
    path: (relativePath) => join(root, relativePath),
    write: (relativePath, content) => {
      const target = join(root, relativePath);
      mkdirSync(dirname(target), { recursive: true });
      writeFileSync(target, content);
      return target;
    },
    cleanup: () => rmSync(root, { recursive: true, force: true }),
  };

  for (const [relativePath, content] of Object.entries(files)) {
    project.write(relativePath, content);
  }

  return project;
}
