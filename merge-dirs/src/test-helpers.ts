import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

export async function makeTempDir(prefix = 'merge-dirs-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

/**
 * Writes files given as forward-slash relative path -> content
 */
export async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const target = path.join(root, ...relativePath.split('/'));
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content);
  }
}

/**
 * Reads every regular file under root back as relative path -> content
 */
export async function readTree(root: string): Promise<Record<string, string>> {
  const files: Record<string, string> = {};

  const visit = async (dir: string, prefix: string): Promise<void> => {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const relativePath = prefix === '' ? entry.name : `${prefix}/${entry.name}`;
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await visit(fullPath, relativePath);
      } else if (entry.isFile()) {
        files[relativePath] = await fs.readFile(fullPath, 'utf-8');
      }
    }
  };

  await visit(root, '');
  return files;
}

export async function exists(target: string): Promise<boolean> {
  try {
    await fs.lstat(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * A Node.js style system error, as thrown by fs
 */
export function errnoError(code: string, extra: { path?: string; syscall?: string } = {}): NodeJS.ErrnoException {
  return Object.assign(new Error(`${code}: simulated failure`), { code, ...extra });
}
