import * as fsPromises from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

/**
 * Describes a directory tree: strings are file contents, objects are
 * subdirectories.
 */
export interface TreeLayout {
  [name: string]: string | TreeLayout;
}

export async function writeTree(root: string, layout: TreeLayout): Promise<void> {
  for (const [name, value] of Object.entries(layout)) {
    const target = path.join(root, name);
    if (typeof value === 'string') {
      await fsPromises.writeFile(target, value, 'utf-8');
    } else {
      await fsPromises.mkdir(target, { recursive: true });
      await writeTree(target, value);
    }
  }
}

/**
 * Create a fresh directory under the OS temp dir populated from `layout`.
 * The returned path is resolved through symlinks (macOS /var -> /private/var).
 */
export async function createTempTree(layout: TreeLayout): Promise<string> {
  const dir = await fsPromises.mkdtemp(path.join(os.tmpdir(), 'seekpath-test-'));
  const root = await fsPromises.realpath(dir);
  await writeTree(root, layout);
  return root;
}

export async function removeTempTree(root: string): Promise<void> {
  await fsPromises.rm(root, { recursive: true, force: true });
}
