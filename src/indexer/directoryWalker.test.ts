import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fsPromises from 'fs/promises';
import * as path from 'path';
import { DirectoryWalker, childPath } from './directoryWalker.js';
import { TraversalError } from '../errors.js';
import { Candidate } from '../types.js';
import { MockFileSystem } from '../test/mocks/MockFileSystem.js';
import { createTempTree, removeTempTree } from '../test/helpers/tempTree.js';

function relative(root: string, candidates: Candidate[]): Array<[string, boolean, boolean]> {
  return candidates.map(c => [path.relative(root, c.path), c.isDirectory, c.isFile]);
}

describe('DirectoryWalker', () => {
  let root: string;

  beforeEach(async () => {
    root = await createTempTree({
      alpha: {
        'beta.txt': 'b',
        gamma: {
          'delta.md': 'd'
        }
      },
      'kilo.md': 'k',
      'zeta.txt': 'z'
    });
  });

  afterEach(async () => {
    await removeTempTree(root);
  });

  it('should list every entry beneath the root in pre-order', async () => {
    const result = await new DirectoryWalker().walk(root);

    expect(relative(root, result.candidates)).toEqual([
      ['alpha', true, false],
      [path.join('alpha', 'beta.txt'), false, true],
      [path.join('alpha', 'gamma'), true, false],
      [path.join('alpha', 'gamma', 'delta.md'), false, true],
      ['kilo.md', false, true],
      ['zeta.txt', false, true]
    ]);
    expect(result.diagnostics).toEqual([]);
  });

  it('should return the root alone when it is a file', async () => {
    const filePath = path.join(root, 'kilo.md');
    const result = await new DirectoryWalker().walk(filePath);

    expect(result.candidates).toEqual([{ path: filePath, isDirectory: false, isFile: true }]);
  });

  it('should fail when the root does not exist', async () => {
    const missing = path.join(root, 'missing');
    const walk = new DirectoryWalker().walk(missing);

    await expect(walk).rejects.toBeInstanceOf(TraversalError);
    await expect(walk).rejects.toMatchObject({ path: missing, code: 'ENOENT' });
  });

  it('should fail when the root cannot be listed', async () => {
    const fileSystem = new MockFileSystem();
    fileSystem.unreadable.add(root);

    await expect(new DirectoryWalker({ fileSystem }).walk(root)).rejects.toMatchObject({
      name: 'TraversalError',
      code: 'EACCES'
    });
  });

  it('should skip an unreadable subdirectory and keep walking', async () => {
    const fileSystem = new MockFileSystem();
    const alpha = path.join(root, 'alpha');
    fileSystem.unreadable.add(alpha);

    const result = await new DirectoryWalker({ fileSystem }).walk(root);

    expect(relative(root, result.candidates)).toEqual([
      ['alpha', true, false],
      ['kilo.md', false, true],
      ['zeta.txt', false, true]
    ]);
    expect(result.diagnostics).toHaveLength(1);
    expect(result.diagnostics[0]?.path).toBe(alpha);
    expect(result.diagnostics[0]?.code).toBe('EACCES');
    expect(result.diagnostics[0]?.message.startsWith('Cannot read directory: ')).toBe(true);
  });

  it('should neither emit nor descend into excluded entries', async () => {
    const fileSystem = new MockFileSystem();
    const result = await new DirectoryWalker({ fileSystem, excludePatterns: ['**/gamma'] }).walk(root);

    expect(relative(root, result.candidates)).toEqual([
      ['alpha', true, false],
      [path.join('alpha', 'beta.txt'), false, true],
      ['kilo.md', false, true],
      ['zeta.txt', false, true]
    ]);
    expect(fileSystem.readCalls).not.toContain(path.join(root, 'alpha', 'gamma'));
  });

  it('should follow symlinks for type flags without looping', async () => {
    await fsPromises.symlink(root, path.join(root, 'alpha', 'back'), 'dir');
    await fsPromises.symlink(path.join(root, 'nowhere'), path.join(root, 'dangling'));

    const result = await new DirectoryWalker().walk(root);

    expect(relative(root, result.candidates)).toEqual([
      ['alpha', true, false],
      [path.join('alpha', 'back'), true, false],
      [path.join('alpha', 'beta.txt'), false, true],
      [path.join('alpha', 'gamma'), true, false],
      [path.join('alpha', 'gamma', 'delta.md'), false, true],
      ['dangling', false, false],
      ['kilo.md', false, true],
      ['zeta.txt', false, true]
    ]);
    expect(result.diagnostics.map(d => [path.relative(root, d.path), d.code])).toEqual([
      ['dangling', 'ENOENT']
    ]);
  });

  it('should keep the root spelling in candidate paths', async () => {
    const dotted = `${root}${path.sep}.`;
    const result = await new DirectoryWalker({ excludePatterns: ['**/gamma'] }).walk(dotted);

    expect(result.candidates.map(c => c.path)).toEqual([
      [dotted, 'alpha'].join(path.sep),
      [dotted, 'alpha', 'beta.txt'].join(path.sep),
      [dotted, 'kilo.md'].join(path.sep),
      [dotted, 'zeta.txt'].join(path.sep)
    ]);
    expect(result.diagnostics).toEqual([]);
  });

  it('should resolve a root through a symlink and .. the way the OS does', async () => {
    await fsPromises.symlink(path.join(root, 'alpha', 'gamma'), path.join(root, 'hop'), 'dir');
    const viaLink = [root, 'hop', '..'].join(path.sep);

    const result = await new DirectoryWalker().walk(viaLink);

    expect(result.candidates).toEqual([
      { path: [viaLink, 'beta.txt'].join(path.sep), isDirectory: false, isFile: true },
      { path: [viaLink, 'gamma'].join(path.sep), isDirectory: true, isFile: false },
      { path: [viaLink, 'gamma', 'delta.md'].join(path.sep), isDirectory: false, isFile: true }
    ]);
    expect(result.diagnostics).toEqual([]);
    await expect(fsPromises.stat(result.candidates[0]?.path ?? '')).resolves.toBeDefined();
  });
});

describe('childPath', () => {
  it('should append without normalizing', () => {
    expect(childPath('.', 'kilo.md')).toBe(`.${path.sep}kilo.md`);
    expect(childPath(['a', 'link', '..'].join(path.sep), 'b')).toBe(['a', 'link', '..', 'b'].join(path.sep));
    expect(childPath(path.sep, 'tmp')).toBe(`${path.sep}tmp`);
  });
});
