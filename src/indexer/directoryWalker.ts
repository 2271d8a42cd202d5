import * as path from 'path';
import { minimatch } from 'minimatch';
import { LOG_PREFIX } from '../constants.js';
import { TraversalError, errorCode } from '../errors.js';
import { Candidate, TraversalDiagnostic, TraversalResult } from '../types.js';
import { DirectoryEntry, FileSystemService, IFileSystem } from '../utils/FileSystemService.js';
import { ILogger, NullLogger, describeError } from '../utils/Logger.js';

export interface WalkOptions {
  excludePatterns?: string[];
  fileSystem?: IFileSystem;
  logger?: ILogger;
}

/**
 * Append `name` to `dir` without normalizing. `path.join` would fold
 * `link/..` textually, which is not where the OS resolves it.
 */
export function childPath(dir: string, name: string): string {
  return dir.endsWith(path.sep) ? dir + name : dir + path.sep + name;
}

/**
 * Path as seen by exclude globs: `/` separators and no `.` segments, so a
 * globstar pattern still matches below a root such as `.`.
 */
function globTarget(filePath: string): string {
  const parts = filePath.split(/[\\/]/);
  return parts.filter((part, i) => part !== '.' || i === parts.length - 1).join('/');
}

interface WalkState {
  candidates: Candidate[];
  diagnostics: TraversalDiagnostic[];
  visited: Set<string>;
}

/**
 * Pre-order directory walk producing search candidates.
 *
 * Unreadable subdirectories and broken links never abort the walk; they are
 * collected as diagnostics. Only a root that cannot be read is fatal.
 */
export class DirectoryWalker {
  private readonly excludePatterns: string[];
  private readonly fs: IFileSystem;
  private readonly logger: ILogger;

  constructor(options: WalkOptions = {}) {
    this.excludePatterns = options.excludePatterns ?? [];
    this.fs = options.fileSystem ?? new FileSystemService();
    this.logger = options.logger ?? new NullLogger();
  }

  /**
   * Walk everything beneath `root`. The root itself is not a candidate
   * unless it is a file, in which case it is the only one.
   *
   * @throws TraversalError if the root is missing or unreadable
   */
  async walk(root: string): Promise<TraversalResult> {
    this.logger.debug(`${LOG_PREFIX.WALKER} Starting walk from: ${root}`);

    const rootStats = await this.rootOperation(root, () => this.fs.stat(root));
    if (!rootStats.isDirectory) {
      return {
        candidates: [{ path: root, isDirectory: false, isFile: rootStats.isFile }],
        diagnostics: []
      };
    }

    const rootReal = await this.rootOperation(root, () => this.fs.realpath(root));
    const entries = await this.rootOperation(root, () => this.fs.readDirectoryWithTypes(root));

    const state: WalkState = {
      candidates: [],
      diagnostics: [],
      visited: new Set([rootReal])
    };
    await this.walkEntries(root, rootReal, entries, state);

    this.logger.debug(
      `${LOG_PREFIX.WALKER} Walk complete. Found ${state.candidates.length} entries, ` +
      `${state.diagnostics.length} skipped`
    );
    return { candidates: state.candidates, diagnostics: state.diagnostics };
  }

  private async rootOperation<T>(root: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error: unknown) {
      throw new TraversalError(root, describeError(error), errorCode(error));
    }
  }

  private async walkEntries(
    dir: string,
    realDir: string,
    entries: DirectoryEntry[],
    state: WalkState
  ): Promise<void> {
    const sorted = [...entries].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of sorted) {
      const fullPath = childPath(dir, entry.name);

      if (this.shouldExclude(fullPath)) {
        continue;
      }

      const candidate = await this.describeEntry(fullPath, entry, state);
      state.candidates.push(candidate);

      if (!candidate.isDirectory) {
        continue;
      }

      const realPath = entry.isSymbolicLink
        ? await this.resolveLink(fullPath, state)
        : path.join(realDir, entry.name);
      if (realPath === undefined) {
        continue;
      }
      if (state.visited.has(realPath)) {
        this.logger.debug(`${LOG_PREFIX.WALKER} Not descending into ${fullPath}: already visited ${realPath}`);
        continue;
      }
      state.visited.add(realPath);

      let children: DirectoryEntry[];
      try {
        children = await this.fs.readDirectoryWithTypes(fullPath);
      } catch (error: unknown) {
        this.recordFailure(state, fullPath, 'Cannot read directory', error);
        continue;
      }

      await this.walkEntries(fullPath, realPath, children, state);
    }
  }

  /**
   * Snapshot the type flags. Symlinks are followed; a dangling one is
   * neither a file nor a directory.
   */
  private async describeEntry(fullPath: string, entry: DirectoryEntry, state: WalkState): Promise<Candidate> {
    if (!entry.isSymbolicLink) {
      return { path: fullPath, isDirectory: entry.isDirectory, isFile: entry.isFile };
    }

    try {
      const target = await this.fs.stat(fullPath);
      return { path: fullPath, isDirectory: target.isDirectory, isFile: target.isFile };
    } catch (error: unknown) {
      this.recordFailure(state, fullPath, 'Broken symbolic link', error);
      return { path: fullPath, isDirectory: false, isFile: false };
    }
  }

  private async resolveLink(fullPath: string, state: WalkState): Promise<string | undefined> {
    try {
      return await this.fs.realpath(fullPath);
    } catch (error: unknown) {
      this.recordFailure(state, fullPath, 'Cannot resolve link', error);
      return undefined;
    }
  }

  private recordFailure(state: WalkState, fullPath: string, reason: string, error: unknown): void {
    const message = `${reason}: ${describeError(error)}`;
    state.diagnostics.push({ path: fullPath, message, code: errorCode(error) });
    this.logger.debug(`${LOG_PREFIX.WALKER} ${fullPath}: ${message}`);
  }

  private shouldExclude(filePath: string): boolean {
    if (this.excludePatterns.length === 0) {
      return false;
    }
    const target = globTarget(filePath);
    for (const pattern of this.excludePatterns) {
      if (minimatch(target, pattern, { dot: true })) {
        return true;
      }
    }
    return false;
  }
}
