import * as fsPromises from 'fs/promises';

export interface DirectoryEntry {
  name: string;
  isDirectory: boolean;
  isFile: boolean;
  isSymbolicLink: boolean;
}

export interface PathStats {
  isDirectory: boolean;
  isFile: boolean;
}

/**
 * File system operations the walker depends on.
 * Allows substituting failing or synthetic trees in unit tests.
 */
export interface IFileSystem {
  stat(filePath: string): Promise<PathStats>;
  realpath(filePath: string): Promise<string>;
  readDirectoryWithTypes(dirPath: string): Promise<DirectoryEntry[]>;
}

/**
 * Centralized async file system service.
 * All traversal I/O goes through this service to:
 * - Ensure consistent async behavior (no blocking event loop)
 * - Enable easier testing/mocking
 */
export class FileSystemService implements IFileSystem {
  /**
   * Get file/directory stats, following symlinks.
   * @throws Error with code 'ENOENT' if path doesn't exist
   */
  async stat(filePath: string): Promise<PathStats> {
    const stats = await fsPromises.stat(filePath);
    return {
      isDirectory: stats.isDirectory(),
      isFile: stats.isFile()
    };
  }

  async realpath(filePath: string): Promise<string> {
    return fsPromises.realpath(filePath);
  }

  /**
   * Read directory with file type information (symlinks not followed).
   */
  async readDirectoryWithTypes(dirPath: string): Promise<DirectoryEntry[]> {
    const entries = await fsPromises.readdir(dirPath, { withFileTypes: true });
    return entries.map(entry => ({
      name: entry.name,
      isDirectory: entry.isDirectory(),
      isFile: entry.isFile(),
      isSymbolicLink: entry.isSymbolicLink()
    }));
  }
}
