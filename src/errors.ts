/**
 * Invalid command line: unknown option, missing query, malformed number.
 * Reported to the user and mapped to exit code 1.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * The search root could not be read at all. Failures below the root are
 * recorded as diagnostics instead.
 */
export class TraversalError extends Error {
  readonly path: string;
  readonly code?: string;

  constructor(filePath: string, message: string, code?: string) {
    super(`${filePath}: ${message}`);
    this.name = 'TraversalError';
    this.path = filePath;
    this.code = code;
  }
}

/**
 * Pull the `code` property (ENOENT, EACCES, ...) off a Node.js system error.
 */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
