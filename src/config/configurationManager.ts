import { parseArgs } from 'util';
import { SEARCH_DEFAULTS, WORKER_CONFIG } from '../constants.js';
import { ConfigurationError } from '../errors.js';
import { CaseSensitivity, SearchConfig } from '../types.js';
import { describeError } from '../utils/Logger.js';
import { defaultPoolSize } from '../utils/workerPool.js';

/**
 * Logging settings; they are not part of the search itself.
 */
export interface LoggingConfig {
  verbose: boolean;
  logFile?: string;
}

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'search'; config: SearchConfig; logging: LoggingConfig };

const OPTIONS = {
  help: { type: 'boolean', short: 'h' },
  version: { type: 'boolean', short: 'v' },
  num: { type: 'string', short: 'n' },
  'files-only': { type: 'boolean' },
  'dirs-only': { type: 'boolean' },
  'ignore-case': { type: 'boolean', short: 'i' },
  'case-sensitive': { type: 'boolean', short: 's' },
  'no-parallel': { type: 'boolean' },
  threads: { type: 'string' },
  exclude: { type: 'string', short: 'e', multiple: true },
  verbose: { type: 'boolean' },
  'log-file': { type: 'string' }
} as const;

function defaultConfig(): SearchConfig {
  return {
    query: { text: '', caseSensitivity: 'insensitive' },
    root: SEARCH_DEFAULTS.ROOT,
    limit: SEARCH_DEFAULTS.LIMIT,
    typeFilter: { filesOnly: false, dirsOnly: false },
    parallel: SEARCH_DEFAULTS.PARALLEL,
    threads: defaultPoolSize(),
    excludePatterns: []
  };
}

function parseCount(value: string, option: string, min: number): number {
  if (!/^\d+$/.test(value)) {
    throw new ConfigurationError(`Invalid number for ${option}: ${value}`);
  }
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed) || parsed < min) {
    throw new ConfigurationError(`Invalid number for ${option}: ${value}`);
  }
  return parsed;
}

/**
 * Owns defaults and turns argv into a validated command.
 */
export class ConfigurationManager {
  private config: SearchConfig;

  constructor() {
    this.config = defaultConfig();
  }

  getConfig(): SearchConfig {
    return {
      ...this.config,
      query: { ...this.config.query },
      typeFilter: { ...this.config.typeFilter },
      excludePatterns: [...this.config.excludePatterns]
    };
  }

  /**
   * Parse command-line arguments (without the node and script entries).
   * @throws ConfigurationError for unknown options, bad numbers, a missing
   * query or a surplus positional
   */
  parseArguments(argv: string[]): CliCommand {
    const { values, positionals, tokens } = this.parse(argv);

    if (values.help) {
      return { kind: 'help' };
    }
    if (values.version) {
      return { kind: 'version' };
    }

    const [query, root, ...rest] = positionals;
    if (rest.length > 0) {
      throw new ConfigurationError(`Unknown argument: ${rest[0]}`);
    }
    if (query === undefined) {
      throw new ConfigurationError('Missing query argument. Use -h for help.');
    }

    const next = defaultConfig();
    next.query = { text: query, caseSensitivity: this.resolveCaseSensitivity(tokens) };
    next.root = root ?? SEARCH_DEFAULTS.ROOT;
    if (values.num !== undefined) {
      next.limit = parseCount(values.num, '--num', 0);
    }
    if (values.threads !== undefined) {
      next.threads = Math.min(WORKER_CONFIG.MAX_WORKERS, parseCount(values.threads, '--threads', WORKER_CONFIG.MIN_WORKERS));
    }
    next.typeFilter = {
      filesOnly: values['files-only'] ?? false,
      dirsOnly: values['dirs-only'] ?? false
    };
    next.parallel = !values['no-parallel'];
    next.excludePatterns = values.exclude ?? [];

    this.config = next;

    return {
      kind: 'search',
      config: this.getConfig(),
      logging: {
        verbose: values.verbose ?? false,
        logFile: values['log-file']
      }
    };
  }

  private parse(argv: string[]) {
    try {
      return parseArgs({ args: argv, options: OPTIONS, allowPositionals: true, strict: true, tokens: true });
    } catch (error: unknown) {
      throw new ConfigurationError(describeError(error));
    }
  }

  /**
   * `-i` and `-s` may both appear; the last one given wins.
   */
  private resolveCaseSensitivity(tokens: ReadonlyArray<{ kind: string; name?: string }>): CaseSensitivity {
    let mode: CaseSensitivity = 'insensitive';
    for (const token of tokens) {
      if (token.kind !== 'option') {
        continue;
      }
      if (token.name === 'ignore-case') {
        mode = 'insensitive';
      } else if (token.name === 'case-sensitive') {
        mode = 'sensitive';
      }
    }
    return mode;
  }
}
