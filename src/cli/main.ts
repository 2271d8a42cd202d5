import { CliCommand, ConfigurationManager } from '../config/configurationManager.js';
import { LOG_PREFIX } from '../constants.js';
import { ConfigurationError, TraversalError } from '../errors.js';
import { Profiler } from '../profiler/profiler.js';
import { SearchEngine, SearchEngineOptions } from '../search/searchEngine.js';
import { LogLevel, LoggerService, describeError } from '../utils/Logger.js';
import { formatError, formatHelp, formatResults, formatVersion, shouldUseColor } from './output.js';

export interface OutputStream {
  write(chunk: string): unknown;
  isTTY?: boolean;
}

export interface CliIO {
  stdout: OutputStream;
  stderr: OutputStream;
  env: NodeJS.ProcessEnv;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

function writeLines(stream: OutputStream, lines: string[]): void {
  stream.write(lines.join('\n') + '\n');
}

/**
 * Run one CLI invocation and return the process exit code.
 * `engineOptions` lets callers swap the file system or worker pool.
 */
export async function runCli(
  argv: string[],
  io: CliIO,
  engineOptions: Omit<SearchEngineOptions, 'logger' | 'profiler'> = {}
): Promise<number> {
  const outputOptions = { color: shouldUseColor(io.stdout, io.env) };
  const errorOptions = { color: shouldUseColor(io.stderr, io.env) };

  let command: CliCommand;
  try {
    command = new ConfigurationManager().parseArguments(argv);
  } catch (error: unknown) {
    if (error instanceof ConfigurationError) {
      writeLines(io.stderr, [formatError('Error', error.message, errorOptions)]);
      return EXIT_FAILURE;
    }
    throw error;
  }

  if (command.kind === 'help') {
    writeLines(io.stdout, formatHelp(outputOptions));
    return EXIT_OK;
  }
  if (command.kind === 'version') {
    writeLines(io.stdout, [formatVersion()]);
    return EXIT_OK;
  }

  const { config, logging } = command;
  const logger = new LoggerService(LogLevel.WARN, { write: line => io.stderr.write(line + '\n') });
  if (logging.verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }
  if (logging.logFile) {
    logger.initFileLogging(logging.logFile);
  }

  const profiler = new Profiler();
  const engine = new SearchEngine({ ...engineOptions, logger, profiler });

  try {
    const { results } = await engine.search(config);
    writeLines(io.stdout, formatResults(results, outputOptions));

    for (const [phase, metric] of profiler.getAllMetrics()) {
      logger.perf('SearchEngine', phase, metric.totalTimeMs);
    }
    return EXIT_OK;
  } catch (error: unknown) {
    if (error instanceof TraversalError) {
      writeLines(io.stderr, [formatError('Error traversing directory', error.message, errorOptions)]);
    } else {
      logger.debug(`${LOG_PREFIX.CLI} Search failed: ${error instanceof Error ? error.stack : String(error)}`);
      writeLines(io.stderr, [formatError('Error', describeError(error), errorOptions)]);
    }
    return EXIT_FAILURE;
  } finally {
    logger.dispose();
  }
}
