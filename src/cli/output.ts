import { VERSION } from '../constants.js';
import { ScoredCandidate } from '../types.js';

const ANSI = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  boldCyan: '\x1b[1;36m',
  boldGreen: '\x1b[1;32m',
  boldRed: '\x1b[1;31m',
  boldBlue: '\x1b[1;34m',
  boldYellow: '\x1b[1;33m'
} as const;

export interface OutputOptions {
  color: boolean;
}

/**
 * Colour only for an interactive terminal, and never when NO_COLOR is set.
 */
export function shouldUseColor(stream: { isTTY?: boolean }, env: NodeJS.ProcessEnv): boolean {
  return stream.isTTY === true && !env['NO_COLOR'];
}

function paint(text: string, code: string, options: OutputOptions): string {
  return options.color ? `${code}${text}${ANSI.reset}` : text;
}

/**
 * `[ 5008] FILE  src/kilo.md` - score right-aligned to five columns.
 */
export function formatResult(result: ScoredCandidate, options: OutputOptions): string {
  const type = result.candidate.isDirectory ? 'DIR ' : 'FILE';
  const code = result.candidate.isDirectory ? ANSI.boldBlue : ANSI.boldYellow;
  const label = `[${String(result.score).padStart(5)}] ${type}`;
  return `${paint(label, code, options)}  ${result.candidate.path}`;
}

export function formatResults(results: readonly ScoredCandidate[], options: OutputOptions): string[] {
  const lines = ['', paint('Results:', ANSI.boldGreen, options)];
  if (results.length === 0) {
    lines.push(paint('No results found.', ANSI.boldRed, options));
    return lines;
  }
  for (const result of results) {
    lines.push(formatResult(result, options));
  }
  return lines;
}

export function formatError(prefix: string, message: string, options: OutputOptions): string {
  return `${paint(prefix + ':', ANSI.boldRed, options)} ${message}`;
}

export function formatVersion(): string {
  return `seekpath v${VERSION}`;
}

export function formatHelp(options: OutputOptions): string[] {
  const heading = (text: string) => paint(text, ANSI.bold, options);
  return [
    `${paint('seekpath', ANSI.boldCyan, options)} - fuzzy file and directory finder`,
    '',
    `${heading('USAGE')}:`,
    '  seekpath [FLAGS] <query> [root_dir]',
    '',
    `${heading('FLAGS')}:`,
    '  -h, --help            Show this help message',
    '  -v, --version         Show version info',
    '  -n, --num <N>         Limit number of results (default: 10)',
    '      --files-only      Only show files',
    '      --dirs-only       Only show directories',
    '  -i, --ignore-case     Case-insensitive search (default)',
    '  -s, --case-sensitive  Case-sensitive search',
    '      --no-parallel     Disable parallel scoring',
    '      --threads <N>     Number of scoring threads (default: CPUs - 1)',
    '  -e, --exclude <GLOB>  Skip paths matching GLOB (repeatable)',
    '      --verbose         Log progress and timings to stderr',
    '      --log-file <PATH> Append JSONL logs to PATH',
    '',
    `${heading('EXAMPLES')}:`,
    '  seekpath kilo src --files-only -n 20',
    "  seekpath resume ~/Documents --dirs-only -e '**/node_modules'"
  ];
}
