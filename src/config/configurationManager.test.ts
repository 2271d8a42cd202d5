import { describe, it, expect } from 'vitest';
import { CliCommand, ConfigurationManager } from './configurationManager.js';
import { ConfigurationError } from '../errors.js';
import { SearchConfig } from '../types.js';

function parseSearch(argv: string[]): Extract<CliCommand, { kind: 'search' }> {
  const command = new ConfigurationManager().parseArguments(argv);
  if (command.kind !== 'search') {
    throw new Error(`expected a search command, got ${command.kind}`);
  }
  return command;
}

function configFor(argv: string[]): SearchConfig {
  return parseSearch(argv).config;
}

describe('ConfigurationManager', () => {
  it('should apply defaults for a bare query', () => {
    const config = configFor(['kilo']);

    expect(config.query).toEqual({ text: 'kilo', caseSensitivity: 'insensitive' });
    expect(config.root).toBe('.');
    expect(config.limit).toBe(10);
    expect(config.typeFilter).toEqual({ filesOnly: false, dirsOnly: false });
    expect(config.parallel).toBe(true);
    expect(config.threads).toBeGreaterThanOrEqual(1);
    expect(config.excludePatterns).toEqual([]);
  });

  it('should read the root and every flag', () => {
    const command = parseSearch([
      'kilo', 'src', '--files-only', '--dirs-only', '-n', '20', '--no-parallel',
      '--threads', '3', '-e', '**/node_modules', '--exclude', '**/.git', '--verbose', '--log-file', 'out.jsonl'
    ]);

    expect(command.config).toEqual({
      query: { text: 'kilo', caseSensitivity: 'insensitive' },
      root: 'src',
      limit: 20,
      typeFilter: { filesOnly: true, dirsOnly: true },
      parallel: false,
      threads: 3,
      excludePatterns: ['**/node_modules', '**/.git']
    });
    expect(command.logging).toEqual({ verbose: true, logFile: 'out.jsonl' });
  });

  it('should accept flags before positionals', () => {
    const config = configFor(['--num', '0', 'resume', '/tmp/docs']);
    expect(config.limit).toBe(0);
    expect(config.query.text).toBe('resume');
    expect(config.root).toBe('/tmp/docs');
  });

  it('should accept an empty query', () => {
    expect(configFor(['']).query.text).toBe('');
  });

  it('should let the last case flag win', () => {
    expect(configFor(['q', '-s']).query.caseSensitivity).toBe('sensitive');
    expect(configFor(['q', '-s', '-i']).query.caseSensitivity).toBe('insensitive');
    expect(configFor(['q', '--ignore-case', '--case-sensitive']).query.caseSensitivity).toBe('sensitive');
  });

  it('should return help and version commands', () => {
    const manager = new ConfigurationManager();
    expect(manager.parseArguments(['-h'])).toEqual({ kind: 'help' });
    expect(manager.parseArguments(['--version'])).toEqual({ kind: 'version' });
    expect(manager.parseArguments(['-v', 'query'])).toEqual({ kind: 'version' });
  });

  it('should reject a missing query', () => {
    expect(() => new ConfigurationManager().parseArguments([])).toThrow(
      new ConfigurationError('Missing query argument. Use -h for help.')
    );
  });

  it('should reject a third positional', () => {
    expect(() => new ConfigurationManager().parseArguments(['a', 'b', 'c'])).toThrow('Unknown argument: c');
  });

  it('should reject malformed numbers', () => {
    const manager = new ConfigurationManager();
    expect(() => manager.parseArguments(['q', '-n', 'ten'])).toThrow('Invalid number for --num: ten');
    expect(() => manager.parseArguments(['q', '-n', '-1'])).toThrow(ConfigurationError);
    expect(() => manager.parseArguments(['q', '-n', '2.5'])).toThrow('Invalid number for --num: 2.5');
    expect(() => manager.parseArguments(['q', '--threads', '0'])).toThrow('Invalid number for --threads: 0');
  });

  it('should reject unknown options as configuration errors', () => {
    expect(() => new ConfigurationManager().parseArguments(['q', '--fuzzy'])).toThrow(ConfigurationError);
  });

  it('should reject an option missing its value', () => {
    expect(() => new ConfigurationManager().parseArguments(['q', '--num'])).toThrow(ConfigurationError);
  });

  it('should cap the thread count', () => {
    expect(configFor(['q', '--threads', '1000']).threads).toBe(64);
  });

  it('should expose the last parsed configuration', () => {
    const manager = new ConfigurationManager();
    manager.parseArguments(['kilo', 'docs', '-n', '3']);

    const config = manager.getConfig();
    expect(config.root).toBe('docs');
    expect(config.limit).toBe(3);
  });
});
