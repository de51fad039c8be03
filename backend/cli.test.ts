import { describe, expect, it } from 'vitest';
import { CliUsageError, parseCliArgs } from './cli';

describe('parseCliArgs', () => {
  it('defaults to a daily run', () => {
    expect(parseCliArgs([])).toEqual({ help: false, options: { contentType: 'daily', dryRun: false } });
  });

  it('reads every flag', () => {
    const command = parseCliArgs([
      '--type', 'weekly',
      '--count', '16',
      '--feed', 'api',
      '--format', 'both',
      '--output', './out',
      '--voice', 'onyx',
      '--dry-run'
    ]);
    expect(command).toEqual({
      help: false,
      options: {
        contentType: 'weekly',
        count: 16,
        feedMode: 'api',
        formats: 'both',
        outputDir: './out',
        voice: 'onyx',
        dryRun: true
      }
    });
  });

  it('takes the breaking source threshold', () => {
    expect(parseCliArgs(['--type=breaking', '--min-sources=6'])).toEqual({
      help: false,
      options: { contentType: 'breaking', minSources: 6, dryRun: false }
    });
  });

  it('asks for help', () => {
    expect(parseCliArgs(['-h'])).toEqual({ help: true });
  });

  it('rejects bad values', () => {
    expect(() => parseCliArgs(['--type', 'monthly'])).toThrow('--type must be one of daily, weekly, breaking');
    expect(() => parseCliArgs(['--count', '0'])).toThrow('--count must be a positive integer');
    expect(() => parseCliArgs(['--count', 'six'])).toThrowError(CliUsageError);
    expect(() => parseCliArgs(['--shorts-only'])).toThrow('Unknown option --shorts-only');
  });
});
