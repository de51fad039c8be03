import minimist from 'minimist';
import type { PipelineOptions } from './pipeline/index';
import type { FormatSelection } from './pipeline/formats';
import type { ContentType, FeedMode } from './news/types';

export const USAGE = `Usage: news-pipeline [options]

  --type <daily|weekly|breaking>   Content type (default daily)
  --count <n>                      Number of stories (daily 6, weekly 16)
  --feed <rss|api>                 Feed mode for daily and weekly runs (default rss)
  --format <shorts|video|both>     Output format (daily: shorts, weekly: video)
  --output <dir>                   Output directory (default OUTPUT_DIR)
  --voice <name>                   TTS voice, overrides TTS_VOICE
  --min-sources <n>                Distinct sources needed to call breaking news
  --dry-run                        Stop after selection or detection, persist nothing
  -h, --help                       Show this help`;

/** Bad flags; the entry point prints usage and exits 2. */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export type CliCommand = { help: true } | { help: false; options: PipelineOptions };

const CONTENT_TYPES: readonly ContentType[] = ['daily', 'weekly', 'breaking'];
const FEED_MODES: readonly FeedMode[] = ['rss', 'api'];
const FORMAT_SELECTIONS: readonly FormatSelection[] = ['shorts', 'video', 'both'];

type Args = minimist.ParsedArgs;

function stringFlag(args: Args, name: string): string | undefined {
  const value: unknown = args[name];
  if (Array.isArray(value)) throw new CliUsageError(`--${name} given more than once`);
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

function choiceFlag<T extends string>(args: Args, name: string, allowed: readonly T[]): T | undefined {
  const value = stringFlag(args, name);
  if (value === undefined) return undefined;
  const match = allowed.find((a) => a === value.toLowerCase());
  if (!match) throw new CliUsageError(`--${name} must be one of ${allowed.join(', ')}`);
  return match;
}

function intFlag(args: Args, name: string): number | undefined {
  const value = stringFlag(args, name);
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new CliUsageError(`--${name} must be a positive integer`);
  return n;
}

export function parseCliArgs(argv: readonly string[]): CliCommand {
  const args = minimist([...argv], {
    string: ['type', 'count', 'feed', 'format', 'output', 'voice', 'min-sources'],
    boolean: ['dry-run', 'help'],
    alias: { h: 'help' },
    unknown: (arg) => {
      if (arg.startsWith('-')) throw new CliUsageError(`Unknown option ${arg}`);
      return true;
    }
  });
  if (args.help === true) return { help: true };

  const count = intFlag(args, 'count');
  const feedMode = choiceFlag(args, 'feed', FEED_MODES);
  const formats = choiceFlag(args, 'format', FORMAT_SELECTIONS);
  const outputDir = stringFlag(args, 'output');
  const voice = stringFlag(args, 'voice');
  const minSources = intFlag(args, 'min-sources');
  return {
    help: false,
    options: {
      contentType: choiceFlag(args, 'type', CONTENT_TYPES) ?? 'daily',
      dryRun: args['dry-run'] === true,
      ...(count !== undefined ? { count } : {}),
      ...(feedMode ? { feedMode } : {}),
      ...(formats ? { formats } : {}),
      ...(outputDir ? { outputDir } : {}),
      ...(voice ? { voice } : {}),
      ...(minSources !== undefined ? { minSources } : {})
    }
  };
}
