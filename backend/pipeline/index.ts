import fs from 'fs';
import path from 'path';
import { FORMATS, OPENING_SECONDS, formatsFor, paddingAsset } from './formats';
import type { FormatSelection, FormatSpec } from './formats';
import { illustrateStories } from './storyboard';
import { generateImage, writeImagePrompts, writeThumbnailPrompt } from '../ai/images';
import type { ImageGenerator, PromptWriter, ThumbnailPromptWriter } from '../ai/images';
import { buildNarration, writeStoryNarration } from '../ai/narration';
import type { StoryWriter } from '../ai/narration';
import { mergeSpeech, speechFromConfig, synthesizeSegments } from '../ai/speech';
import type { SpeechSynthesizer } from '../ai/speech';
import { translateLines } from '../ai/translate';
import { verifyBreakingGroup } from '../ai/verify';
import { config } from '../config';
import type { RunOutput } from '../db';
import { PipelineError, errorMessage } from '../errors';
import { logger } from '../logger';
import { buildDescription, buildTags, runTimestamp, uploadTitle, writeSummary } from '../metadata';
import type { FormatOutput, RunSummary, VideoFormat } from '../metadata';
import { scanForBreakingNews } from '../news/breaking';
import type { BreakingVerifier } from '../news/breaking';
import { BreakingQuotaStore } from '../news/breakingState';
import { NewsDataFeedSource, RssFeedSource, newsDataFeeds, rssFeeds } from '../news/feeds';
import { selectDailyArticles, selectWeeklyArticles } from '../news/selection';
import type { RandomFn } from '../news/selection';
import type { Article, BreakingCandidate, ContentType, FeedDescriptor, FeedMode, FeedSource } from '../news/types';
import { UsedArticleStore } from '../news/usedStore';
import { createRunRecorder, newRunId, safeRecorder, uploadRunArtifacts } from '../runs';
import type { RunRecorder } from '../runs';
import { withLock } from '../storage';
import { buildEditScript } from '../video/editScript';
import type { EditScript } from '../video/editScript';
import { probeDurationSeconds, renderEditScript } from '../video/ffmpeg';
import type { RenderOptions } from '../video/ffmpeg';
import { ALL_SUBTITLE_LANGUAGES, buildCues, writeSubtitleTracks } from '../video/subtitles';
import type { CueTranslator, SubtitleLanguage } from '../video/subtitles';
import { overlayThumbnail, thumbnailCaptions } from '../video/thumbnail';
import type { ThumbnailOverlay } from '../video/thumbnail';

export const DEFAULT_COUNTS: Record<ContentType, number> = { daily: 6, weekly: 16, breaking: 1 };

/** Extra candidates held back to replace stories that cannot be illustrated */
const RESERVE_COUNT = 3;

/** Long enough for a concurrent run of the same type to finish selecting */
const SELECTION_LOCK_MS = 10 * 60_000;

export type PipelineOptions = {
  contentType: ContentType;
  count?: number;
  feedMode?: FeedMode;
  formats?: FormatSelection;
  outputDir?: string;
  dataDir?: string;
  assetsDir?: string;
  voice?: string;
  minSources?: number;
  maxPerDay?: number;
  dryRun?: boolean;
  runId?: string;
  now?: Date;
  subtitleLanguages?: readonly SubtitleLanguage[];
  /** Track burned into the picture; the others stay sidecar files */
  burnSubtitles?: SubtitleLanguage;
};

export type FeedPlan = {
  source: FeedSource;
  feeds: FeedDescriptor[];
};

/** Every collaborator that leaves the process, swappable in tests. */
export type PipelineDeps = {
  feedsFor: (contentType: ContentType) => FeedPlan;
  writeStory: StoryWriter;
  writePrompts: PromptWriter;
  generateImage: ImageGenerator;
  synthesize: SpeechSynthesizer;
  measure: (audioPath: string) => Promise<number>;
  mergeAudio: (audioFiles: readonly string[], outputPath: string) => Promise<string>;
  render: (script: EditScript, opts: RenderOptions) => Promise<string>;
  writeThumbnailPrompt: ThumbnailPromptWriter;
  overlayThumbnail: ThumbnailOverlay;
  translate?: CueTranslator;
  verify?: BreakingVerifier;
  recorder: RunRecorder;
  upload: (contentType: ContentType, runId: string, files: readonly string[]) => Promise<Map<string, string>>;
  random: RandomFn;
};

export type PipelineStatus = 'done' | 'no_breaking_news' | 'dry_run';

export type PipelineResult = {
  status: PipelineStatus;
  runId: string;
  contentType: ContentType;
  articles: Article[];
  breaking?: BreakingCandidate;
  outputs: FormatOutput[];
  summaryPath?: string;
};

/** Breaking scans always read the RSS feeds; digests follow `feedMode`. */
export function feedPlan(contentType: ContentType, feedMode: FeedMode): FeedPlan {
  if (contentType !== 'breaking' && feedMode === 'api') {
    const hours = contentType === 'weekly' ? 168 : 24;
    return {
      source: new NewsDataFeedSource(config.newsdata.apiKey),
      feeds: newsDataFeeds(config.newsdata.baseUrl, hours)
    };
  }
  return { source: new RssFeedSource(config.selection.itemsPerFeed), feeds: rssFeeds() };
}

function configuredBurnLanguage(): SubtitleLanguage | undefined {
  return ALL_SUBTITLE_LANGUAGES.find((lang) => lang === config.burnSubtitles);
}

export function defaultDeps(options: Pick<PipelineOptions, 'feedMode' | 'voice'>): PipelineDeps {
  return {
    feedsFor: (contentType) => feedPlan(contentType, options.feedMode ?? 'rss'),
    writeStory: writeStoryNarration,
    writePrompts: writeImagePrompts,
    generateImage,
    synthesize: speechFromConfig(options.voice),
    measure: probeDurationSeconds,
    mergeAudio: mergeSpeech,
    render: renderEditScript,
    writeThumbnailPrompt,
    overlayThumbnail,
    translate: translateLines,
    verify: config.breaking.verify ? verifyBreakingGroup : undefined,
    recorder: createRunRecorder(),
    upload: uploadRunArtifacts,
    random: Math.random
  };
}

type RunContext = {
  runId: string;
  contentType: ContentType;
  now: Date;
  timestamp: string;
  outputDir: string;
  dataDir: string;
  assetsDir: string;
  workDir: string;
  dryRun: boolean;
  options: PipelineOptions;
  deps: PipelineDeps;
  recorder: RunRecorder;
  step: number;
};

async function stage<T>(ctx: RunContext, name: string, fn: () => Promise<T>): Promise<T> {
  ctx.step += 1;
  logger.step(ctx.step, name.toUpperCase());
  await ctx.recorder.stage(ctx.runId, name, 'started');
  try {
    const result = await fn();
    await ctx.recorder.stage(ctx.runId, name, 'done');
    return result;
  } catch (err) {
    await ctx.recorder.stage(ctx.runId, name, 'error', errorMessage(err));
    throw err;
  }
}

function usedStore(ctx: RunContext, contentType: ContentType): UsedArticleStore {
  return new UsedArticleStore(ctx.dataDir, contentType, config.selection.usedSetMax);
}

type ProduceInput = {
  format: VideoFormat;
  stories: Article[];
  reserves: Article[];
  store: UsedArticleStore;
  candidate?: BreakingCandidate;
};

/**
 * Background from the image model with the run's date drawn over it. A
 * failure is logged and the format ships without a thumbnail.
 */
async function produceThumbnail(ctx: RunContext, fmt: FormatSpec, stories: readonly Article[]): Promise<string | undefined> {
  const { deps } = ctx;
  try {
    return await stage(ctx, `thumbnail (${fmt.format})`, async () => {
      const prompt = await deps.writeThumbnailPrompt(stories, fmt.orientation);
      const background = path.join(ctx.workDir, `${ctx.timestamp}_${fmt.format}_thumbnail_bg.png`);
      await deps.generateImage(prompt, background, fmt.orientation);
      return deps.overlayThumbnail(background, thumbnailCaptions(ctx.contentType, fmt.orientation, ctx.now, config.timezone), {
        outputPath: path.join(ctx.outputDir, `${ctx.timestamp}_${fmt.label}_thumbnail.png`),
        orientation: fmt.orientation,
        workDir: ctx.workDir,
        fontFile: config.thumbnailFont || undefined
      });
    });
  } catch (err) {
    logger.warn('Thumbnail failed, continuing without one', { format: fmt.format, error: errorMessage(err) });
    return undefined;
  }
}

/** Images, narration, speech, edit script, subtitles, render, thumbnail and metadata for one format. */
async function produceFormat(ctx: RunContext, input: ProduceInput): Promise<FormatOutput> {
  const fmt = FORMATS[input.format];
  const prefix = `${ctx.timestamp}_${fmt.format}`;
  const { deps } = ctx;

  const board = await stage(ctx, `images (${fmt.format})`, () =>
    illustrateStories({
      stories: input.stories,
      reserves: input.reserves,
      targetCount: input.stories.length,
      imagesPerStory: fmt.imagesPerStory,
      orientation: fmt.orientation,
      workDir: ctx.workDir,
      prefix,
      writePrompts: deps.writePrompts,
      generate: deps.generateImage
    })
  );
  if (board.stories.length === 0) {
    throw new PipelineError(`No story could be illustrated for ${fmt.format}`);
  }
  await input.store.commit(board.usedReserves.map((a) => a.id));

  const related = new Map<number, Article[]>();
  if (input.candidate) {
    const lead = input.candidate.representative;
    related.set(0, input.candidate.members.filter((m) => m.id !== lead.id));
  }

  const narration = await stage(ctx, `narration (${fmt.format})`, () =>
    buildNarration(board.stories, {
      style: fmt.style,
      now: ctx.now,
      timeZone: config.timezone,
      writeStory: deps.writeStory,
      related
    })
  );

  const speech = await stage(ctx, `speech (${fmt.format})`, async () => {
    const synthesized = await synthesizeSegments(narration, {
      workDir: ctx.workDir,
      prefix,
      synthesize: deps.synthesize,
      measure: deps.measure
    });
    const audioPath = await deps.mergeAudio(synthesized.audioFiles, path.join(ctx.workDir, `${prefix}_narration.mp3`));
    return { segments: synthesized.segments, audioPath };
  });

  const script = buildEditScript(speech.segments, board.imagePool, {
    audioPath: speech.audioPath,
    opening: paddingAsset(ctx.assetsDir, fmt.openingImage, OPENING_SECONDS),
    ending: paddingAsset(ctx.assetsDir, fmt.endingImage, fmt.endingSeconds)
  });
  for (const skip of script.skipped) {
    logger.warn('Segment has no picture', { type: skip.type, seconds: Number(skip.durationSeconds.toFixed(2)), reason: skip.reason });
  }

  const subtitles = await stage(ctx, `subtitles (${fmt.format})`, () =>
    writeSubtitleTracks(buildCues(speech.segments, script.audioOffsetSeconds), {
      outputDir: ctx.outputDir,
      prefix: `${ctx.timestamp}_${fmt.label}`,
      languages: ctx.options.subtitleLanguages,
      translate: deps.translate
    })
  );

  const burnLanguage = ctx.options.burnSubtitles ?? configuredBurnLanguage();
  const video = await stage(ctx, `render (${fmt.format})`, () =>
    deps.render(script, {
      outputPath: path.join(ctx.outputDir, `${ctx.timestamp}_${fmt.label}.mp4`),
      orientation: fmt.orientation,
      workDir: ctx.workDir,
      subtitlePath: burnLanguage ? subtitles[burnLanguage] : undefined
    })
  );

  const thumbnail = await produceThumbnail(ctx, fmt, board.stories);

  const lead = board.stories[0];
  const subtitleFiles: Record<string, string> = {};
  for (const [lang, file] of Object.entries(subtitles)) {
    if (file) subtitleFiles[lang] = file;
  }
  return {
    format: fmt.format,
    video,
    ...(thumbnail ? { thumbnail } : {}),
    subtitles: subtitleFiles,
    title: uploadTitle(fmt.format, ctx.now, config.timezone, lead),
    description: buildDescription(board.stories, fmt.format, input.candidate),
    tags: buildTags(board.stories, fmt.format),
    stories: board.stories.map((a) => a.title),
    skippedSegments: script.skipped.length
  };
}

async function finishRun(
  ctx: RunContext,
  articles: Article[],
  outputs: FormatOutput[],
  candidate?: BreakingCandidate
): Promise<PipelineResult> {
  const summary: RunSummary = {
    runId: ctx.runId,
    timestamp: ctx.timestamp,
    contentType: ctx.contentType,
    newsCount: articles.length,
    news: articles,
    outputs,
    ...(candidate
      ? {
          breaking: {
            title: candidate.representative.title,
            sources: candidate.distinctSources,
            detectedAt: candidate.detectedAt
          }
        }
      : {})
  };
  const summaryPath = writeSummary(ctx.outputDir, summary);

  const files = [
    ...outputs.flatMap((o) => [o.video, ...(o.thumbnail ? [o.thumbnail] : []), ...Object.values(o.subtitles)]),
    summaryPath
  ];
  const keys = await stage(ctx, 'upload', () => ctx.deps.upload(ctx.contentType, ctx.runId, files));
  const runOutputs: RunOutput[] = outputs.map((o) => {
    const videoKey = keys.get(o.video);
    const thumbnailKey = o.thumbnail ? keys.get(o.thumbnail) : undefined;
    const subtitleKeys = Object.values(o.subtitles)
      .map((file) => keys.get(file))
      .filter((key): key is string => key !== undefined);
    return {
      format: o.format,
      video: o.video,
      title: o.title,
      ...(videoKey ? { videoKey } : {}),
      ...(thumbnailKey ? { thumbnailKey } : {}),
      ...(subtitleKeys.length > 0 ? { subtitleKeys } : {})
    };
  });
  const summaryKey = keys.get(summaryPath);
  await ctx.recorder.update(ctx.runId, { outputs: runOutputs, summaryPath, ...(summaryKey ? { summaryKey } : {}) });

  fs.rmSync(ctx.workDir, { recursive: true, force: true });
  for (const o of outputs) {
    logger.info(`${o.format} ready`, { video: o.video, title: o.title });
  }
  return {
    status: 'done',
    runId: ctx.runId,
    contentType: ctx.contentType,
    articles,
    outputs,
    summaryPath,
    ...(candidate ? { breaking: candidate } : {})
  };
}

async function runDigest(ctx: RunContext): Promise<PipelineResult> {
  const { contentType, deps } = ctx;
  const count = ctx.options.count ?? DEFAULT_COUNTS[contentType];
  const store = usedStore(ctx, contentType);

  const selection = await stage(ctx, 'selection', () => {
    const plan = deps.feedsFor(contentType);
    const select = contentType === 'weekly' ? selectWeeklyArticles : selectDailyArticles;
    return withLock(
      path.join(ctx.dataDir, `pipeline_${contentType}.lock`),
      () =>
        select({
          count,
          source: plan.source,
          feeds: plan.feeds,
          usedStore: store,
          random: deps.random,
          reserveCount: RESERVE_COUNT,
          concurrency: config.selection.feedConcurrency,
          persist: !ctx.dryRun
        }),
      { timeoutMs: SELECTION_LOCK_MS }
    );
  });
  await ctx.recorder.update(ctx.runId, { selectedTitles: selection.articles.map((a) => a.title) });

  if (ctx.dryRun) {
    logger.info('Dry run: stopping after selection', { selected: selection.articles.length });
    return { status: 'dry_run', runId: ctx.runId, contentType, articles: selection.articles, outputs: [] };
  }
  if (selection.articles.length === 0) {
    throw new PipelineError('Selection returned no articles');
  }

  const outputs: FormatOutput[] = [];
  for (const format of formatsFor(contentType, ctx.options.formats)) {
    outputs.push(
      await produceFormat(ctx, { format, stories: selection.articles, reserves: selection.reserves, store })
    );
  }
  return finishRun(ctx, selection.articles, outputs);
}

async function runBreaking(ctx: RunContext): Promise<PipelineResult> {
  const { deps } = ctx;
  const store = usedStore(ctx, 'breaking');

  const candidate = await stage(ctx, 'detection', () => {
    const plan = deps.feedsFor('breaking');
    return scanForBreakingNews({
      minSources: ctx.options.minSources ?? config.breaking.minSources,
      maxPerDay: ctx.options.maxPerDay ?? config.breaking.maxPerDay,
      source: plan.source,
      feeds: plan.feeds,
      usedStore: store,
      quotaStore: new BreakingQuotaStore(ctx.dataDir, config.timezone),
      now: ctx.now,
      verify: deps.verify,
      concurrency: config.selection.feedConcurrency,
      persist: !ctx.dryRun
    });
  });

  if (!candidate) {
    return { status: 'no_breaking_news', runId: ctx.runId, contentType: 'breaking', articles: [], outputs: [] };
  }
  const articles = [candidate.representative];
  await ctx.recorder.update(ctx.runId, { selectedTitles: articles.map((a) => a.title) });

  if (ctx.dryRun) {
    logger.info('Dry run: stopping after detection', { title: candidate.representative.title });
    return { status: 'dry_run', runId: ctx.runId, contentType: 'breaking', articles, breaking: candidate, outputs: [] };
  }

  const output = await produceFormat(ctx, { format: 'breaking', stories: articles, reserves: [], store, candidate });
  return finishRun(ctx, articles, [output], candidate);
}

/**
 * One pipeline run. Daily and weekly runs select a story set and render it in
 * each requested format; a breaking run scans first and renders a single-story
 * vertical video only when a corroborated story is found.
 */
export async function runNewsPipeline(
  options: PipelineOptions,
  deps: PipelineDeps = defaultDeps(options)
): Promise<PipelineResult> {
  const now = options.now ?? new Date();
  const timestamp = runTimestamp(now, config.timezone);
  const outputDir = path.resolve(options.outputDir ?? config.outputDir);
  const ctx: RunContext = {
    runId: options.runId ?? newRunId(),
    contentType: options.contentType,
    now,
    timestamp,
    outputDir,
    dataDir: path.resolve(options.dataDir ?? config.dataDir),
    assetsDir: path.resolve(options.assetsDir ?? config.assetsDir),
    workDir: path.join(outputDir, 'temp', timestamp),
    dryRun: options.dryRun === true,
    options,
    deps,
    recorder: safeRecorder(deps.recorder),
    step: 0
  };

  logger.info(`Starting ${ctx.contentType} run`, { runId: ctx.runId, dryRun: ctx.dryRun, timestamp });
  await ctx.recorder.start(ctx.runId, ctx.contentType, ctx.dryRun);
  try {
    const result = ctx.contentType === 'breaking' ? await runBreaking(ctx) : await runDigest(ctx);
    await ctx.recorder.update(ctx.runId, { status: result.status });
    logger.info(`Run finished: ${result.status}`, { runId: ctx.runId, outputs: result.outputs.length });
    return result;
  } catch (err) {
    await ctx.recorder.update(ctx.runId, { status: 'error', errorMessage: errorMessage(err) });
    throw err;
  }
}
