import { Router, Request, Response, NextFunction } from 'express';
import path from 'path';
import { runNewsPipeline } from '../pipeline/index';
import type { PipelineOptions, PipelineResult, PipelineStatus } from '../pipeline/index';
import type { FormatSelection } from '../pipeline/formats';
import { isDbEnabled } from '../db';
import { errorMessage } from '../errors';
import { logger } from '../logger';
import { HttpError } from '../middleware';
import type { ContentType, FeedMode } from '../news/types';
import { getRun, newRunId, withPresignedUrls } from '../runs';

type JobStatus = 'running' | PipelineStatus | 'error';

type Job = {
  id: string;
  status: JobStatus;
  contentType: ContentType;
  dryRun: boolean;
  startedAt: string;
  finishedAt?: string;
  errorMessage?: string;
  result?: PipelineResult;
};

export type JobRequest = Pick<
  PipelineOptions,
  'contentType' | 'count' | 'feedMode' | 'formats' | 'voice' | 'minSources' | 'dryRun'
>;

const CONTENT_TYPES: readonly ContentType[] = ['daily', 'weekly', 'breaking'];
const FEED_MODES: readonly FeedMode[] = ['rss', 'api'];
const FORMAT_SELECTIONS: readonly FormatSelection[] = ['shorts', 'video', 'both'];
const MAX_COUNT = 30;

const jobs = new Map<string, Job>();

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function oneOf<T extends string>(value: unknown, allowed: readonly T[], field: string): T | undefined {
  if (value === undefined) return undefined;
  const match = allowed.find((a) => a === value);
  if (!match) throw new HttpError(400, `${field} must be one of ${allowed.join(', ')}`);
  return match;
}

function positiveInt(value: unknown, field: string, max: number): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1 || value > max) {
    throw new HttpError(400, `${field} must be an integer between 1 and ${max}`);
  }
  return value;
}

/** Validate a POST /api/jobs body into pipeline options. */
export function parseJobRequest(body: unknown): JobRequest {
  const input = isRecord(body) ? body : {};
  const contentType = oneOf(input.type, CONTENT_TYPES, 'type') ?? 'daily';
  const count = positiveInt(input.count, 'count', MAX_COUNT);
  const feedMode = oneOf(input.feed, FEED_MODES, 'feed');
  const formats = oneOf(input.format, FORMAT_SELECTIONS, 'format');
  const minSources = positiveInt(input.minSources, 'minSources', 20);
  const voice = typeof input.voice === 'string' && input.voice.trim() ? input.voice.trim() : undefined;
  return {
    contentType,
    dryRun: input.dryRun === true,
    ...(count !== undefined ? { count } : {}),
    ...(feedMode ? { feedMode } : {}),
    ...(formats ? { formats } : {}),
    ...(minSources !== undefined ? { minSources } : {}),
    ...(voice ? { voice } : {})
  };
}

function startJob(request: JobRequest): Job {
  const id = newRunId();
  const job: Job = {
    id,
    status: 'running',
    contentType: request.contentType,
    dryRun: request.dryRun === true,
    startedAt: new Date().toISOString()
  };
  jobs.set(id, job);

  runNewsPipeline({ ...request, runId: id })
    .then((result) => {
      job.status = result.status;
      job.result = result;
      job.finishedAt = new Date().toISOString();
    })
    .catch((err: unknown) => {
      job.status = 'error';
      job.errorMessage = errorMessage(err);
      job.finishedAt = new Date().toISOString();
      logger.error('Job failed', err, { jobId: id });
    });

  return job;
}

function mediaUrl(filePath: string): string {
  return `/media/${path.basename(filePath)}`;
}

function jobView(job: Job) {
  const result = job.result;
  return {
    id: job.id,
    status: job.status,
    contentType: job.contentType,
    dryRun: job.dryRun,
    startedAt: job.startedAt,
    finishedAt: job.finishedAt,
    errorMessage: job.errorMessage,
    stories: result?.articles.map((a) => a.title) ?? [],
    breaking: result?.breaking
      ? { title: result.breaking.representative.title, sources: result.breaking.distinctSources }
      : null,
    outputs: (result?.outputs ?? []).map((o) => ({
      format: o.format,
      title: o.title,
      mediaUrl: mediaUrl(o.video),
      thumbnailUrl: o.thumbnail ? mediaUrl(o.thumbnail) : null,
      subtitles: Object.fromEntries(Object.entries(o.subtitles).map(([lang, file]) => [lang, mediaUrl(file)]))
    })),
    summaryUrl: result?.summaryPath ? mediaUrl(result.summaryPath) : null
  };
}

const router = Router();

router.post('/', (req: Request, res: Response, next: NextFunction) => {
  try {
    const job = startJob(parseJobRequest(req.body));
    res.status(202).json({ jobId: job.id, status: job.status, contentType: job.contentType });
  } catch (err) {
    next(err);
  }
});

router.get('/', (_req: Request, res: Response) => {
  const list = Array.from(jobs.values())
    .sort((a, b) => (a.startedAt < b.startedAt ? 1 : -1))
    .slice(0, 20)
    .map((j) => ({
      id: j.id,
      status: j.status,
      contentType: j.contentType,
      startedAt: j.startedAt,
      finishedAt: j.finishedAt
    }));
  res.json(list);
});

router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
  const job = jobs.get(req.params.id);
  if (job) {
    res.json(jobView(job));
    return;
  }
  // Jobs from earlier processes live only in the run history
  if (!isDbEnabled()) {
    res.status(404).json({ error: 'Job not found' });
    return;
  }
  try {
    const run = await getRun(req.params.id);
    if (!run) {
      res.status(404).json({ error: 'Job not found' });
      return;
    }
    res.json({ ...run, outputs: await withPresignedUrls(run.outputs) });
  } catch (err) {
    next(err);
  }
});

export default router;
