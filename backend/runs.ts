import { nanoid } from 'nanoid';
import { getDb, isDbEnabled, RUNS_COLL } from './db';
import type { RunDoc, RunOutput, StageEntry } from './db';
import { errorMessage } from './errors';
import { logger } from './logger';
import { getPresignedUrl, isR2Enabled, runKey, uploadFile } from './r2';
import type { ContentType } from './news/types';

export function newRunId(): string {
  return nanoid(12);
}

export type RunUpdate = Partial<
  Pick<RunDoc, 'status' | 'selectedTitles' | 'outputs' | 'summaryPath' | 'summaryKey' | 'errorMessage'>
>;

/** Where a run's stage history goes. */
export interface RunRecorder {
  start(runId: string, contentType: ContentType, dryRun: boolean): Promise<void>;
  stage(runId: string, stage: string, status: string, detail?: string): Promise<void>;
  update(runId: string, update: RunUpdate): Promise<void>;
}

export class MongoRunRecorder implements RunRecorder {
  async start(runId: string, contentType: ContentType, dryRun: boolean): Promise<void> {
    const db = await getDb();
    const now = new Date();
    const doc: RunDoc = {
      runId,
      contentType,
      status: 'running',
      stageHistory: [],
      selectedTitles: [],
      outputs: [],
      dryRun,
      createdAt: now,
      updatedAt: now
    };
    await db.collection<RunDoc>(RUNS_COLL).insertOne(doc);
  }

  async stage(runId: string, stage: string, status: string, detail?: string): Promise<void> {
    const db = await getDb();
    const entry: StageEntry = { stage, status, at: new Date().toISOString(), ...(detail ? { detail } : {}) };
    await db.collection<RunDoc>(RUNS_COLL).updateOne(
      { runId },
      {
        $push: { stageHistory: entry },
        $set: { currentStage: stage, updatedAt: new Date() }
      }
    );
  }

  async update(runId: string, update: RunUpdate): Promise<void> {
    const db = await getDb();
    await db.collection<RunDoc>(RUNS_COLL).updateOne({ runId }, { $set: { ...update, updatedAt: new Date() } });
  }
}

/** Without MongoDB the history lives in the log only. */
export class LogRunRecorder implements RunRecorder {
  async start(runId: string, contentType: ContentType, dryRun: boolean): Promise<void> {
    logger.info('Run started', { runId, contentType, dryRun });
  }

  async stage(runId: string, stage: string, status: string, detail?: string): Promise<void> {
    logger.info(`Stage ${stage}: ${status}`, detail ? { runId, detail } : { runId });
  }

  async update(runId: string, update: RunUpdate): Promise<void> {
    if (update.status) logger.info(`Run ${update.status}`, { runId });
  }
}

export function createRunRecorder(): RunRecorder {
  return isDbEnabled() ? new MongoRunRecorder() : new LogRunRecorder();
}

/**
 * History writes never decide the outcome of a run: a failed write is
 * logged and the pipeline carries on.
 */
export function safeRecorder(inner: RunRecorder): RunRecorder {
  const guard = async (what: string, fn: () => Promise<void>) => {
    try {
      await fn();
    } catch (err) {
      logger.warn(`Run history ${what} failed`, { error: errorMessage(err) });
    }
  };
  return {
    start: (runId, contentType, dryRun) => guard('start', () => inner.start(runId, contentType, dryRun)),
    stage: (runId, stage, status, detail) => guard('stage', () => inner.stage(runId, stage, status, detail)),
    update: (runId, update) => guard('update', () => inner.update(runId, update))
  };
}

export async function listRuns(contentType?: ContentType, limit = 50): Promise<RunDoc[]> {
  const db = await getDb();
  return db
    .collection<RunDoc>(RUNS_COLL)
    .find(contentType ? { contentType } : {})
    .sort({ createdAt: -1 })
    .limit(Math.max(1, Math.min(200, limit)))
    .toArray();
}

export async function getRun(runId: string): Promise<RunDoc | null> {
  const db = await getDb();
  return db.collection<RunDoc>(RUNS_COLL).findOne({ runId });
}

/** Upload artifacts when R2 is configured; returns local path -> key. */
export async function uploadRunArtifacts(
  contentType: ContentType,
  runId: string,
  files: readonly string[]
): Promise<Map<string, string>> {
  const keys = new Map<string, string>();
  if (!isR2Enabled()) return keys;
  for (const file of files) {
    const result = await uploadFile(runKey(contentType, runId, file), file);
    if (result) keys.set(file, result.key);
  }
  logger.info('Uploaded run artifacts', { runId, files: keys.size });
  return keys;
}

export async function withPresignedUrls(outputs: readonly RunOutput[]): Promise<Array<RunOutput & { url: string | null }>> {
  return Promise.all(
    outputs.map(async (o) => ({ ...o, url: o.videoKey ? await getPresignedUrl(o.videoKey) : null }))
  );
}
