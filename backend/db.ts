import { MongoClient, Db } from 'mongodb';
import type { ObjectId } from 'mongodb';
import { config } from './config';
import type { ContentType } from './news/types';

let client: MongoClient | null = null;
let db: Db | null = null;

export function isDbEnabled(): boolean {
  return config.mongodb.uri !== '';
}

export async function getDb(): Promise<Db> {
  if (db) return db;
  if (!isDbEnabled()) throw new Error('MONGODB_URI is not configured');
  client = new MongoClient(config.mongodb.uri);
  await client.connect();
  db = client.db(config.mongodb.dbName);
  await db.collection(RUNS_COLL).createIndex({ runId: 1 }, { unique: true });
  await db.collection(RUNS_COLL).createIndex({ contentType: 1, createdAt: -1 });
  return db;
}

export async function closeDb(): Promise<void> {
  if (client) {
    await client.close();
    client = null;
    db = null;
  }
}

export type RunStatus = 'running' | 'done' | 'no_breaking_news' | 'dry_run' | 'error';

export interface StageEntry {
  stage: string;
  status: string;
  at: string;
  detail?: string;
}

export interface RunOutput {
  format: string;
  video: string;
  title: string;
  /** R2 key when the artifact was uploaded */
  videoKey?: string;
  thumbnailKey?: string;
  subtitleKeys?: string[];
}

export interface RunDoc {
  _id?: ObjectId;
  runId: string;
  contentType: ContentType;
  status: RunStatus;
  currentStage?: string;
  stageHistory: StageEntry[];
  selectedTitles: string[];
  outputs: RunOutput[];
  summaryPath?: string;
  summaryKey?: string;
  errorMessage?: string;
  dryRun: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export const RUNS_COLL = 'runs';
