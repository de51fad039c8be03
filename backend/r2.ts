import { S3Client, PutObjectCommand, GetObjectCommand } from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import fs from 'fs';
import path from 'path';
import { config } from './config';

type R2Settings = {
  accountId: string;
  accessKeyId: string;
  secretAccessKey: string;
  bucketName: string;
};

function settings(): R2Settings | null {
  const { accountId, accessKeyId, secretAccessKey, bucketName } = config.r2;
  if (!accountId || !accessKeyId || !secretAccessKey || !bucketName) return null;
  return { accountId, accessKeyId, secretAccessKey, bucketName };
}

let client: S3Client | null = null;

function getClient(s: R2Settings): S3Client {
  if (!client) {
    client = new S3Client({
      region: 'auto',
      endpoint: `https://${s.accountId}.r2.cloudflarestorage.com`,
      credentials: { accessKeyId: s.accessKeyId, secretAccessKey: s.secretAccessKey }
    });
  }
  return client;
}

export function isR2Enabled(): boolean {
  return settings() !== null;
}

/** Key: runs/<contentType>/<runId>/<fileName> */
export function runKey(contentType: string, runId: string, localPath: string): string {
  return `runs/${contentType}/${runId}/${path.basename(localPath)}`;
}

const CONTENT_TYPES: Record<string, string> = {
  '.mp4': 'video/mp4',
  '.srt': 'application/x-subrip',
  '.json': 'application/json'
};

export async function uploadFile(key: string, localPath: string): Promise<{ key: string } | null> {
  const s = settings();
  if (!s) return null;
  await getClient(s).send(
    new PutObjectCommand({
      Bucket: s.bucketName,
      Key: key,
      Body: fs.createReadStream(localPath),
      ContentLength: fs.statSync(localPath).size,
      ContentType: CONTENT_TYPES[path.extname(localPath).toLowerCase()]
    })
  );
  return { key };
}

/** Presigned GET URL, default 1 hour. */
export async function getPresignedUrl(key: string, expiresIn = 3600): Promise<string | null> {
  const s = settings();
  if (!s) return null;
  const cmd = new GetObjectCommand({ Bucket: s.bucketName, Key: key });
  return getSignedUrl(getClient(s), cmd, { expiresIn });
}
