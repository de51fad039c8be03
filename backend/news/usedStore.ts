import path from 'path';
import { readJsonFile, withLock, writeJsonAtomic } from '../storage';
import type { ContentType } from './types';

/**
 * Article ids already turned into videos, one file per content type:
 * `{"used": [id, ...]}`, oldest first, capped to the newest `maxKeep`.
 */
export class UsedArticleStore {
  readonly contentType: ContentType;
  readonly filePath: string;
  private readonly maxKeep: number;

  constructor(dataDir: string, contentType: ContentType, maxKeep = 500) {
    this.contentType = contentType;
    this.filePath = path.join(dataDir, `used_news_${contentType}.json`);
    this.maxKeep = maxKeep;
  }

  private readIds(): string[] {
    const data = readJsonFile(this.filePath);
    if (!data || typeof data !== 'object' || !('used' in data) || !Array.isArray(data.used)) return [];
    return data.used.filter((id: unknown): id is string => typeof id === 'string');
  }

  load(): Set<string> {
    return new Set(this.readIds());
  }

  has(id: string): boolean {
    return this.load().has(id);
  }

  /**
   * Append ids (re-reading the file under the lock so a concurrent run's
   * commit is not lost) and drop the oldest beyond the cap.
   */
  async commit(ids: readonly string[]): Promise<void> {
    if (ids.length === 0) return;
    await withLock(`${this.filePath}.lock`, () => {
      const current = this.readIds();
      const seen = new Set(current);
      for (const id of ids) {
        if (seen.has(id)) continue;
        seen.add(id);
        current.push(id);
      }
      writeJsonAtomic(this.filePath, { used: current.slice(-this.maxKeep) });
    });
  }
}
