import { randomBytes } from 'node:crypto';
import { link, mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

export type CacheStage = 'normalized' | 'section';

export interface StageKey {
  company: string;
  fiscalYear: number;
  stage: CacheStage;
}

/**
 * Stage output store. Entries are written once: `put` returns false when
 * another writer already stored the key, and the stored value is kept.
 */
export interface StageCache {
  get(key: StageKey): Promise<string | null>;
  put(key: StageKey, value: string): Promise<boolean>;
}

function sanitize(key: string): string {
  return key.replace(/[^a-zA-Z0-9_-]/g, '_');
}

export function stageCacheKey(key: StageKey): string {
  return sanitize(`${key.company.toUpperCase()}_${key.fiscalYear}_${key.stage}`);
}

function hasCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}

export class FileStageCache implements StageCache {
  constructor(private readonly dir: string) {}

  private pathFor(key: StageKey): string {
    return join(this.dir, `${stageCacheKey(key)}.json`);
  }

  async get(key: StageKey): Promise<string | null> {
    try {
      return await readFile(this.pathFor(key), 'utf-8');
    } catch (err) {
      if (hasCode(err, 'ENOENT')) return null;
      throw err;
    }
  }

  /** Writes a temp file and hard-links it into place, so readers never see a partial entry. */
  async put(key: StageKey, value: string): Promise<boolean> {
    await mkdir(this.dir, { recursive: true });
    const target = this.pathFor(key);
    const temp = join(this.dir, `.${stageCacheKey(key)}.${randomBytes(4).toString('hex')}.tmp`);

    await writeFile(temp, value, 'utf-8');
    try {
      await link(temp, target);
      return true;
    } catch (err) {
      if (hasCode(err, 'EEXIST')) return false;
      throw err;
    } finally {
      await rm(temp, { force: true });
    }
  }
}

export class MemoryStageCache implements StageCache {
  private readonly entries = new Map<string, string>();

  async get(key: StageKey): Promise<string | null> {
    return this.entries.get(stageCacheKey(key)) ?? null;
  }

  async put(key: StageKey, value: string): Promise<boolean> {
    const k = stageCacheKey(key);
    if (this.entries.has(k)) return false;
    this.entries.set(k, value);
    return true;
  }

  get size(): number {
    return this.entries.size;
  }
}
