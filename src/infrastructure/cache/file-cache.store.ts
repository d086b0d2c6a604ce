import { promises as fs } from 'fs';
import path from 'path';
import { Clock, ICacheStore } from '../../domain/interfaces/services.interface';
import { Logger } from '../../shared/logger';

interface CacheEntry {
  timestamp: number;
  value: unknown;
}

/**
 * One JSON file per key under `directory`. Expiry is checked on read; nothing
 * sweeps old files.
 */
export class FileCacheStore implements ICacheStore {
  private readonly logger = new Logger(FileCacheStore.name);

  constructor(
    private readonly directory: string,
    private readonly ttlSeconds: number,
    private readonly clock: Clock = Date.now,
  ) {}

  public pathFor(key: string): string {
    const safe = key.replace(/[/:]/g, '_');
    return path.join(this.directory, `${safe}.json`);
  }

  async get(key: string): Promise<unknown> {
    let raw: string;
    try {
      raw = await fs.readFile(this.pathFor(key), 'utf-8');
    } catch {
      return null;
    }

    let entry: unknown;
    try {
      entry = JSON.parse(raw);
    } catch (error) {
      this.logger.warn(`Ignoring unreadable cache entry ${key}`, error);
      return null;
    }

    if (!isCacheEntry(entry)) return null;
    if (this.clock() - entry.timestamp > this.ttlSeconds * 1000) return null;
    return entry.value;
  }

  async set(key: string, value: unknown): Promise<void> {
    const entry: CacheEntry = { timestamp: this.clock(), value };
    await fs.mkdir(this.directory, { recursive: true });
    await fs.writeFile(this.pathFor(key), JSON.stringify(entry), 'utf-8');
  }
}

function isCacheEntry(value: unknown): value is CacheEntry {
  return (
    typeof value === 'object' &&
    value !== null &&
    'timestamp' in value &&
    'value' in value &&
    typeof value.timestamp === 'number'
  );
}
