import { type Dataset, DatasetLoadError } from '../types';
import { parseSalesWorkbook } from './dataProcessing';

/**
 * Where a dataset comes from. `version()` must change whenever the content
 * may have changed (modification time, size) so the cache can tell a stale
 * entry from a current one.
 */
export interface DataSource {
  /** Stable identity, such as an absolute path or an upload's file name */
  readonly id: string;
  /** Name shown to the user */
  readonly name: string;
  version(): string;
  read(): Promise<Uint8Array>;
}

interface CacheEntry {
  version: string;
  dataset: Promise<Dataset>;
}

/**
 * Process-scoped cache of cleaned datasets keyed by source identity and version.
 *
 * Concurrent first requests for the same source share one read; a failed load
 * is evicted so the next request reads again.
 */
export class DatasetCache {
  private entries = new Map<string, CacheEntry>();

  load(source: DataSource): Promise<Dataset> {
    let version: string;
    try {
      version = source.version();
    } catch (error) {
      return Promise.reject(toLoadError(source, error));
    }

    const cached = this.entries.get(source.id);
    if (cached && cached.version === version) {
      return cached.dataset;
    }

    const dataset = this.read(source);
    this.entries.set(source.id, { version, dataset });
    void dataset.catch(() => {
      if (this.entries.get(source.id)?.dataset === dataset) {
        this.entries.delete(source.id);
      }
    });
    return dataset;
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  /** Drops one source, or every source when called without an id */
  invalidate(id?: string): void {
    if (id === undefined) {
      this.entries.clear();
    } else {
      this.entries.delete(id);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  private async read(source: DataSource): Promise<Dataset> {
    let bytes: Uint8Array;
    try {
      bytes = await source.read();
    } catch (error) {
      throw toLoadError(source, error);
    }
    return parseSalesWorkbook(bytes, source.name);
  }
}

const toLoadError = (source: DataSource, error: unknown): DatasetLoadError => {
  if (error instanceof DatasetLoadError) return error;
  const reason = error instanceof Error ? error.message : String(error);
  return new DatasetLoadError('SOURCE_UNREADABLE', `Cannot open ${source.name}: ${reason}`);
};
