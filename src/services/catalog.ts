/**
 * Component Catalog Service
 * Reads the component library through the store with a deadline and a TTL cache
 */

import { ComponentCatalogEntry } from '../types';
import { CatalogUnavailableError, isEstimatorError, NotFoundError } from '../errors';
import { EstimatorStore, CatalogFilter } from './store';
import { withTimeout } from './io';

export interface CatalogServiceOptions {
  timeoutMs: number;
  cacheTtlMs: number;
}

interface CacheEntry {
  entries: ComponentCatalogEntry[];
  loadedAt: number;
}

export class CatalogService {
  private cache = new Map<string, CacheEntry>();

  constructor(
    private readonly store: EstimatorStore,
    private readonly options: CatalogServiceOptions
  ) {}

  async listEntries(filter: CatalogFilter = {}, signal?: AbortSignal): Promise<ComponentCatalogEntry[]> {
    const key = `${filter.itclass?.toUpperCase() ?? '*'}|${filter.search?.toLowerCase() ?? ''}|${filter.activeOnly ?? true}`;
    const cached = this.cache.get(key);
    if (cached && (Date.now() - cached.loadedAt) < this.options.cacheTtlMs) {
      return cached.entries;
    }

    const entries = await this.read('listEntries', s => this.store.listCatalogEntries(filter, { signal: s }), signal);
    if (this.options.cacheTtlMs > 0) {
      this.cache.set(key, { entries, loadedAt: Date.now() });
    }
    console.log(`✅ Loaded ${entries.length} catalog entries (class=${filter.itclass ?? 'any'})`);
    return entries;
  }

  async getEntry(componentId: string, signal?: AbortSignal): Promise<ComponentCatalogEntry> {
    const entry = await this.read('getEntry', s => this.store.getCatalogEntry(componentId, { signal: s }), signal);
    if (!entry) {
      throw new NotFoundError('component', componentId);
    }
    return entry;
  }

  clearCache(): void {
    this.cache.clear();
  }

  private async read<T>(
    operation: string,
    work: (signal: AbortSignal) => Promise<T>,
    signal?: AbortSignal
  ): Promise<T> {
    try {
      return await withTimeout(
        work,
        this.options.timeoutMs,
        () => new CatalogUnavailableError(`${operation} timed out after ${this.options.timeoutMs}ms`),
        signal
      );
    } catch (err) {
      if (err instanceof CatalogUnavailableError) throw err;
      if (isEstimatorError(err) && err.code !== 'STORE_UNAVAILABLE') throw err;

      const detail = err instanceof Error ? err.message : String(err);
      console.error(`❌ Catalog read failed (${operation}):`, detail);
      throw new CatalogUnavailableError(detail);
    }
  }
}
