/**
 * Catalog service and store tests
 */

import { createClient } from '@supabase/supabase-js';
import { CatalogService } from '../../src/services/catalog';
import { MemoryStore } from '../../src/services/memory-store';
import { mapStoreError, SupabaseStore } from '../../src/services/supabase-store';
import {
  CatalogUnavailableError,
  ConcurrencyConflictError,
  NotFoundError,
  StoreUnavailableError
} from '../../src/errors';
import { CatalogQuerySchema } from '../../src/schemas/requests';
import { TEST_CATALOG } from '../fixtures/estimator';

describe('CatalogService', () => {
  let store: MemoryStore;

  beforeEach(() => {
    store = new MemoryStore(TEST_CATALOG);
  });

  it('should list active entries sorted by name', async () => {
    const catalog = new CatalogService(store, { timeoutMs: 1000, cacheTtlMs: 0 });
    const entries = await catalog.listEntries();

    expect(entries.map(e => e.itemname)).toEqual(['100A MCCB', '20A Breaker', '25A Contactor', '32A Breaker']);
  });

  it('should filter by class case-insensitively', async () => {
    const catalog = new CatalogService(store, { timeoutMs: 1000, cacheTtlMs: 0 });
    const entries = await catalog.listEntries({ itclass: 'mcb' });

    expect(entries.map(e => e.component_id)).toEqual(['cmp-mcb-20a', 'cmp-mcb-32a']);
  });

  it('should search name, manufacturer and model number', async () => {
    const catalog = new CatalogService(store, { timeoutMs: 1000, cacheTtlMs: 0 });

    const byManufacturer = await catalog.listEntries({ search: 'ACME' });
    expect(byManufacturer.map(e => e.component_id)).toEqual(['cmp-mcb-20a', 'cmp-mcb-32a']);

    const byModel = await catalog.listEntries({ search: 'mcb-20' });
    expect(byModel.map(e => e.component_id)).toEqual(['cmp-mcb-20a']);
  });

  it('should include inactive entries when asked', async () => {
    const catalog = new CatalogService(store, { timeoutMs: 1000, cacheTtlMs: 60000 });

    const active = await catalog.listEntries({ search: 'breaker' });
    const all = await catalog.listEntries({ search: 'breaker', activeOnly: false });

    expect(active.map(e => e.component_id)).toEqual(['cmp-mcb-20a', 'cmp-mcb-32a']);
    expect(all.map(e => e.component_id)).toEqual(['cmp-mcb-20a', 'cmp-old-breaker', 'cmp-mcb-32a']);
  });

  it('should parse the listing query', () => {
    expect(CatalogQuerySchema.parse({})).toEqual({ include_inactive: false });
    expect(CatalogQuerySchema.parse({ itclass: 'MCB', q: ' acme ', include_inactive: 'true' }))
      .toEqual({ itclass: 'MCB', q: 'acme', include_inactive: true });
  });

  it('should serve repeat listings from the cache', async () => {
    const catalog = new CatalogService(store, { timeoutMs: 1000, cacheTtlMs: 60000 });
    const spy = jest.spyOn(store, 'listCatalogEntries');

    await catalog.listEntries();
    await catalog.listEntries();
    expect(spy).toHaveBeenCalledTimes(1);

    catalog.clearCache();
    await catalog.listEntries();
    expect(spy).toHaveBeenCalledTimes(2);
  });

  it('should raise NotFoundError for an unknown component', async () => {
    const catalog = new CatalogService(store, { timeoutMs: 1000, cacheTtlMs: 0 });
    await expect(catalog.getEntry('cmp-missing')).rejects.toThrow(NotFoundError);
  });

  it('should report a failing store as CatalogUnavailableError', async () => {
    const catalog = new CatalogService(store, { timeoutMs: 1000, cacheTtlMs: 0 });
    jest.spyOn(store, 'listCatalogEntries').mockRejectedValue(new Error('connection reset'));

    await expect(catalog.listEntries()).rejects.toThrow(CatalogUnavailableError);
  });

  it('should report a slow store as CatalogUnavailableError', async () => {
    const catalog = new CatalogService(store, { timeoutMs: 10, cacheTtlMs: 0 });
    jest.spyOn(store, 'getCatalogEntry').mockImplementation(
      () => new Promise<null>(resolve => setTimeout(() => resolve(null), 50))
    );

    await expect(catalog.getEntry('cmp-mcb-20a')).rejects.toThrow('Component catalog unavailable: getEntry timed out after 10ms');
  });
});

describe('MemoryStore commit', () => {
  it('should refuse a duplicate line sequence', async () => {
    const store = new MemoryStore();
    const project = await store.createProject({ project_code: 'MEM-001' });
    const line = {
      project_id: project.project_id,
      component_id: 'cmp-mcb-20a',
      line_sequence: 1,
      qty: 1,
      unit_price: 10,
      markup_pct: 0,
      line_total: 10,
      estimated_labor_hours: 0,
      price_override: null,
      notes: '',
      created_date: '2026-01-01T00:00:00.000Z',
      updated_date: '2026-01-01T00:00:00.000Z'
    };
    const now = new Date().toISOString();

    await store.commit(project.project_id, 0, {
      bomUpserts: [{ ...line, bom_id: 'line-a' }],
      bomDeletes: [],
      detectionUpdates: [],
      project: { updated_date: now }
    });

    await expect(store.commit(project.project_id, 1, {
      bomUpserts: [{ ...line, bom_id: 'line-b' }],
      bomDeletes: [],
      detectionUpdates: [],
      project: { updated_date: now }
    })).rejects.toThrow(ConcurrencyConflictError);

    expect(await store.listBomItems(project.project_id)).toHaveLength(1);
  });
});

describe('mapStoreError', () => {
  it('should map serialization failures and unique violations to conflicts', () => {
    expect(mapStoreError('commit', { code: '40001', message: 'version mismatch' }, 'p-1')).toBeInstanceOf(ConcurrencyConflictError);
    expect(mapStoreError('commit', { code: '23505', message: 'duplicate key' }, 'p-1')).toBeInstanceOf(ConcurrencyConflictError);
  });

  it('should map missing rows to NotFoundError', () => {
    expect(mapStoreError('commit', { code: 'P0002', message: 'project not found' }, 'p-1')).toBeInstanceOf(NotFoundError);
  });

  it('should map anything else to StoreUnavailableError', () => {
    const err = mapStoreError('listBomItems', { code: '08006', message: 'connection failure' });
    expect(err).toBeInstanceOf(StoreUnavailableError);
    expect(err.message).toBe('Store unavailable: listBomItems: connection failure');
  });
});

describe('Store ping', () => {
  function storeReturning(status: number, body: unknown): SupabaseStore {
    const respond: typeof fetch = async () => new Response(JSON.stringify(body), {
      status,
      headers: { 'Content-Type': 'application/json' }
    });
    return new SupabaseStore(createClient('http://localhost:54321', 'test-anon-key', {
      auth: { persistSession: false },
      global: { fetch: respond }
    }));
  }

  it('should report a reachable catalog table', async () => {
    await expect(storeReturning(200, [{ component_id: 'cmp-mcb-20a' }]).ping()).resolves.toBe(true);
  });

  it('should report a failing query as not connected', async () => {
    const logged = jest.spyOn(console, 'error').mockImplementation(() => undefined);

    await expect(storeReturning(503, { message: 'connection failure', code: '08006' }).ping()).resolves.toBe(false);
    expect(logged).toHaveBeenCalledWith('❌ Database connection check failed:', 'connection failure');

    logged.mockRestore();
  });

  it('should always answer for the in-memory store', async () => {
    await expect(new MemoryStore().ping()).resolves.toBe(true);
  });
});
