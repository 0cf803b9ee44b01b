/**
 * Engine context: the store, catalog reader and configuration every operation runs against
 */

import fs from 'fs';
import path from 'path';
import { ComponentCatalogEntry } from '../types';
import { CatalogFileSchema } from '../schemas/requests';
import { EstimatorConfig, DEFAULT_CONFIG } from './config';
import { EstimatorStore } from './store';
import { CatalogService } from './catalog';
import { MemoryStore } from './memory-store';
import { SupabaseStore } from './supabase-store';
import { getSupabaseClient, isDatabaseConfigured } from './database';
import { withTimeout } from './io';
import { StoreTimeoutError } from '../errors';

export interface EngineContext {
  store: EstimatorStore;
  catalog: CatalogService;
  config: EstimatorConfig;
}

export interface OperationOptions {
  signal?: AbortSignal;
  /** Overrides the configured store timeout */
  timeoutMs?: number;
}

export function createEngineContext(store: EstimatorStore, config: EstimatorConfig = DEFAULT_CONFIG): EngineContext {
  return {
    store,
    config,
    catalog: new CatalogService(store, {
      timeoutMs: config.catalogTimeoutMs,
      cacheTtlMs: config.catalogCacheTtlMs
    })
  };
}

export function transactionOptions(ctx: EngineContext, options: OperationOptions = {}) {
  return {
    timeoutMs: options.timeoutMs ?? ctx.config.storeTimeoutMs,
    signal: options.signal
  };
}

const SAMPLE_CATALOG_PATH = path.join(process.cwd(), 'data', 'catalog.sample.json');

export function loadSampleCatalog(file: string = SAMPLE_CATALOG_PATH): ComponentCatalogEntry[] {
  if (!fs.existsSync(file)) return [];
  const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
  return CatalogFileSchema.parse(parsed);
}

let defaultContext: EngineContext | null = null;

export function getEngineContext(config: EstimatorConfig = DEFAULT_CONFIG): EngineContext {
  if (!defaultContext) {
    if (isDatabaseConfigured()) {
      defaultContext = createEngineContext(new SupabaseStore(getSupabaseClient()), config);
    } else {
      console.warn('⚠️ Database not configured - using in-memory store with sample catalog');
      defaultContext = createEngineContext(new MemoryStore(loadSampleCatalog()), config);
    }
  }
  return defaultContext;
}

/** Single store read outside a project transaction, under the store deadline */
export function readStore<T>(
  ctx: EngineContext,
  operation: string,
  work: (signal: AbortSignal) => Promise<T>,
  options: OperationOptions = {}
): Promise<T> {
  const timeoutMs = options.timeoutMs ?? ctx.config.storeTimeoutMs;
  return withTimeout(work, timeoutMs, () => new StoreTimeoutError(operation, timeoutMs), options.signal);
}
