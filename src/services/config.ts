/**
 * Estimator Configuration
 * Matching thresholds, labor rate and markup defaults, store timeouts
 */

import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

export type ClassFilterMode = 'hard' | 'bonus';

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  AUTO_MATCH_THRESHOLD: z.coerce.number().min(0).max(100).default(85),
  REVIEW_THRESHOLD: z.coerce.number().min(0).max(100).default(70),
  MATCH_CLASS_FILTER: z.enum(['hard', 'bonus']).default('hard'),
  MATCH_CLASS_BONUS: z.coerce.number().min(0).max(100).default(5),
  MATCH_MANUFACTURER_BONUS: z.coerce.number().min(0).max(100).default(5),
  DEFAULT_LABOR_RATE: z.coerce.number().min(0).default(80),
  DEFAULT_MARKUP_PCT: z.coerce.number().min(0).default(15),
  STORE_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  CATALOG_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  CATALOG_CACHE_TTL_MS: z.coerce.number().int().min(0).default(5 * 60 * 1000)
}).refine(env => env.REVIEW_THRESHOLD <= env.AUTO_MATCH_THRESHOLD, {
  message: 'REVIEW_THRESHOLD must not exceed AUTO_MATCH_THRESHOLD',
  path: ['REVIEW_THRESHOLD']
});

export interface MatchingConfig {
  autoMatchThreshold: number;
  reviewThreshold: number;
  classFilter: ClassFilterMode;
  classBonus: number;
  manufacturerBonus: number;
}

export interface EstimatorConfig {
  port: number;
  matching: MatchingConfig;
  defaultLaborRate: number;
  defaultMarkupPct: number;
  storeTimeoutMs: number;
  catalogTimeoutMs: number;
  catalogCacheTtlMs: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EstimatorConfig {
  const parsed = EnvSchema.parse(env);

  return {
    port: parsed.PORT,
    matching: {
      autoMatchThreshold: parsed.AUTO_MATCH_THRESHOLD,
      reviewThreshold: parsed.REVIEW_THRESHOLD,
      classFilter: parsed.MATCH_CLASS_FILTER,
      classBonus: parsed.MATCH_CLASS_BONUS,
      manufacturerBonus: parsed.MATCH_MANUFACTURER_BONUS
    },
    defaultLaborRate: parsed.DEFAULT_LABOR_RATE,
    defaultMarkupPct: parsed.DEFAULT_MARKUP_PCT,
    storeTimeoutMs: parsed.STORE_TIMEOUT_MS,
    catalogTimeoutMs: parsed.CATALOG_TIMEOUT_MS,
    catalogCacheTtlMs: parsed.CATALOG_CACHE_TTL_MS
  };
}

export const DEFAULT_CONFIG: EstimatorConfig = loadConfig({});
