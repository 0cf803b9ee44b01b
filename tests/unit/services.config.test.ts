/**
 * Configuration loading tests
 */

import { loadConfig, DEFAULT_CONFIG } from '../../src/services/config';

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    expect(DEFAULT_CONFIG).toEqual({
      port: 3000,
      matching: {
        autoMatchThreshold: 85,
        reviewThreshold: 70,
        classFilter: 'hard',
        classBonus: 5,
        manufacturerBonus: 5
      },
      defaultLaborRate: 80,
      defaultMarkupPct: 15,
      storeTimeoutMs: 5000,
      catalogTimeoutMs: 5000,
      catalogCacheTtlMs: 300000
    });
  });

  it('should coerce numeric strings from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      AUTO_MATCH_THRESHOLD: '90',
      REVIEW_THRESHOLD: '60',
      MATCH_CLASS_FILTER: 'bonus',
      DEFAULT_LABOR_RATE: '95.5'
    });

    expect(config.port).toBe(8080);
    expect(config.matching.autoMatchThreshold).toBe(90);
    expect(config.matching.reviewThreshold).toBe(60);
    expect(config.matching.classFilter).toBe('bonus');
    expect(config.defaultLaborRate).toBe(95.5);
  });

  it('should refuse a review threshold above the auto threshold', () => {
    expect(() => loadConfig({ AUTO_MATCH_THRESHOLD: '70', REVIEW_THRESHOLD: '80' }))
      .toThrow('REVIEW_THRESHOLD must not exceed AUTO_MATCH_THRESHOLD');
  });

  it('should refuse an unknown class filter mode', () => {
    expect(() => loadConfig({ MATCH_CLASS_FILTER: 'soft' })).toThrow();
  });
});
