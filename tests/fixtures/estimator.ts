/**
 * Shared fixtures: a small component catalog and an in-memory engine
 */

import { ComponentCatalogEntry, BomLineItem } from '../../src/types';
import { MemoryStore } from '../../src/services/memory-store';
import { createEngineContext, EngineContext } from '../../src/services/context';
import { DEFAULT_CONFIG, EstimatorConfig } from '../../src/services/config';

export function catalogEntry(
  fields: Pick<ComponentCatalogEntry, 'component_id' | 'itemname' | 'itclass'> & Partial<ComponentCatalogEntry>
): ComponentCatalogEntry {
  return {
    itemdesc: null,
    itdesc2: null,
    itdesc3: null,
    itdesc4: null,
    manufacturer: null,
    model_number: null,
    rating: null,
    unit_price: 0,
    markup_pct: null,
    is_active: true,
    ...fields
  };
}

export const TEST_CATALOG: ComponentCatalogEntry[] = [
  catalogEntry({
    component_id: 'cmp-mcb-20a',
    itemname: '20A Breaker',
    itclass: 'MCB',
    manufacturer: 'Acme',
    model_number: 'MCB-20',
    unit_price: 10
  }),
  catalogEntry({
    component_id: 'cmp-mcb-32a',
    itemname: '32A Breaker',
    itclass: 'MCB',
    manufacturer: 'Acme',
    unit_price: 12
  }),
  catalogEntry({
    component_id: 'cmp-mccb-100a',
    itemname: '100A MCCB',
    itclass: 'MCCB',
    unit_price: 300,
    markup_pct: 12
  }),
  catalogEntry({
    component_id: 'cmp-contactor-25a',
    itemname: '25A Contactor',
    itclass: 'CONTACTOR',
    unit_price: 50
  }),
  catalogEntry({
    component_id: 'cmp-old-breaker',
    itemname: '20A Breaker',
    itclass: 'MCB',
    manufacturer: 'Legacy',
    unit_price: 8,
    is_active: false
  })
];

export function testConfig(overrides: Partial<EstimatorConfig> = {}): EstimatorConfig {
  return {
    ...DEFAULT_CONFIG,
    matching: { ...DEFAULT_CONFIG.matching },
    ...overrides
  };
}

export function createTestContext(config: EstimatorConfig = testConfig()): EngineContext {
  return createEngineContext(new MemoryStore(TEST_CATALOG), config);
}

export function bomLine(fields: Partial<BomLineItem> & Pick<BomLineItem, 'qty' | 'unit_price' | 'markup_pct' | 'line_total'>): BomLineItem {
  return {
    bom_id: 'bom-1',
    project_id: 'project-1',
    component_id: 'cmp-mcb-20a',
    line_sequence: 1,
    estimated_labor_hours: 0,
    price_override: null,
    notes: '',
    created_date: '2026-01-01T00:00:00.000Z',
    updated_date: '2026-01-01T00:00:00.000Z',
    ...fields
  };
}
