/**
 * BOM line pricing and rollup tests
 */

import { lineBase, calculateLineTotal, lineMarkup, validateLineInput } from '../../src/calculations/bom/pricing';
import { aggregateTotals, resolveLaborRate } from '../../src/calculations/bom/rollup';
import { EMPTY_TOTALS } from '../../src/types';
import { ValidationError } from '../../src/errors';
import { bomLine } from '../fixtures/estimator';

describe('BOM Pricing', () => {
  describe('calculateLineTotal', () => {
    it('should apply markup to unit price × qty', () => {
      // 4 × $10 = $40, +15% = $46
      expect(calculateLineTotal({ qty: 4, unit_price: 10, markup_pct: 15, price_override: null })).toBe(46);
    });

    it('should use the override as the whole pre-markup base', () => {
      const line = { qty: 10, unit_price: 5, markup_pct: 25, price_override: 40 };
      expect(lineBase(line)).toBe(40);
      expect(calculateLineTotal(line)).toBe(50);
    });

    it('should round to cents', () => {
      expect(calculateLineTotal({ qty: 3, unit_price: 0.1, markup_pct: 0, price_override: null })).toBe(0.3);
      // 3 × 2.50 = 7.50, × 1.075 = 8.0625
      expect(calculateLineTotal({ qty: 3, unit_price: 2.5, markup_pct: 7.5, price_override: null })).toBe(8.06);
    });

    it('should allow a zero price', () => {
      expect(calculateLineTotal({ qty: 2, unit_price: 0, markup_pct: 20, price_override: null })).toBe(0);
    });
  });

  describe('lineMarkup', () => {
    it('should be the line total minus the base', () => {
      expect(lineMarkup({ qty: 2, unit_price: 20, markup_pct: 10, price_override: null, line_total: 44 })).toBe(4);
    });
  });

  describe('validateLineInput', () => {
    it('should reject a non-positive quantity', () => {
      expect(() => validateLineInput({ qty: 0 })).toThrow(ValidationError);
      expect(() => validateLineInput({ qty: -1 })).toThrow('Quantity must be positive, got -1');
    });

    it('should reject a negative markup', () => {
      try {
        validateLineInput({ qty: 1, markup_pct: -5 });
        throw new Error('expected a validation error');
      } catch (err) {
        expect(err).toBeInstanceOf(ValidationError);
        if (err instanceof ValidationError) {
          expect(err.code).toBe('INVALID_MARKUP');
          expect(err.field).toBe('markup_pct');
          expect(err.status).toBe(400);
        }
      }
    });

    it('should reject negative prices and labor hours', () => {
      expect(() => validateLineInput({ unit_price: -0.01 })).toThrow('Unit price must be non-negative, got -0.01');
      expect(() => validateLineInput({ price_override: -1 })).toThrow('Price override must be non-negative, got -1');
      expect(() => validateLineInput({ estimated_labor_hours: -2 })).toThrow('Labor hours must be non-negative, got -2');
    });

    it('should reject non-finite numbers', () => {
      expect(() => validateLineInput({ qty: Number.NaN })).toThrow(ValidationError);
      expect(() => validateLineInput({ unit_price: Number.POSITIVE_INFINITY })).toThrow(ValidationError);
    });

    it('should accept absent fields and a cleared override', () => {
      expect(() => validateLineInput({})).not.toThrow();
      expect(() => validateLineInput({ price_override: null })).not.toThrow();
    });
  });
});

describe('Rollup', () => {
  describe('aggregateTotals', () => {
    it('should sum materials, markup and labor across lines', () => {
      const lines = [
        bomLine({ bom_id: 'a', line_sequence: 1, qty: 2, unit_price: 20, markup_pct: 10, line_total: 44, estimated_labor_hours: 0.5 }),
        bomLine({ bom_id: 'b', line_sequence: 2, qty: 3, unit_price: 10, markup_pct: 0, line_total: 30, estimated_labor_hours: 1 })
      ];

      expect(aggregateTotals(lines, 80)).toEqual({
        total_line_items: 2,
        total_components: 5,
        total_materials_cost: 70,
        total_labor_hours: 1.5,
        total_labor_cost: 120,
        total_markup: 4,
        grand_total: 194
      });
    });

    it('should count the override base as material cost', () => {
      const lines = [
        bomLine({ qty: 10, unit_price: 5, markup_pct: 25, price_override: 40, line_total: 50 })
      ];
      const totals = aggregateTotals(lines, 80);

      expect(totals.total_materials_cost).toBe(40);
      expect(totals.total_markup).toBe(10);
      expect(totals.grand_total).toBe(50);
    });

    it('should return zero totals for an empty BOM', () => {
      expect(aggregateTotals([], 80)).toEqual(EMPTY_TOTALS);
    });
  });

  describe('resolveLaborRate', () => {
    const config = { defaultLaborRate: 80 };

    it('should prefer an explicit override', () => {
      expect(resolveLaborRate({ labor_rate_per_hour: 95 }, config, 110)).toBe(110);
    });

    it('should use the project rate before the configured default', () => {
      expect(resolveLaborRate({ labor_rate_per_hour: 95 }, config)).toBe(95);
      expect(resolveLaborRate({ labor_rate_per_hour: null }, config)).toBe(80);
    });

    it('should keep a project rate of zero', () => {
      expect(resolveLaborRate({ labor_rate_per_hour: 0 }, config)).toBe(0);
    });
  });
});
