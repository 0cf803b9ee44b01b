/**
 * BOM line pricing
 * line_total = (price_override ?? unit_price × qty) × (1 + markup_pct / 100)
 */

import { BomLineItem } from '../../types';
import { ValidationError } from '../../errors';
import { roundMoney } from '../../services/labor';

export interface LinePricing {
  qty: number;
  unit_price: number;
  markup_pct: number;
  price_override: number | null;
}

/** Pre-markup line base: the override when set, else unit price × qty */
export function lineBase(line: LinePricing): number {
  return roundMoney(line.price_override ?? line.unit_price * line.qty);
}

export function calculateLineTotal(line: LinePricing): number {
  return roundMoney(lineBase(line) * (1 + line.markup_pct / 100));
}

/** Markup amount actually realized on a line */
export function lineMarkup(line: Pick<BomLineItem, 'line_total'> & LinePricing): number {
  return roundMoney(line.line_total - lineBase(line));
}

// ============================================================================
// VALIDATION
// ============================================================================

export interface LineInput {
  qty?: number;
  unit_price?: number;
  markup_pct?: number;
  price_override?: number | null;
  estimated_labor_hours?: number;
}

function isFiniteNumber(value: number): boolean {
  return typeof value === 'number' && Number.isFinite(value);
}

/** Checks every supplied field; absent fields are not checked */
export function validateLineInput(input: LineInput): void {
  if (input.qty !== undefined && (!isFiniteNumber(input.qty) || input.qty <= 0)) {
    throw new ValidationError(`Quantity must be positive, got ${input.qty}`, 'INVALID_QUANTITY', 'qty');
  }
  if (input.markup_pct !== undefined && (!isFiniteNumber(input.markup_pct) || input.markup_pct < 0)) {
    throw new ValidationError(`Markup percentage must be non-negative, got ${input.markup_pct}`, 'INVALID_MARKUP', 'markup_pct');
  }
  if (input.unit_price !== undefined && (!isFiniteNumber(input.unit_price) || input.unit_price < 0)) {
    throw new ValidationError(`Unit price must be non-negative, got ${input.unit_price}`, 'INVALID_PRICE', 'unit_price');
  }
  if (input.price_override !== undefined && input.price_override !== null &&
      (!isFiniteNumber(input.price_override) || input.price_override < 0)) {
    throw new ValidationError(`Price override must be non-negative, got ${input.price_override}`, 'INVALID_PRICE', 'price_override');
  }
  if (input.estimated_labor_hours !== undefined &&
      (!isFiniteNumber(input.estimated_labor_hours) || input.estimated_labor_hours < 0)) {
    throw new ValidationError(
      `Labor hours must be non-negative, got ${input.estimated_labor_hours}`,
      'INVALID_LABOR_HOURS',
      'estimated_labor_hours'
    );
  }
}
