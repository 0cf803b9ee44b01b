/**
 * Labor Calculation Service
 * Hours come from per-class estimates; cost is hours × hourly rate
 */

import {
  LABOR_HOURS_PER_UNIT,
  DEFAULT_LABOR_HOURS_PER_UNIT
} from '../constants/components';

export function roundMoney(value: number): number {
  return Math.round(value * 100) / 100;
}

export function laborHoursPerUnit(itclass: string | null | undefined): number {
  if (!itclass) return DEFAULT_LABOR_HOURS_PER_UNIT;
  return LABOR_HOURS_PER_UNIT[itclass.toUpperCase()] ?? DEFAULT_LABOR_HOURS_PER_UNIT;
}

export function estimateLaborHours(itclass: string | null | undefined, qty: number): number {
  return Math.round(laborHoursPerUnit(itclass) * qty * 100) / 100;
}

export function calculateLaborCost(hours: number, ratePerHour: number): number {
  return roundMoney(hours * ratePerHour);
}
