/**
 * Component Classification Constants
 * Classification tags and installation labor estimates
 */

// ============================================================================
// CLASSIFICATION
// ============================================================================

/** Classification tag that disables class filtering during matching */
export const UNCLASSIFIED = 'OTHER';

// ============================================================================
// LABOR ESTIMATES (hours per installed unit)
// ============================================================================

export const LABOR_HOURS_PER_UNIT: Readonly<Record<string, number>> = {
  MCB: 0.25,
  MCCB: 0.5,
  ACB: 1.5,
  CONTACTOR: 1.0,
  RELAY: 0.5,
  BUSBAR: 2.0,
  METER: 0.75,
  TERMINAL: 0.1,
  SWITCH: 0.5,
  PANEL: 4.0,
  OTHER: 0.5
};

export const DEFAULT_LABOR_HOURS_PER_UNIT = 0.5;

// ============================================================================
// PROJECT CODES
// ============================================================================

export const PROJECT_CODE_RULES = {
  min_length: 3,
  max_length: 20,
  pattern: /^[A-Za-z0-9_-]+$/
} as const;
