/**
 * Estimator Data Model
 * Projects, component library, BOM line items and detected components
 */

// ============================================================================
// MATCH STATUS
// ============================================================================

export const MATCH_STATUSES = ['matched', 'review', 'new', 'rejected'] as const;

export type MatchStatus = typeof MATCH_STATUSES[number];

export type MatchMethod = 'auto' | 'manual';

export type RejectionReason = 'duplicate' | 'noise' | 'override';

// ============================================================================
// PROJECT
// ============================================================================

export const PROJECT_STATUSES = ['draft', 'active', 'submitted', 'won', 'lost', 'archived'] as const;

export type ProjectStatus = typeof PROJECT_STATUSES[number];

export interface ProjectTotals {
  total_line_items: number;
  /** Sum of qty across line items, not a row count */
  total_components: number;
  /** Pre-markup material cost */
  total_materials_cost: number;
  total_labor_hours: number;
  total_labor_cost: number;
  /** Realized markup amount */
  total_markup: number;
  grand_total: number;
}

export interface Project extends ProjectTotals {
  project_id: string;
  project_code: string;
  project_name: string;
  client_name: string | null;
  status: ProjectStatus;
  created_date: string;
  updated_date: string;
  created_by: string;

  /** Falls back to configured DEFAULT_LABOR_RATE when null */
  labor_rate_per_hour: number | null;

  /** Falls back to configured DEFAULT_MARKUP_PCT when null */
  default_markup_pct: number | null;

  /** Highest sequence number ever allocated in this project */
  last_line_sequence: number;

  /** Incremented by every committed change set */
  row_version: number;
}

export interface NewProjectInput {
  project_code: string;
  project_name?: string;
  client_name?: string | null;
  created_by?: string;
  status?: ProjectStatus;
  labor_rate_per_hour?: number | null;
  default_markup_pct?: number | null;
}

export const EMPTY_TOTALS: ProjectTotals = {
  total_line_items: 0,
  total_components: 0,
  total_materials_cost: 0,
  total_labor_hours: 0,
  total_labor_cost: 0,
  total_markup: 0,
  grand_total: 0
};

// ============================================================================
// COMPONENT LIBRARY
// ============================================================================

export interface ComponentCatalogEntry {
  component_id: string;
  itemname: string;

  /** Description layers, general to specific */
  itemdesc: string | null;
  itdesc2: string | null;
  itdesc3: string | null;
  itdesc4: string | null;

  itclass: string;
  manufacturer: string | null;
  model_number: string | null;

  /** Voltage/amperage/etc. kept as text */
  rating: string | null;

  unit_price: number;
  markup_pct: number | null;
  is_active: boolean;
}

export const DESCRIPTION_LAYERS = ['itemdesc', 'itdesc2', 'itdesc3', 'itdesc4'] as const;

// ============================================================================
// BOM
// ============================================================================

export interface BomLineItem {
  bom_id: string;
  project_id: string;
  component_id: string;
  line_sequence: number;
  qty: number;
  unit_price: number;
  markup_pct: number;
  line_total: number;
  estimated_labor_hours: number;

  /** Replaces unit_price * qty as the pre-markup line base */
  price_override: number | null;

  notes: string;
  created_date: string;
  updated_date: string;
}

/** One row of the complete BOM: line item joined with its catalog entry */
export interface CompleteBomRow {
  project_id: string;
  project_code: string;
  project_name: string;
  bom_id: string;
  line_sequence: number;
  component_id: string;
  itemname: string;
  itemdesc: string | null;
  itdesc2: string | null;
  itdesc3: string | null;
  itdesc4: string | null;
  itclass: string;
  manufacturer: string | null;
  model_number: string | null;
  rating: string | null;
  qty: number;
  unit_price: number;
  markup_pct: number;
  line_total: number;
  estimated_labor_hours: number;
  price_override: number | null;
  notes: string;
}

// ============================================================================
// DETECTIONS
// ============================================================================

/** Structured hints supplied with a detection */
export interface DetectionHints {
  itemdesc?: string | null;
  itdesc2?: string | null;
  itdesc3?: string | null;
  itdesc4?: string | null;
  itclass?: string | null;
  manufacturer?: string | null;
  model_number?: string | null;
  rating?: string | null;
}

/** Raw record supplied by the external extraction process */
export interface RawDetection extends DetectionHints {
  itemname: string;
  qty?: number;
  notes?: string;
  confidence_level?: 'high' | 'medium' | 'low';
  location_on_drawing?: string;
}

export interface DetectedComponent {
  detection_id: string;
  project_id: string;
  itemname: string;
  itemdesc: string | null;
  itdesc2: string | null;
  itdesc3: string | null;
  itdesc4: string | null;
  itclass: string | null;
  manufacturer: string | null;
  model_number: string | null;
  rating: string | null;
  qty: number;
  notes: string;
  confidence_level: 'high' | 'medium' | 'low' | null;
  location_on_drawing: string | null;

  matched_component_id: string | null;
  match_status: MatchStatus;

  /** 0-100, null until classified */
  match_score: number | null;
  match_method: MatchMethod | null;
  rejection_reason: RejectionReason | null;
  matched_date: string | null;
  created_date: string;
}

/** Fields the Matcher and review decisions are allowed to change */
export interface DetectionMatchUpdate {
  detection_id: string;
  matched_component_id: string | null;
  match_status: MatchStatus;
  match_score: number | null;
  match_method: MatchMethod | null;
  rejection_reason: RejectionReason | null;
  matched_date: string | null;
}

// ============================================================================
// REPORTING
// ============================================================================

export interface DetectionStatusSummary {
  project_id: string;
  project_code: string;
  total_detected: number;
  auto_matched: number;
  needs_review: number;
  new_items: number;
  rejected: number;
}

export interface ProjectSummary extends ProjectTotals {
  project_id: string;
  project_code: string;
  project_name: string;
  client_name: string | null;
  status: ProjectStatus;
  created_date: string;
  updated_date: string;
  created_by: string;
}
