/**
 * Row schemas for data read back from Postgres
 * numeric columns arrive as strings or numbers depending on precision, so they are coerced
 */

import { z } from 'zod';
import { MATCH_STATUSES, PROJECT_STATUSES } from '../types';

const money = z.coerce.number();
const nullableMoney = z.union([z.null(), z.coerce.number()]);
const text = z.string().nullable().default(null);
const timestamp = z.union([z.string(), z.date()]).transform(value =>
  value instanceof Date ? value.toISOString() : value
);
const id = z.union([z.string(), z.number()]).transform(value => String(value));

export const CatalogRowSchema = z.object({
  component_id: id,
  itemname: z.string(),
  itemdesc: text,
  itdesc2: text,
  itdesc3: text,
  itdesc4: text,
  itclass: z.string().nullable().transform(value => value ?? 'OTHER'),
  manufacturer: text,
  model_number: text,
  rating: text,
  unit_price: money.default(0),
  markup_pct: nullableMoney.default(null),
  is_active: z.boolean().default(true)
});

export const ProjectRowSchema = z.object({
  project_id: id,
  project_code: z.string(),
  project_name: z.string(),
  client_name: text,
  status: z.enum(PROJECT_STATUSES),
  created_date: timestamp,
  updated_date: timestamp,
  created_by: z.string(),
  labor_rate_per_hour: nullableMoney.default(null),
  default_markup_pct: nullableMoney.default(null),
  last_line_sequence: z.coerce.number().int().default(0),
  row_version: z.coerce.number().int().default(0),
  total_line_items: z.coerce.number().int().default(0),
  total_components: money.default(0),
  total_materials_cost: money.default(0),
  total_labor_hours: money.default(0),
  total_labor_cost: money.default(0),
  total_markup: money.default(0),
  grand_total: money.default(0)
});

export const BomRowSchema = z.object({
  bom_id: id,
  project_id: id,
  component_id: id,
  line_sequence: z.coerce.number().int(),
  qty: money,
  unit_price: money,
  markup_pct: money,
  line_total: money,
  estimated_labor_hours: money.default(0),
  price_override: nullableMoney.default(null),
  notes: z.string().nullable().transform(value => value ?? ''),
  created_date: timestamp,
  updated_date: timestamp
});

export const DetectionRowSchema = z.object({
  detection_id: id,
  project_id: id,
  itemname: z.string(),
  itemdesc: text,
  itdesc2: text,
  itdesc3: text,
  itdesc4: text,
  itclass: text,
  manufacturer: text,
  model_number: text,
  rating: text,
  qty: z.coerce.number().default(1),
  notes: z.string().nullable().transform(value => value ?? ''),
  confidence_level: z.enum(['high', 'medium', 'low']).nullable().default(null),
  location_on_drawing: text,
  matched_component_id: z.union([z.null(), id]).default(null),
  match_status: z.enum(MATCH_STATUSES),
  match_score: nullableMoney.default(null),
  match_method: z.enum(['auto', 'manual']).nullable().default(null),
  rejection_reason: z.enum(['duplicate', 'noise', 'override']).nullable().default(null),
  matched_date: z.union([z.null(), timestamp]).default(null),
  created_date: timestamp
});
