/**
 * Request body schemas for the estimator API
 */

import { z } from 'zod';
import { PROJECT_STATUSES, MATCH_STATUSES } from '../types';
import { CatalogRowSchema } from './rows';

const optionalText = z.string().trim().max(500).nullable().optional();

export const CreateProjectSchema = z.object({
  project_code: z.string().trim(),
  project_name: z.string().trim().min(1).optional(),
  client_name: optionalText,
  created_by: z.string().trim().min(1).optional(),
  status: z.enum(PROJECT_STATUSES).optional(),
  labor_rate_per_hour: z.number().nullable().optional(),
  default_markup_pct: z.number().nullable().optional()
});

export const ProjectSettingsSchema = z.object({
  status: z.enum(PROJECT_STATUSES).optional(),
  labor_rate_per_hour: z.number().nullable().optional(),
  default_markup_pct: z.number().nullable().optional()
});

export const ListProjectsQuerySchema = z.object({
  status: z.enum(PROJECT_STATUSES).optional()
});

export const RawDetectionSchema = z.object({
  itemname: z.string(),
  itemdesc: optionalText,
  itdesc2: optionalText,
  itdesc3: optionalText,
  itdesc4: optionalText,
  itclass: optionalText,
  manufacturer: optionalText,
  model_number: optionalText,
  rating: optionalText,
  qty: z.number().optional(),
  notes: z.string().optional(),
  confidence_level: z.enum(['high', 'medium', 'low']).optional(),
  location_on_drawing: z.string().optional()
});

export const IngestDetectionsSchema = z.object({
  detections: z.array(RawDetectionSchema).min(1),
  classify: z.boolean().default(false)
});

export const ListDetectionsQuerySchema = z.object({
  status: z.enum(MATCH_STATUSES).optional()
});

export const SuggestionsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(50).default(5)
});

export const ConfirmMatchSchema = z.object({
  component_id: z.string().min(1).optional()
});

export const RejectDetectionSchema = z.object({
  reason: z.enum(['duplicate', 'noise', 'override']).default('override')
});

const lineFields = {
  qty: z.number().optional(),
  unit_price: z.number().optional(),
  markup_pct: z.number().optional(),
  price_override: z.number().nullable().optional(),
  estimated_labor_hours: z.number().optional(),
  notes: z.string().optional()
};

export const AcceptDetectionSchema = z.object({
  ...lineFields,
  component_id: z.string().min(1).optional()
});

export const ManualLineSchema = z.object({
  ...lineFields,
  component_id: z.string().min(1),
  qty: z.number()
});

export const UpdateLineSchema = z.object(lineFields);

export const RecomputeSchema = z.object({
  labor_rate: z.number().min(0).optional()
});

export const CatalogQuerySchema = z.object({
  itclass: z.string().trim().min(1).optional(),
  q: z.string().trim().min(1).max(100).optional(),
  include_inactive: z.enum(['true', 'false']).default('false').transform(value => value === 'true')
});

export const CatalogFileSchema = z.array(CatalogRowSchema);
