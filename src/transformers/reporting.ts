/**
 * Transform stored rows into the reporting projections
 */

import {
  Project,
  ProjectSummary,
  BomLineItem,
  ComponentCatalogEntry,
  CompleteBomRow,
  DetectedComponent,
  DetectionStatusSummary
} from '../types';

/** Project summary straight from the cached rollup fields */
export function toProjectSummary(project: Project): ProjectSummary {
  return {
    project_id: project.project_id,
    project_code: project.project_code,
    project_name: project.project_name,
    client_name: project.client_name,
    status: project.status,
    created_date: project.created_date,
    updated_date: project.updated_date,
    total_line_items: project.total_line_items,
    total_components: project.total_components,
    total_materials_cost: project.total_materials_cost,
    total_labor_hours: project.total_labor_hours,
    total_labor_cost: project.total_labor_cost,
    total_markup: project.total_markup,
    grand_total: project.grand_total,
    created_by: project.created_by
  };
}

export function toCompleteBomRow(
  project: Pick<Project, 'project_id' | 'project_code' | 'project_name'>,
  line: BomLineItem,
  entry: ComponentCatalogEntry
): CompleteBomRow {
  return {
    project_id: project.project_id,
    project_code: project.project_code,
    project_name: project.project_name,
    bom_id: line.bom_id,
    line_sequence: line.line_sequence,
    component_id: entry.component_id,
    itemname: entry.itemname,
    itemdesc: entry.itemdesc,
    itdesc2: entry.itdesc2,
    itdesc3: entry.itdesc3,
    itdesc4: entry.itdesc4,
    itclass: entry.itclass,
    manufacturer: entry.manufacturer,
    model_number: entry.model_number,
    rating: entry.rating,
    qty: line.qty,
    unit_price: line.unit_price,
    markup_pct: line.markup_pct,
    line_total: line.line_total,
    estimated_labor_hours: line.estimated_labor_hours,
    price_override: line.price_override,
    notes: line.notes
  };
}

/** Count detections by match status */
export function toDetectionStatus(
  project: Pick<Project, 'project_id' | 'project_code'>,
  detections: DetectedComponent[]
): DetectionStatusSummary {
  const summary: DetectionStatusSummary = {
    project_id: project.project_id,
    project_code: project.project_code,
    total_detected: detections.length,
    auto_matched: 0,
    needs_review: 0,
    new_items: 0,
    rejected: 0
  };

  for (const detection of detections) {
    switch (detection.match_status) {
      case 'matched':
        summary.auto_matched++;
        break;
      case 'review':
        summary.needs_review++;
        break;
      case 'new':
        summary.new_items++;
        break;
      case 'rejected':
        summary.rejected++;
        break;
    }
  }
  return summary;
}
