/**
 * BOM Assembler
 *
 * Creates, edits and deletes BOM line items. Every mutation recomputes the
 * project rollup inside the same unit of work, so the line and the totals
 * commit together.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  BomLineItem,
  ComponentCatalogEntry,
  DetectedComponent,
  Project,
  ProjectTotals
} from '../../types';
import { NotFoundError, UnresolvedComponentError, ValidationError } from '../../errors';
import { EngineContext, OperationOptions, readStore, transactionOptions } from '../../services/context';
import { runInProjectTransaction, ProjectTransaction } from '../../services/transaction';
import { estimateLaborHours } from '../../services/labor';
import { calculateLineTotal, validateLineInput, LineInput } from './pricing';
import { recomputeInTransaction } from './rollup';

// ============================================================================
// TYPES
// ============================================================================

export interface BomMutationResult<T> {
  value: T;
  totals: ProjectTotals;
  project: Project;
}

export interface AcceptDetectionInput extends LineInput {
  /** Explicit catalog identity; required for 'new' and 'rejected' detections */
  component_id?: string;
  notes?: string;
}

export interface ManualLineInput extends LineInput {
  component_id: string;
  qty: number;
  notes?: string;
}

export interface LineUpdateInput extends LineInput {
  notes?: string;
}

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Run a BOM mutation and the rollup recomputation as one commit.
 */
export async function mutateBom<T>(
  ctx: EngineContext,
  projectId: string,
  options: OperationOptions,
  work: (tx: ProjectTransaction) => Promise<T>
): Promise<BomMutationResult<T>> {
  const { result, project } = await runInProjectTransaction(ctx.store, projectId, transactionOptions(ctx, options), async tx => {
    const value = await work(tx);
    const totals = await recomputeInTransaction(tx, ctx.config);
    return { value, totals };
  });
  return { ...result, project };
}

function defaultMarkup(ctx: EngineContext, project: Project, entry: ComponentCatalogEntry): number {
  return entry.markup_pct ?? project.default_markup_pct ?? ctx.config.defaultMarkupPct;
}

export function buildLineItem(
  tx: ProjectTransaction,
  entry: ComponentCatalogEntry,
  fields: {
    qty: number;
    unit_price: number;
    markup_pct: number;
    estimated_labor_hours: number;
    price_override?: number | null;
    notes?: string;
  }
): BomLineItem {
  const now = new Date().toISOString();
  const price_override = fields.price_override ?? null;

  const item: BomLineItem = {
    bom_id: uuidv4(),
    project_id: tx.projectId,
    component_id: entry.component_id,
    line_sequence: tx.allocateSequence(),
    qty: fields.qty,
    unit_price: fields.unit_price,
    markup_pct: fields.markup_pct,
    line_total: calculateLineTotal({ ...fields, price_override }),
    estimated_labor_hours: fields.estimated_labor_hours,
    price_override,
    notes: fields.notes ?? '',
    created_date: now,
    updated_date: now
  };
  tx.putBomItem(item);
  return item;
}

function resolveComponentId(detection: DetectedComponent, explicit?: string): string {
  if (explicit) return explicit;

  if (detection.match_status === 'new' || detection.match_status === 'rejected' || !detection.matched_component_id) {
    throw new UnresolvedComponentError(detection.detection_id, detection.match_status);
  }
  return detection.matched_component_id;
}

// ============================================================================
// OPERATIONS
// ============================================================================

/**
 * acceptDetection(detection, qty, unit_price, markup_pct) -> BomLineItem
 * The detection itself is not modified.
 */
export async function acceptDetection(
  ctx: EngineContext,
  detectionId: string,
  input: AcceptDetectionInput = {},
  options: OperationOptions = {}
): Promise<BomMutationResult<BomLineItem>> {
  validateLineInput(input);

  const found = await readStore(ctx, 'getDetection', signal => ctx.store.getDetection(detectionId, { signal }), options);
  if (!found) {
    throw new NotFoundError('detection', detectionId);
  }

  const result = await mutateBom(ctx, found.project_id, options, async tx => {
    const detection = await tx.getDetection(detectionId);
    const entry = await ctx.catalog.getEntry(resolveComponentId(detection, input.component_id), tx.signal);
    const qty = input.qty ?? detection.qty;
    validateLineInput({ qty });

    return buildLineItem(tx, entry, {
      qty,
      unit_price: input.unit_price ?? entry.unit_price,
      markup_pct: input.markup_pct ?? defaultMarkup(ctx, tx.project, entry),
      estimated_labor_hours: input.estimated_labor_hours ?? estimateLaborHours(entry.itclass, qty),
      price_override: input.price_override,
      notes: input.notes ?? detection.notes
    });
  });

  console.log(`📥 Accepted detection_id=${detectionId} as line ${result.value.line_sequence} (project_id=${found.project_id}, grand_total=${result.totals.grand_total})`);
  return result;
}

/**
 * addManualLine(project, catalog_entry, qty, unit_price, markup_pct, labor_hours) -> BomLineItem
 */
export async function addManualLine(
  ctx: EngineContext,
  projectId: string,
  input: ManualLineInput,
  options: OperationOptions = {}
): Promise<BomMutationResult<BomLineItem>> {
  validateLineInput(input);

  const result = await mutateBom(ctx, projectId, options, async tx => {
    const entry = await ctx.catalog.getEntry(input.component_id, tx.signal);

    return buildLineItem(tx, entry, {
      qty: input.qty,
      unit_price: input.unit_price ?? entry.unit_price,
      markup_pct: input.markup_pct ?? defaultMarkup(ctx, tx.project, entry),
      estimated_labor_hours: input.estimated_labor_hours ?? estimateLaborHours(entry.itclass, input.qty),
      price_override: input.price_override,
      notes: input.notes
    });
  });

  console.log(`➕ Added line ${result.value.line_sequence} to project_id=${projectId} (grand_total=${result.totals.grand_total})`);
  return result;
}

export async function updateLine(
  ctx: EngineContext,
  projectId: string,
  bomId: string,
  patch: LineUpdateInput,
  options: OperationOptions = {}
): Promise<BomMutationResult<BomLineItem>> {
  validateLineInput(patch);

  return mutateBom(ctx, projectId, options, async tx => {
    const current = await tx.getBomItem(bomId);
    const next: BomLineItem = {
      ...current,
      qty: patch.qty ?? current.qty,
      unit_price: patch.unit_price ?? current.unit_price,
      markup_pct: patch.markup_pct ?? current.markup_pct,
      price_override: patch.price_override === undefined ? current.price_override : patch.price_override,
      estimated_labor_hours: patch.estimated_labor_hours ?? current.estimated_labor_hours,
      notes: patch.notes ?? current.notes
    };
    next.line_total = calculateLineTotal(next);
    tx.putBomItem(next);
    return next;
  });
}

export async function deleteLine(
  ctx: EngineContext,
  projectId: string,
  bomId: string,
  options: OperationOptions = {}
): Promise<BomMutationResult<BomLineItem>> {
  const result = await mutateBom(ctx, projectId, options, async tx => {
    const current = await tx.getBomItem(bomId);
    tx.deleteBomItem(bomId);
    return current;
  });

  console.log(`🗑️ Deleted line ${result.value.line_sequence} from project_id=${projectId}`);
  return result;
}

/**
 * Remove every line of the project; the rollup drops to zero in the same commit.
 */
export async function clearBom(
  ctx: EngineContext,
  projectId: string,
  options: OperationOptions = {}
): Promise<BomMutationResult<number>> {
  const result = await mutateBom(ctx, projectId, options, async tx => {
    const lines = await tx.listBomItems();
    for (const line of lines) {
      tx.deleteBomItem(line.bom_id);
    }
    return lines.length;
  });

  console.log(`🗑️ Cleared ${result.value} lines from project_id=${projectId}`);
  return result;
}

/**
 * Rebuild the BOM from every matched detection, one line per catalog component
 * with quantities and labor hours summed across detections. Existing lines are
 * replaced.
 */
export async function acceptMatchedDetections(
  ctx: EngineContext,
  projectId: string,
  options: OperationOptions = {}
): Promise<BomMutationResult<BomLineItem[]>> {
  const result = await mutateBom(ctx, projectId, options, async tx => {
    for (const line of await tx.listBomItems()) {
      tx.deleteBomItem(line.bom_id);
    }

    const matched = await tx.listDetections('matched');
    const groups = new Map<string, DetectedComponent[]>();
    for (const detection of matched) {
      if (!detection.matched_component_id) continue;
      const group = groups.get(detection.matched_component_id) ?? [];
      group.push(detection);
      groups.set(detection.matched_component_id, group);
    }

    const lines: BomLineItem[] = [];
    for (const [componentId, detections] of groups) {
      const entry = await ctx.catalog.getEntry(componentId, tx.signal);
      const qty = detections.reduce((sum, d) => sum + d.qty, 0);
      if (qty <= 0) {
        throw new ValidationError(`Matched detections for ${entry.itemname} have no quantity`, 'INVALID_QUANTITY', 'qty');
      }

      lines.push(buildLineItem(tx, entry, {
        qty,
        unit_price: entry.unit_price,
        markup_pct: defaultMarkup(ctx, tx.project, entry),
        estimated_labor_hours: Math.round(detections.reduce((sum, d) => sum + estimateLaborHours(entry.itclass, d.qty), 0) * 100) / 100,
        notes: detections.map(d => d.notes).filter(note => note !== '').join('; ')
      }));
    }
    return lines;
  });

  console.log(`✅ Generated ${result.value.length} BOM lines from matched detections for project_id=${projectId}`);
  return result;
}
