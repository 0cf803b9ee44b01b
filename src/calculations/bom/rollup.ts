/**
 * Rollup Aggregator
 * Project totals are derived from the current line items only, never from the cached values
 */

import { BomLineItem, Project, ProjectTotals } from '../../types';
import { EstimatorConfig } from '../../services/config';
import { EngineContext, OperationOptions, transactionOptions } from '../../services/context';
import { runInProjectTransaction, ProjectTransaction } from '../../services/transaction';
import { calculateLaborCost, roundMoney } from '../../services/labor';
import { lineBase, lineMarkup } from './pricing';

export function aggregateTotals(lines: BomLineItem[], laborRatePerHour: number): ProjectTotals {
  let components = 0;
  let materials = 0;
  let laborHours = 0;
  let markup = 0;

  for (const line of lines) {
    components += line.qty;
    materials += lineBase(line);
    laborHours += line.estimated_labor_hours;
    markup += lineMarkup(line);
  }

  const total_materials_cost = roundMoney(materials);
  const total_labor_hours = Math.round(laborHours * 100) / 100;
  const total_labor_cost = calculateLaborCost(total_labor_hours, laborRatePerHour);
  const total_markup = roundMoney(markup);

  return {
    total_line_items: lines.length,
    total_components: components,
    total_materials_cost,
    total_labor_hours,
    total_labor_cost,
    total_markup,
    grand_total: roundMoney(total_materials_cost + total_labor_cost + total_markup)
  };
}

export function resolveLaborRate(
  project: Pick<Project, 'labor_rate_per_hour'>,
  config: Pick<EstimatorConfig, 'defaultLaborRate'>,
  override?: number
): number {
  return override ?? project.labor_rate_per_hour ?? config.defaultLaborRate;
}

/** Recompute inside an open unit of work and stage the cache update */
export async function recomputeInTransaction(
  tx: ProjectTransaction,
  config: Pick<EstimatorConfig, 'defaultLaborRate'>,
  laborRateOverride?: number
): Promise<ProjectTotals> {
  const lines = await tx.listBomItems();
  const totals = aggregateTotals(lines, resolveLaborRate(tx.project, config, laborRateOverride));
  tx.patchProject(totals);
  return totals;
}

const TOTAL_KEYS: ReadonlyArray<keyof ProjectTotals> = [
  'total_line_items',
  'total_components',
  'total_materials_cost',
  'total_labor_hours',
  'total_labor_cost',
  'total_markup',
  'grand_total'
];

function sameTotals(a: ProjectTotals, b: ProjectTotals): boolean {
  return TOTAL_KEYS.every(key => a[key] === b[key]);
}

/**
 * recompute(project) -> ProjectTotals
 * Writes the totals onto the project cache; a no-op commit when nothing changed.
 * A laborRate becomes the project's labor_rate_per_hour in the same commit, so
 * later recomputations price labor the same way.
 */
export async function recompute(
  ctx: EngineContext,
  projectId: string,
  options: OperationOptions & { laborRate?: number } = {}
): Promise<ProjectTotals> {
  const { result } = await runInProjectTransaction(ctx.store, projectId, transactionOptions(ctx, options), async tx => {
    const before = tx.project;
    const lines = await tx.listBomItems();
    const totals = aggregateTotals(lines, resolveLaborRate(before, ctx.config, options.laborRate));
    if (options.laborRate !== undefined && options.laborRate !== before.labor_rate_per_hour) {
      tx.patchProject({ labor_rate_per_hour: options.laborRate });
    }
    if (!sameTotals(before, totals)) {
      tx.patchProject(totals);
    }
    return totals;
  });
  return result;
}
