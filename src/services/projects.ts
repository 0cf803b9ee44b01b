/**
 * Project Service
 * Project creation and settings, and intake of raw detections from the extraction process
 */

import {
  Project,
  ProjectStatus,
  NewProjectInput,
  RawDetection,
  DetectedComponent,
  MatchStatus
} from '../types';
import { NotFoundError, ValidationError } from '../errors';
import { PROJECT_CODE_RULES } from '../constants/components';
import { EngineContext, OperationOptions, readStore, transactionOptions } from './context';
import { runInProjectTransaction } from './transaction';
import { recomputeInTransaction } from '../calculations/bom/rollup';

export function validateProjectCode(code: string): string | null {
  if (!code) return 'Project code is required';
  if (code.length < PROJECT_CODE_RULES.min_length) {
    return `Project code must be at least ${PROJECT_CODE_RULES.min_length} characters`;
  }
  if (code.length > PROJECT_CODE_RULES.max_length) {
    return `Project code must be at most ${PROJECT_CODE_RULES.max_length} characters`;
  }
  if (!PROJECT_CODE_RULES.pattern.test(code)) {
    return 'Project code can only contain letters, numbers, hyphens and underscores';
  }
  return null;
}

function assertNonNegative(value: number | null | undefined, field: string, code: 'INVALID_PRICE' | 'INVALID_MARKUP'): void {
  if (value !== undefined && value !== null && (!Number.isFinite(value) || value < 0)) {
    throw new ValidationError(`${field} must be non-negative, got ${value}`, code, field);
  }
}

export async function createProject(
  ctx: EngineContext,
  input: NewProjectInput,
  options: OperationOptions = {}
): Promise<Project> {
  const problem = validateProjectCode(input.project_code);
  if (problem) {
    throw new ValidationError(problem, 'INVALID_PROJECT_CODE', 'project_code');
  }
  assertNonNegative(input.labor_rate_per_hour, 'labor_rate_per_hour', 'INVALID_PRICE');
  assertNonNegative(input.default_markup_pct, 'default_markup_pct', 'INVALID_MARKUP');

  const project = await readStore(ctx, 'createProject', signal => ctx.store.createProject(input, { signal }), options);
  console.log(`📁 Created project ${project.project_code} (project_id=${project.project_id})`);
  return project;
}

export async function getProject(
  ctx: EngineContext,
  projectId: string,
  options: OperationOptions = {}
): Promise<Project> {
  const project = await readStore(ctx, 'getProject', signal => ctx.store.getProject(projectId, { signal }), options);
  if (!project) {
    throw new NotFoundError('project', projectId);
  }
  return project;
}

export interface ProjectSettingsInput {
  status?: ProjectStatus;
  labor_rate_per_hour?: number | null;
  default_markup_pct?: number | null;
}

/**
 * Update status and pricing settings. A labor rate change moves the labor
 * cost, so the rollup is recomputed in the same commit.
 */
export async function updateProjectSettings(
  ctx: EngineContext,
  projectId: string,
  settings: ProjectSettingsInput,
  options: OperationOptions = {}
): Promise<Project> {
  assertNonNegative(settings.labor_rate_per_hour, 'labor_rate_per_hour', 'INVALID_PRICE');
  assertNonNegative(settings.default_markup_pct, 'default_markup_pct', 'INVALID_MARKUP');

  const { project } = await runInProjectTransaction(ctx.store, projectId, transactionOptions(ctx, options), async tx => {
    const patch: ProjectSettingsInput = {};
    if (settings.status !== undefined) patch.status = settings.status;
    if (settings.labor_rate_per_hour !== undefined) patch.labor_rate_per_hour = settings.labor_rate_per_hour;
    if (settings.default_markup_pct !== undefined) patch.default_markup_pct = settings.default_markup_pct;
    tx.patchProject(patch);

    if (patch.labor_rate_per_hour !== undefined) {
      await recomputeInTransaction(tx, ctx.config);
    }
  });
  return project;
}

/**
 * Store raw detections supplied by the extraction process. They start as
 * 'new' with no candidate and no score until classified.
 */
export async function ingestDetections(
  ctx: EngineContext,
  projectId: string,
  detections: RawDetection[],
  options: OperationOptions = {}
): Promise<DetectedComponent[]> {
  detections.forEach((detection, index) => {
    if (detection.qty !== undefined && (!Number.isFinite(detection.qty) || detection.qty <= 0)) {
      throw new ValidationError(`Detection ${index}: quantity must be positive, got ${detection.qty}`, 'INVALID_QUANTITY', 'qty');
    }
  });

  const stored = await readStore(ctx, 'insertDetections', signal => ctx.store.insertDetections(projectId, detections, { signal }), options);
  console.log(`📥 Ingested ${stored.length} detections for project_id=${projectId}`);
  return stored;
}

export async function listProjectDetections(
  ctx: EngineContext,
  projectId: string,
  status?: MatchStatus,
  options: OperationOptions = {}
): Promise<DetectedComponent[]> {
  await getProject(ctx, projectId, options);
  return readStore(ctx, 'listDetections', signal => ctx.store.listDetections(projectId, status, { signal }), options);
}
