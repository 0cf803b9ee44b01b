/**
 * Reporting projections
 * Project summaries read the cached rollup; detection status is counted live
 */

import {
  Project,
  ProjectStatus,
  ProjectSummary,
  CompleteBomRow,
  DetectionStatusSummary,
  ComponentCatalogEntry
} from '../../types';
import { NotFoundError } from '../../errors';
import { EngineContext, OperationOptions, readStore } from '../../services/context';
import { toProjectSummary, toCompleteBomRow, toDetectionStatus } from '../../transformers/reporting';

async function loadProject(ctx: EngineContext, projectId: string, options: OperationOptions): Promise<Project> {
  const project = await readStore(ctx, 'getProject', signal => ctx.store.getProject(projectId, { signal }), options);
  if (!project) {
    throw new NotFoundError('project', projectId);
  }
  return project;
}

export async function getProjectSummary(
  ctx: EngineContext,
  projectId: string,
  options: OperationOptions = {}
): Promise<ProjectSummary> {
  return toProjectSummary(await loadProject(ctx, projectId, options));
}

/** Newest first */
export async function listProjectSummaries(
  ctx: EngineContext,
  status?: ProjectStatus,
  options: OperationOptions = {}
): Promise<ProjectSummary[]> {
  const projects = await readStore(ctx, 'listProjects', signal => ctx.store.listProjects(status, { signal }), options);
  return projects.map(toProjectSummary);
}

/** Line items in sequence order joined with their catalog descriptive fields */
export async function getCompleteBom(
  ctx: EngineContext,
  projectId: string,
  options: OperationOptions = {}
): Promise<CompleteBomRow[]> {
  const project = await loadProject(ctx, projectId, options);
  const lines = await readStore(ctx, 'listBomItems', signal => ctx.store.listBomItems(projectId, { signal }), options);

  const entries = new Map<string, ComponentCatalogEntry>();
  for (const componentId of new Set(lines.map(line => line.component_id))) {
    entries.set(componentId, await ctx.catalog.getEntry(componentId, options.signal));
  }

  return lines
    .sort((a, b) => a.line_sequence - b.line_sequence)
    .flatMap(line => {
      const entry = entries.get(line.component_id);
      return entry ? [toCompleteBomRow(project, line, entry)] : [];
    });
}

/**
 * summarize(project) -> {total_detected, auto_matched, needs_review, new_items, rejected}
 * Always reads the current detections; nothing is cached.
 */
export async function summarizeDetections(
  ctx: EngineContext,
  projectId: string,
  options: OperationOptions = {}
): Promise<DetectionStatusSummary> {
  const project = await loadProject(ctx, projectId, options);
  const detections = await readStore(ctx, 'listDetections', signal => ctx.store.listDetections(projectId, undefined, { signal }), options);
  return toDetectionStatus(project, detections);
}
