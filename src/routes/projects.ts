/**
 * Project Routes
 * Projects, their BOM and their detections
 */

import { Router, Request, Response } from 'express';
import { getEngineContext } from '../services/context';
import {
  createProject,
  updateProjectSettings,
  ingestDetections,
  listProjectDetections
} from '../services/projects';
import {
  getProjectSummary,
  listProjectSummaries,
  getCompleteBom,
  summarizeDetections
} from '../calculations/reporting';
import { classifyProject } from '../calculations/matching/reconcile';
import { approveAllReview } from '../calculations/matching/review';
import {
  addManualLine,
  updateLine,
  deleteLine,
  clearBom,
  acceptMatchedDetections
} from '../calculations/bom/assembler';
import { recompute } from '../calculations/bom/rollup';
import {
  CreateProjectSchema,
  ProjectSettingsSchema,
  ListProjectsQuerySchema,
  IngestDetectionsSchema,
  ListDetectionsQuerySchema,
  ManualLineSchema,
  UpdateLineSchema,
  RecomputeSchema
} from '../schemas/requests';
import { parseInput, route } from './respond';

const router = Router();

// ============================================================================
// PROJECTS
// ============================================================================

/**
 * POST /api/v1/projects
 */
router.post('/', route('Create project', async (req: Request, res: Response, signal) => {
  const input = parseInput(CreateProjectSchema, req.body);
  const project = await createProject(getEngineContext(), input, { signal });
  res.status(201).json({ success: true, project });
}));

/**
 * GET /api/v1/projects?status=active
 * Project summaries, newest first
 */
router.get('/', route('List projects', async (req: Request, res: Response, signal) => {
  const { status } = parseInput(ListProjectsQuerySchema, req.query);
  const projects = await listProjectSummaries(getEngineContext(), status, { signal });
  res.json({ success: true, projects });
}));

router.get('/:projectId', route('Get project', async (req: Request, res: Response, signal) => {
  const summary = await getProjectSummary(getEngineContext(), req.params.projectId, { signal });
  res.json({ success: true, project: summary });
}));

/**
 * PATCH /api/v1/projects/:projectId
 * Status, labor rate and default markup
 */
router.patch('/:projectId', route('Update project', async (req: Request, res: Response, signal) => {
  const settings = parseInput(ProjectSettingsSchema, req.body);
  const project = await updateProjectSettings(getEngineContext(), req.params.projectId, settings, { signal });
  res.json({ success: true, project });
}));

/**
 * POST /api/v1/projects/:projectId/recompute
 * Optional body: { labor_rate } saved as the project's labor rate before the totals are recomputed
 */
router.post('/:projectId/recompute', route('Recompute', async (req: Request, res: Response, signal) => {
  const { labor_rate } = parseInput(RecomputeSchema, req.body);
  const totals = await recompute(getEngineContext(), req.params.projectId, { laborRate: labor_rate, signal });
  res.json({ success: true, totals });
}));

// ============================================================================
// BOM
// ============================================================================

router.get('/:projectId/bom', route('Get BOM', async (req: Request, res: Response, signal) => {
  const lines = await getCompleteBom(getEngineContext(), req.params.projectId, { signal });
  res.json({ success: true, lines });
}));

router.post('/:projectId/bom', route('Add BOM line', async (req: Request, res: Response, signal) => {
  const input = parseInput(ManualLineSchema, req.body);
  const result = await addManualLine(getEngineContext(), req.params.projectId, input, { signal });
  res.status(201).json({ success: true, line: result.value, totals: result.totals });
}));

/**
 * DELETE /api/v1/projects/:projectId/bom
 * Removes every line and zeroes the totals
 */
router.delete('/:projectId/bom', route('Clear BOM', async (req: Request, res: Response, signal) => {
  const result = await clearBom(getEngineContext(), req.params.projectId, { signal });
  res.json({ success: true, deleted: result.value, totals: result.totals });
}));

/**
 * POST /api/v1/projects/:projectId/bom/from-detections
 * Replaces the BOM with one line per catalog component across all matched detections
 */
router.post('/:projectId/bom/from-detections', route('Generate BOM', async (req: Request, res: Response, signal) => {
  const result = await acceptMatchedDetections(getEngineContext(), req.params.projectId, { signal });
  res.status(201).json({ success: true, lines: result.value, totals: result.totals });
}));

router.patch('/:projectId/bom/:bomId', route('Update BOM line', async (req: Request, res: Response, signal) => {
  const patch = parseInput(UpdateLineSchema, req.body);
  const result = await updateLine(getEngineContext(), req.params.projectId, req.params.bomId, patch, { signal });
  res.json({ success: true, line: result.value, totals: result.totals });
}));

router.delete('/:projectId/bom/:bomId', route('Delete BOM line', async (req: Request, res: Response, signal) => {
  const result = await deleteLine(getEngineContext(), req.params.projectId, req.params.bomId, { signal });
  res.json({ success: true, line: result.value, totals: result.totals });
}));

// ============================================================================
// DETECTIONS
// ============================================================================

router.get('/:projectId/detections', route('List detections', async (req: Request, res: Response, signal) => {
  const { status } = parseInput(ListDetectionsQuerySchema, req.query);
  const detections = await listProjectDetections(getEngineContext(), req.params.projectId, status, { signal });
  res.json({ success: true, detections });
}));

/**
 * POST /api/v1/projects/:projectId/detections
 * Body: { detections: RawDetection[], classify?: boolean }
 */
router.post('/:projectId/detections', route('Ingest detections', async (req: Request, res: Response, signal) => {
  const { detections, classify } = parseInput(IngestDetectionsSchema, req.body);
  const ctx = getEngineContext();
  const stored = await ingestDetections(ctx, req.params.projectId, detections, { signal });

  if (!classify) {
    res.status(201).json({ success: true, detections: stored });
    return;
  }

  const classification = await classifyProject(ctx, req.params.projectId, { signal });
  res.status(201).json({
    success: true,
    detections: classification.results.map(r => r.detection),
    statistics: classification.statistics
  });
}));

router.post('/:projectId/detections/classify', route('Classify project', async (req: Request, res: Response, signal) => {
  const classification = await classifyProject(getEngineContext(), req.params.projectId, { signal });
  res.json({ success: true, ...classification });
}));

router.post('/:projectId/detections/approve-review', route('Approve review', async (req: Request, res: Response, signal) => {
  const approved = await approveAllReview(getEngineContext(), req.params.projectId, { signal });
  res.json({ success: true, approved: approved.length, detections: approved });
}));

router.get('/:projectId/detection-status', route('Detection status', async (req: Request, res: Response, signal) => {
  const summary = await summarizeDetections(getEngineContext(), req.params.projectId, { signal });
  res.json({ success: true, status: summary });
}));

export default router;
