/**
 * Detection Routes
 * Classification, suggestions, review decisions and acceptance into the BOM
 */

import { Router, Request, Response } from 'express';
import { getEngineContext } from '../services/context';
import { classifyDetection, suggestMatches } from '../calculations/matching/reconcile';
import { confirmMatch, rejectDetection, reopenDetection } from '../calculations/matching/review';
import { acceptDetection } from '../calculations/bom/assembler';
import {
  SuggestionsQuerySchema,
  ConfirmMatchSchema,
  RejectDetectionSchema,
  AcceptDetectionSchema
} from '../schemas/requests';
import { parseInput, route } from './respond';

const router = Router();

router.post('/:detectionId/classify', route('Classify detection', async (req: Request, res: Response, signal) => {
  const result = await classifyDetection(getEngineContext(), req.params.detectionId, { signal });
  res.json({ success: true, detection: result.detection, score: result.outcome.score });
}));

/**
 * GET /api/v1/detections/:detectionId/suggestions?limit=5
 */
router.get('/:detectionId/suggestions', route('Suggestions', async (req: Request, res: Response, signal) => {
  const { limit } = parseInput(SuggestionsQuerySchema, req.query);
  const candidates = await suggestMatches(getEngineContext(), req.params.detectionId, limit, { signal });
  res.json({
    success: true,
    suggestions: candidates.map(c => ({
      component_id: c.entry.component_id,
      itemname: c.entry.itemname,
      itclass: c.entry.itclass,
      unit_price: c.entry.unit_price,
      score: c.score
    }))
  });
}));

router.post('/:detectionId/confirm', route('Confirm match', async (req: Request, res: Response, signal) => {
  const { component_id } = parseInput(ConfirmMatchSchema, req.body);
  const detection = await confirmMatch(getEngineContext(), req.params.detectionId, component_id, { signal });
  res.json({ success: true, detection });
}));

router.post('/:detectionId/reject', route('Reject detection', async (req: Request, res: Response, signal) => {
  const { reason } = parseInput(RejectDetectionSchema, req.body);
  const detection = await rejectDetection(getEngineContext(), req.params.detectionId, reason, { signal });
  res.json({ success: true, detection });
}));

router.post('/:detectionId/reopen', route('Reopen detection', async (req: Request, res: Response, signal) => {
  const detection = await reopenDetection(getEngineContext(), req.params.detectionId, { signal });
  res.json({ success: true, detection });
}));

/**
 * POST /api/v1/detections/:detectionId/accept
 * Adds a BOM line for the detection; the detection is left as it is
 */
router.post('/:detectionId/accept', route('Accept detection', async (req: Request, res: Response, signal) => {
  const input = parseInput(AcceptDetectionSchema, req.body);
  const result = await acceptDetection(getEngineContext(), req.params.detectionId, input, { signal });
  res.status(201).json({ success: true, line: result.value, totals: result.totals });
}));

export default router;
