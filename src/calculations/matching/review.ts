/**
 * Human review decisions on detections
 */

import { DetectedComponent, RejectionReason } from '../../types';
import { NotFoundError } from '../../errors';
import { EngineContext, OperationOptions, readStore, transactionOptions } from '../../services/context';
import { runInProjectTransaction, ProjectTransaction } from '../../services/transaction';
import { buildMatchUpdate, MatchDecision } from './transitions';

async function decide(
  ctx: EngineContext,
  detectionId: string,
  options: OperationOptions,
  makeDecision: (detection: DetectedComponent, tx: ProjectTransaction) => Promise<MatchDecision>
): Promise<DetectedComponent> {
  const found = await readStore(ctx, 'getDetection', signal => ctx.store.getDetection(detectionId, { signal }), options);
  if (!found) {
    throw new NotFoundError('detection', detectionId);
  }

  const { result } = await runInProjectTransaction(ctx.store, found.project_id, transactionOptions(ctx, options), async tx => {
    const detection = await tx.getDetection(detectionId);
    const update = buildMatchUpdate(detection, await makeDecision(detection, tx));
    tx.updateDetection(update);
    return { ...detection, ...update };
  });

  console.log(`📝 Review decision detection_id=${detectionId} status=${result.match_status}`);
  return result;
}

/** Confirm a detection against a catalog component (the candidate when omitted) */
export function confirmMatch(
  ctx: EngineContext,
  detectionId: string,
  componentId?: string,
  options: OperationOptions = {}
): Promise<DetectedComponent> {
  return decide(ctx, detectionId, options, async (detection, tx) => {
    const targetId = componentId ?? detection.matched_component_id;
    const entry = targetId ? await ctx.catalog.getEntry(targetId, tx.signal) : null;

    return {
      match_status: 'matched',
      matched_component_id: entry?.component_id ?? null,
      // a human confirmation is full confidence
      match_score: 100,
      match_method: 'manual'
    };
  });
}

export function rejectDetection(
  ctx: EngineContext,
  detectionId: string,
  reason: RejectionReason = 'override',
  options: OperationOptions = {}
): Promise<DetectedComponent> {
  return decide(ctx, detectionId, options, async detection => ({
    match_status: 'rejected',
    matched_component_id: null,
    match_score: detection.match_score,
    match_method: 'manual',
    rejection_reason: reason
  }));
}

/** Put a detection back into the unresolved pool so it can be classified again */
export function reopenDetection(
  ctx: EngineContext,
  detectionId: string,
  options: OperationOptions = {}
): Promise<DetectedComponent> {
  return decide(ctx, detectionId, options, async () => ({
    match_status: 'new',
    matched_component_id: null,
    match_score: null,
    match_method: null
  }));
}

/** Accept the candidate of every 'review' detection in the project */
export async function approveAllReview(
  ctx: EngineContext,
  projectId: string,
  options: OperationOptions = {}
): Promise<DetectedComponent[]> {
  const { result } = await runInProjectTransaction(ctx.store, projectId, transactionOptions(ctx, options), async tx => {
    const pending = await tx.listDetections('review');
    const now = new Date().toISOString();

    return pending
      .filter(detection => detection.matched_component_id !== null)
      .map(detection => {
        const update = buildMatchUpdate(detection, {
          match_status: 'matched',
          matched_component_id: detection.matched_component_id,
          match_score: detection.match_score,
          match_method: 'manual'
        }, now);
        tx.updateDetection(update);
        return { ...detection, ...update };
      });
  });

  console.log(`✅ Approved ${result.length} review detections for project_id=${projectId}`);
  return result;
}
