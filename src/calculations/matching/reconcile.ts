/**
 * Detection Reconciliation
 * Runs the matcher against stored detections and persists the outcome
 */

import { DetectedComponent, ComponentCatalogEntry } from '../../types';
import { NotFoundError, ValidationError } from '../../errors';
import { EngineContext, OperationOptions, readStore, transactionOptions } from '../../services/context';
import { runInProjectTransaction } from '../../services/transaction';
import { classify, rankCandidates, MatchInput, MatchOutcome, ScoredCandidate } from './matcher';
import { buildMatchUpdate } from './transitions';

const BATCH_SUGGESTION_LIMIT = 3;

export interface ClassificationResult {
  detection: DetectedComponent;
  outcome: MatchOutcome;
  suggestions: ScoredCandidate[];
}

export interface MatchStatistics {
  total: number;
  auto_matched: number;
  needs_review: number;
  new_items: number;
  rejected: number;
  avg_confidence: number;
}

export interface BatchClassification {
  project_id: string;
  results: ClassificationResult[];
  skipped: number;
  statistics: MatchStatistics;
}

export function toMatchInput(detection: DetectedComponent): MatchInput {
  return {
    itemname: detection.itemname,
    itemdesc: detection.itemdesc,
    itdesc2: detection.itdesc2,
    itdesc3: detection.itdesc3,
    itdesc4: detection.itdesc4,
    itclass: detection.itclass,
    manufacturer: detection.manufacturer,
    model_number: detection.model_number
  };
}

function applyOutcome(detection: DetectedComponent, outcome: MatchOutcome, now: string) {
  return buildMatchUpdate(detection, {
    match_status: outcome.match_status,
    matched_component_id: outcome.candidate?.component_id ?? null,
    match_score: outcome.score,
    match_method: 'auto',
    rejection_reason: outcome.rejection_reason
  }, now);
}

async function findDetection(ctx: EngineContext, detectionId: string, options: OperationOptions) {
  const detection = await readStore(ctx, 'getDetection', signal => ctx.store.getDetection(detectionId, { signal }), options);
  if (!detection) {
    throw new NotFoundError('detection', detectionId);
  }
  return detection;
}

/**
 * Classify one detection and persist its status, candidate and score.
 * "No match" is the 'new' outcome; only catalog and store failures throw.
 */
export async function classifyDetection(
  ctx: EngineContext,
  detectionId: string,
  options: OperationOptions = {}
): Promise<ClassificationResult> {
  const found = await findDetection(ctx, detectionId, options);

  const { result } = await runInProjectTransaction(ctx.store, found.project_id, transactionOptions(ctx, options), async tx => {
    const detection = await tx.getDetection(detectionId);
    if (detection.match_status === 'rejected') {
      throw new ValidationError(
        `Detection ${detectionId} was rejected; reopen it before classifying again`,
        'INVALID_TRANSITION',
        'match_status'
      );
    }

    const catalog = await ctx.catalog.listEntries({}, tx.signal);
    const input = toMatchInput(detection);
    const outcome = classify(input, catalog, ctx.config.matching);
    const update = applyOutcome(detection, outcome, new Date().toISOString());
    tx.updateDetection(update);

    return {
      detection: { ...detection, ...update },
      outcome,
      suggestions: []
    };
  });

  console.log(`🔎 Classified detection_id=${detectionId} status=${result.outcome.match_status} score=${result.outcome.score}`);
  return result;
}

export function matchStatistics(results: ClassificationResult[]): MatchStatistics {
  const stats: MatchStatistics = {
    total: results.length,
    auto_matched: 0,
    needs_review: 0,
    new_items: 0,
    rejected: 0,
    avg_confidence: 0
  };

  let totalScore = 0;
  for (const { outcome } of results) {
    if (outcome.match_status === 'matched') stats.auto_matched++;
    else if (outcome.match_status === 'review') stats.needs_review++;
    else if (outcome.match_status === 'new') stats.new_items++;
    else stats.rejected++;
    totalScore += outcome.score;
  }

  if (results.length > 0) {
    stats.avg_confidence = Math.round((totalScore / results.length) * 10) / 10;
  }
  return stats;
}

/**
 * Classify every open detection of a project in one unit of work.
 * Rejected detections and manual decisions are left alone.
 */
export async function classifyProject(
  ctx: EngineContext,
  projectId: string,
  options: OperationOptions = {}
): Promise<BatchClassification> {
  const startTime = Date.now();

  const { result } = await runInProjectTransaction(ctx.store, projectId, transactionOptions(ctx, options), async tx => {
    const detections = await tx.listDetections();
    const open = detections.filter(d => d.match_status !== 'rejected' && d.match_method !== 'manual');
    const catalog: ComponentCatalogEntry[] = open.length > 0
      ? await ctx.catalog.listEntries({}, tx.signal)
      : [];
    const now = new Date().toISOString();

    const results = open.map((detection): ClassificationResult => {
      const input = toMatchInput(detection);
      const outcome = classify(input, catalog, ctx.config.matching);
      const update = applyOutcome(detection, outcome, now);
      tx.updateDetection(update);

      const suggestions = outcome.match_status === 'review' || outcome.match_status === 'new'
        ? rankCandidates(input, catalog, ctx.config.matching, BATCH_SUGGESTION_LIMIT)
        : [];

      return { detection: { ...detection, ...update }, outcome, suggestions };
    });

    return {
      project_id: projectId,
      results,
      skipped: detections.length - open.length,
      statistics: matchStatistics(results)
    };
  });

  const { statistics } = result;
  const duration = Date.now() - startTime;
  console.log(`✅ Classified project_id=${projectId}: matched=${statistics.auto_matched}, review=${statistics.needs_review}, new=${statistics.new_items}, rejected=${statistics.rejected}, skipped=${result.skipped}, duration=${duration}ms`);
  return result;
}

/** Top-N catalog candidates for a detection; read-only */
export async function suggestMatches(
  ctx: EngineContext,
  detectionId: string,
  limit = 5,
  options: OperationOptions = {}
): Promise<ScoredCandidate[]> {
  const detection = await findDetection(ctx, detectionId, options);
  const catalog = await ctx.catalog.listEntries({}, options.signal);
  return rankCandidates(toMatchInput(detection), catalog, ctx.config.matching, limit);
}
