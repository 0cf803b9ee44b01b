/**
 * Component Matcher
 * Scores catalog entries against a detected item and classifies the result
 */

import {
  ComponentCatalogEntry,
  DetectionHints,
  MatchStatus,
  DESCRIPTION_LAYERS
} from '../../types';
import { MatchingConfig } from '../../services/config';
import { UNCLASSIFIED } from '../../constants/components';
import { tokenize, isNoise, normalizeIdentity } from './normalize';
import { tokenSortRatio } from './similarity';

// ============================================================================
// TYPES
// ============================================================================

/** Rating is kept on the detection for display but not scored */
export interface MatchInput extends Omit<DetectionHints, 'rating'> {
  /** Free-text description of the detected item */
  itemname: string;
}

export interface ScoredCandidate {
  entry: ComponentCatalogEntry;
  score: number;
  name_score: number;
  layer_score: number | null;
  exact_identity: boolean;
}

export interface MatchOutcome {
  match_status: MatchStatus;
  candidate: ComponentCatalogEntry | null;
  /** Confidence 0-100 of the best candidate (0 when there was none) */
  score: number;
  rejection_reason: 'noise' | null;
}

const NAME_WEIGHT = 0.6;
const LAYER_WEIGHT = 0.4;

// ============================================================================
// SCORING
// ============================================================================

export function populatedLayers(entry: ComponentCatalogEntry): number {
  return DESCRIPTION_LAYERS.filter(layer => (entry[layer] ?? '').trim() !== '').length;
}

/** Weighted layer similarity; layer n weighs n so the most specific layer dominates */
function layerScore(input: MatchInput, entry: ComponentCatalogEntry): number | null {
  let weighted = 0;
  let totalWeight = 0;

  DESCRIPTION_LAYERS.forEach((layer, index) => {
    const supplied = tokenize(input[layer]);
    if (supplied.length === 0) return;

    const weight = index + 1;
    const target = tokenize(entry[layer]);
    weighted += weight * (target.length > 0 ? tokenSortRatio(supplied, target) : 0);
    totalWeight += weight;
  });

  return totalWeight > 0 ? weighted / totalWeight : null;
}

function classApplies(itclass: string | null | undefined): itclass is string {
  return !!itclass && itclass.trim() !== '' && itclass.trim().toUpperCase() !== UNCLASSIFIED;
}

function sameClass(a: string, b: string): boolean {
  return a.trim().toUpperCase() === b.trim().toUpperCase();
}

export function scoreEntry(
  input: MatchInput,
  entry: ComponentCatalogEntry,
  config: MatchingConfig
): ScoredCandidate {
  const name_score = tokenSortRatio(tokenize(input.itemname), tokenize(entry.itemname));
  const layer_score = layerScore(input, entry);
  let score = layer_score === null
    ? name_score
    : NAME_WEIGHT * name_score + LAYER_WEIGHT * layer_score;

  if (config.classFilter === 'bonus' && classApplies(input.itclass) && sameClass(input.itclass, entry.itclass)) {
    score += config.classBonus;
  }

  const manufacturer = normalizeIdentity(input.manufacturer);
  const model = normalizeIdentity(input.model_number);
  const sameManufacturer = manufacturer !== '' && manufacturer === normalizeIdentity(entry.manufacturer);
  const exact_identity = sameManufacturer && model !== '' && model === normalizeIdentity(entry.model_number);

  if (exact_identity) {
    score = 100;
  } else if (sameManufacturer) {
    score += config.manufacturerBonus;
  }

  return {
    entry,
    score: Math.round(Math.min(100, score) * 10) / 10,
    name_score,
    layer_score: layer_score === null ? null : Math.round(layer_score * 10) / 10,
    exact_identity
  };
}

function compareCandidates(a: ScoredCandidate, b: ScoredCandidate): number {
  if (b.score !== a.score) return b.score - a.score;

  const layers = populatedLayers(b.entry) - populatedLayers(a.entry);
  if (layers !== 0) return layers;

  if (a.entry.component_id < b.entry.component_id) return -1;
  if (a.entry.component_id > b.entry.component_id) return 1;
  return 0;
}

/**
 * Score and order catalog entries for a detection, best first.
 * In 'hard' class-filter mode entries of another class are dropped.
 */
export function rankCandidates(
  input: MatchInput,
  catalog: ComponentCatalogEntry[],
  config: MatchingConfig,
  limit?: number
): ScoredCandidate[] {
  const pool = config.classFilter === 'hard' && classApplies(input.itclass)
    ? catalog.filter(entry => sameClass(entry.itclass, input.itclass ?? ''))
    : catalog;

  const ranked = pool
    .filter(entry => entry.is_active)
    .map(entry => scoreEntry(input, entry, config))
    .sort(compareCandidates);

  return limit === undefined ? ranked : ranked.slice(0, limit);
}

// ============================================================================
// CLASSIFICATION
// ============================================================================

export function classify(
  input: MatchInput,
  catalog: ComponentCatalogEntry[],
  config: MatchingConfig
): MatchOutcome {
  if (isNoise(input.itemname)) {
    return { match_status: 'rejected', candidate: null, score: 0, rejection_reason: 'noise' };
  }

  const [best] = rankCandidates(input, catalog, config, 1);
  if (!best) {
    return { match_status: 'new', candidate: null, score: 0, rejection_reason: null };
  }

  if (best.score >= config.autoMatchThreshold) {
    return { match_status: 'matched', candidate: best.entry, score: best.score, rejection_reason: null };
  }
  if (best.score >= config.reviewThreshold) {
    return { match_status: 'review', candidate: best.entry, score: best.score, rejection_reason: null };
  }
  return { match_status: 'new', candidate: null, score: best.score, rejection_reason: null };
}
