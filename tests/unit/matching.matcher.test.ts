/**
 * Component Matcher Tests
 * Scoring, class filtering, identity matches and classification thresholds
 */

import {
  classify,
  rankCandidates,
  scoreEntry,
  populatedLayers
} from '../../src/calculations/matching/matcher';
import { toMatchInput } from '../../src/calculations/matching/reconcile';
import { MatchingConfig } from '../../src/services/config';
import { TEST_CATALOG, catalogEntry, testConfig } from '../fixtures/estimator';

const matching: MatchingConfig = testConfig().matching;

describe('Component Matcher', () => {
  describe('rankCandidates', () => {
    it('should rank the exact name first regardless of unit spelling', () => {
      const ranked = rankCandidates({ itemname: '20 amp breaker', itclass: 'MCB' }, TEST_CATALOG, matching);

      expect(ranked.map(c => c.entry.component_id)).toEqual(['cmp-mcb-20a', 'cmp-mcb-32a']);
      expect(ranked[0].score).toBe(100);
      expect(ranked[1].score).toBe(83.3);
    });

    it('should never return inactive entries', () => {
      const ranked = rankCandidates({ itemname: '20A Breaker' }, TEST_CATALOG, matching);
      expect(ranked.some(c => c.entry.component_id === 'cmp-old-breaker')).toBe(false);
    });

    it('should honor the limit', () => {
      const ranked = rankCandidates({ itemname: '20A Breaker' }, TEST_CATALOG, matching, 1);
      expect(ranked).toHaveLength(1);
      expect(ranked[0].entry.component_id).toBe('cmp-mcb-20a');
    });

    it('should drop other classes in hard filter mode', () => {
      const ranked = rankCandidates({ itemname: '20A Breaker', itclass: 'CONTACTOR' }, TEST_CATALOG, matching);
      expect(ranked.map(c => c.entry.component_id)).toEqual(['cmp-contactor-25a']);
    });

    it('should not filter when the class is OTHER', () => {
      const ranked = rankCandidates({ itemname: '20A Breaker', itclass: 'OTHER' }, TEST_CATALOG, matching);
      expect(ranked).toHaveLength(4);
      expect(ranked[0].entry.component_id).toBe('cmp-mcb-20a');
    });

    it('should break ties by populated layers, then by component id', () => {
      const catalog = [
        catalogEntry({ component_id: 'relay-a', itemname: 'Control Relay', itclass: 'RELAY' }),
        catalogEntry({ component_id: 'relay-c', itemname: 'Control Relay', itclass: 'RELAY', itemdesc: 'Plug-in', itdesc2: '24V' }),
        catalogEntry({ component_id: 'relay-b', itemname: 'Control Relay', itclass: 'RELAY', itemdesc: 'Plug-in', itdesc2: '24V' })
      ];

      const ranked = rankCandidates({ itemname: 'control relay' }, catalog, matching);

      expect(ranked.map(c => c.score)).toEqual([100, 100, 100]);
      expect(ranked.map(c => c.entry.component_id)).toEqual(['relay-b', 'relay-c', 'relay-a']);
    });
  });

  describe('scoreEntry', () => {
    it('should weight description layers against the name', () => {
      const onePole = catalogEntry({ component_id: 'mcb-1p', itemname: '20A Breaker', itclass: 'MCB', itdesc2: '1 pole' });
      const threePole = catalogEntry({ component_id: 'mcb-3p', itemname: '20A Breaker', itclass: 'MCB', itdesc2: '3 pole' });
      const input = { itemname: '20A breaker', itdesc2: '1 pole' };

      const best = scoreEntry(input, onePole, matching);
      const other = scoreEntry(input, threePole, matching);

      expect(best.score).toBe(100);
      expect(best.layer_score).toBe(100);
      expect(other.name_score).toBe(100);
      expect(other.layer_score).toBe(66.7);
      expect(other.score).toBe(86.7); // 0.6 × 100 + 0.4 × 66.7
    });

    it('should score an exact manufacturer and model match as 100', () => {
      const scored = scoreEntry(
        { itemname: 'panel device', manufacturer: 'ACME', model_number: 'mcb-20' },
        TEST_CATALOG[0],
        matching
      );
      expect(scored.exact_identity).toBe(true);
      expect(scored.score).toBe(100);
    });

    it('should add the manufacturer bonus when only the manufacturer agrees', () => {
      const scored = scoreEntry({ itemname: '32 breaker', manufacturer: 'acme' }, TEST_CATALOG[1], matching);
      expect(scored.name_score).toBe(83.3);
      expect(scored.score).toBe(88.3);
      expect(scored.exact_identity).toBe(false);
    });

    it('should add the class bonus in bonus mode', () => {
      const bonus: MatchingConfig = { ...matching, classFilter: 'bonus', classBonus: 5 };
      const scored = scoreEntry({ itemname: '32 breaker', itclass: 'mcb' }, TEST_CATALOG[1], bonus);
      expect(scored.score).toBe(88.3);
    });
  });

  describe('populatedLayers', () => {
    it('should not count blank layers', () => {
      expect(populatedLayers(catalogEntry({ component_id: 'x', itemname: 'x', itclass: 'MCB', itemdesc: 'A', itdesc3: '   ' }))).toBe(1);
    });
  });

  describe('classify', () => {
    it('should auto-match a score at or above the auto threshold', () => {
      const outcome = classify({ itemname: '20 amp breaker', itclass: 'MCB' }, TEST_CATALOG, matching);

      expect(outcome.match_status).toBe('matched');
      expect(outcome.candidate?.component_id).toBe('cmp-mcb-20a');
      expect(outcome.score).toBe(100);
      expect(outcome.rejection_reason).toBeNull();
    });

    it('should send a score between the thresholds to review with its candidate', () => {
      const outcome = classify({ itemname: '32 breaker', itclass: 'MCB' }, TEST_CATALOG, matching);

      expect(outcome.match_status).toBe('review');
      expect(outcome.candidate?.component_id).toBe('cmp-mcb-32a');
      expect(outcome.score).toBe(83.3);
    });

    it('should treat a score equal to the auto threshold as matched', () => {
      const outcome = classify(
        { itemname: '32 breaker', itclass: 'MCB' },
        TEST_CATALOG,
        { ...matching, autoMatchThreshold: 83.3 }
      );
      expect(outcome.match_status).toBe('matched');
    });

    it('should leave a poor match as new without a candidate', () => {
      const outcome = classify({ itemname: 'Widget thing', itclass: 'MCB' }, TEST_CATALOG, matching);

      expect(outcome.match_status).toBe('new');
      expect(outcome.candidate).toBeNull();
      expect(outcome.score).toBeLessThan(70);
    });

    it('should find nothing for a breaker filed under another class in hard mode', () => {
      const outcome = classify({ itemname: '20A Breaker', itclass: 'CONTACTOR' }, TEST_CATALOG, matching);
      expect(outcome.match_status).toBe('new');
      expect(outcome.candidate).toBeNull();
    });

    it('should still find it in bonus mode', () => {
      const outcome = classify(
        { itemname: '20A Breaker', itclass: 'CONTACTOR' },
        TEST_CATALOG,
        { ...matching, classFilter: 'bonus' }
      );
      expect(outcome.match_status).toBe('matched');
      expect(outcome.candidate?.component_id).toBe('cmp-mcb-20a');
    });

    it('should reject text with nothing to match as noise', () => {
      const outcome = classify({ itemname: '12 34' }, TEST_CATALOG, matching);

      expect(outcome).toEqual({ match_status: 'rejected', candidate: null, score: 0, rejection_reason: 'noise' });
    });

    it('should return new with score 0 for an empty catalog', () => {
      const outcome = classify({ itemname: '20A Breaker' }, [], matching);
      expect(outcome).toEqual({ match_status: 'new', candidate: null, score: 0, rejection_reason: null });
    });
  });

  describe('toMatchInput', () => {
    it('should pass only the scored fields of a detection', () => {
      const input = toMatchInput({
        detection_id: 'det-1',
        project_id: 'project-1',
        itemname: '20A Breaker',
        itemdesc: 'Breaker',
        itdesc2: 'Single pole',
        itdesc3: null,
        itdesc4: null,
        itclass: 'MCB',
        manufacturer: 'Acme',
        model_number: 'MCB-20',
        rating: '20A 240V',
        qty: 1,
        notes: '',
        confidence_level: null,
        location_on_drawing: null,
        matched_component_id: null,
        match_status: 'new',
        match_score: null,
        match_method: null,
        rejection_reason: null,
        matched_date: null,
        created_date: '2026-01-01T00:00:00.000Z'
      });

      expect(input).toEqual({
        itemname: '20A Breaker',
        itemdesc: 'Breaker',
        itdesc2: 'Single pole',
        itdesc3: null,
        itdesc4: null,
        itclass: 'MCB',
        manufacturer: 'Acme',
        model_number: 'MCB-20'
      });
    });
  });
});
