/**
 * Argument Validator Tests
 *
 * Check order, rejection reasons, feedback and determinism.
 */

import { describe, it, expect } from 'vitest';
import {
  ArgumentValidator,
  DEFAULT_VALIDATOR_THRESHOLDS,
  REJECTION_REASONS,
} from '../src/services/validation/index.js';
import { countWords } from '../src/utils/text.js';

const TOPIC = 'Should AI be regulated?';

const AUDITS =
  'Independent audits of AI systems should be required because opaque models already make consequential decisions about credit and hiring.';
const LIABILITY =
  'Regulators must set liability rules so that companies deploying AI carry the cost of the harms their products cause.';
const AUDITS_PARAPHRASE =
  'Independent audits of AI systems should be required, because opaque models already make consequential decisions about hiring and credit.';

const REGULATE_CASE =
  'AI should be regulated because systems that decide who receives a loan, a job interview or medical triage now operate without meaningful oversight. ' +
  'When a hiring model quietly penalises applicants from certain postcodes, the people harmed rarely learn why they were rejected and have no route to appeal. ' +
  'Binding rules would require developers to document training data, test for disparate impact before release and keep audit logs that regulators can inspect. ' +
  'We already demand this of pharmaceuticals, aircraft and bridges, where failures are costly and hard to reverse. ' +
  'Algorithmic decisions now carry comparable stakes, so leaving them to voluntary corporate ethics pledges is an experiment on the public that nobody consented to.';
const DEREGULATE_CASE =
  'Heavy regulation of AI would entrench the largest technology firms, since only they can afford armies of compliance lawyers and years of certification paperwork. ' +
  'Startups and university labs, which produce much of the genuinely new research, would be priced out long before their ideas reach users. ' +
  'Existing law already covers discrimination, fraud and negligence regardless of whether a human or software made the decision, so courts can punish harms today. ' +
  "Rigid statutes written now will also age badly, freezing yesterday's technical assumptions into rules that cannot anticipate tomorrow's methods. " +
  'A better path is targeted enforcement of current statutes plus transparency incentives, rather than a sweeping licensing regime that slows beneficial innovation.';

describe('ArgumentValidator', () => {
  const validator = new ArgumentValidator(TOPIC);

  describe('isValid', () => {
    it('should accept a substantive, relevant, novel argument', () => {
      expect(validator.isValid(AUDITS, [])).toEqual({ ok: true });
    });

    it('should reject short text as too short', () => {
      const result = validator.isValid('AI is risky.', []);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.check).toBe('length');
        expect(result.reason).toBe('too short');
        expect(result.feedback).toContain('at least 10 words');
      }
    });

    it('should reject empty text', () => {
      const result = validator.isValid('', []);
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.reason).toBe('too short');
    });

    it('should reject bracketed placeholder text', () => {
      const result = validator.isValid(
        '[Insert argument here] explaining why AI regulation protects consumers from opaque automated decisions',
        []
      );
      expect(result).toMatchObject({ ok: false, check: 'placeholder', reason: 'placeholder text' });
    });

    it('should reject TODO markers', () => {
      const result = validator.isValid(
        'AI regulation needs TODO more detail about enforcement agencies and the penalties for violations',
        []
      );
      expect(result).toMatchObject({ ok: false, check: 'placeholder' });
    });

    it('should reject text dominated by filler as lacking substance', () => {
      const result = validator.isValid(
        'I think, you know, I believe that in my opinion it is sort of kind of about AI.',
        []
      );
      expect(result).toMatchObject({ ok: false, check: 'substance', reason: 'lacks substance' });
    });

    it('should reject a near-duplicate of an accepted argument as not novel', () => {
      const result = validator.isValid(AUDITS_PARAPHRASE, [AUDITS]);
      expect(result).toMatchObject({ ok: false, check: 'novelty', reason: 'not novel' });
      if (!result.ok) {
        expect(result.feedback).toContain('repeats an earlier point');
      }
    });

    it('should accept a distinct argument on the same topic', () => {
      expect(validator.isValid(LIABILITY, [AUDITS])).toEqual({ ok: true });
    });

    it('should reject an argument that never touches the topic as off-topic', () => {
      const result = validator.isValid(
        'Bananas grow best in warm humid climates with plenty of rain and rich volcanic soil.',
        []
      );
      expect(result).toMatchObject({ ok: false, check: 'relevance', reason: 'off-topic' });
      if (!result.ok) {
        expect(result.feedback).toBe('Argument is off-topic. Address the debate topic "Should AI be regulated?" directly.');
      }
    });

    it('should report the first failing check', () => {
      // Short and off-topic: length is checked first
      const result = validator.isValid('Bananas are yellow.', []);
      expect(result).toMatchObject({ ok: false, check: 'length' });
    });

    it('should be deterministic for identical inputs', () => {
      const used = [AUDITS];
      const first = validator.isValid(AUDITS_PARAPHRASE, used);
      const second = validator.isValid(AUDITS_PARAPHRASE, used);
      expect(second).toEqual(first);
    });
  });

  describe('checkNovelty', () => {
    const used = ['AI reduces bias by 40% in healthcare'];

    it('should reject a reordered paraphrase', () => {
      expect(validator.checkNovelty('AI reduces bias in healthcare by 40%', used)).toMatchObject({
        ok: false,
        reason: 'not novel',
      });
    });

    it('should pass a genuinely distinct candidate', () => {
      expect(
        validator.checkNovelty('Mandatory audits of clinical algorithms expose hidden errors before deployment', used)
      ).toEqual({ ok: true });
    });

    it('should pass opposing arguments of a hundred words or more', () => {
      expect(countWords(REGULATE_CASE)).toBeGreaterThanOrEqual(100);
      expect(countWords(DEREGULATE_CASE)).toBeGreaterThanOrEqual(100);
      expect(validator.isValid(REGULATE_CASE, [])).toEqual({ ok: true });
      expect(validator.isValid(DEREGULATE_CASE, [REGULATE_CASE])).toEqual({ ok: true });
      expect(validator.isValid(REGULATE_CASE, [DEREGULATE_CASE])).toEqual({ ok: true });
    });

    it('should reject a lightly edited copy of a long argument', () => {
      const edited = REGULATE_CASE.replace('quietly penalises', 'silently penalises').replace(
        'nobody consented to',
        'no one agreed to'
      );
      expect(validator.checkNovelty(edited, [REGULATE_CASE])).toMatchObject({ ok: false, reason: 'not novel' });
    });

    it('should pass anything when nothing has been used', () => {
      expect(validator.checkNovelty(AUDITS, [])).toEqual({ ok: true });
    });
  });

  describe('topics without key terms', () => {
    const vague = new ArgumentValidator('Should it be?');

    it('should require a reasoning marker', () => {
      expect(vague.isValid(AUDITS, [])).toEqual({ ok: true });
      expect(
        vague.isValid('Bananas grow best in warm humid climates with plenty of rain and rich volcanic soil.', [])
      ).toMatchObject({ ok: false, check: 'relevance' });
    });
  });

  describe('thresholds', () => {
    it('should use the defaults', () => {
      expect(validator.getThresholds()).toEqual(DEFAULT_VALIDATOR_THRESHOLDS);
    });

    it('should accept overrides', () => {
      const lenient = new ArgumentValidator(TOPIC, { minWords: 2, minChars: 5, minUniqueWords: 1 });
      expect(lenient.checkLength('AI is risky.')).toEqual({ ok: true });
    });

    it('should expose one reason per check', () => {
      expect(Object.keys(REJECTION_REASONS)).toEqual(['length', 'placeholder', 'substance', 'novelty', 'relevance']);
    });
  });
});
