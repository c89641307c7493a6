/**
 * Argument Validator
 *
 * Admissibility gate applied to every candidate argument before it is
 * committed to the transcript. Checks run in a fixed order and the first
 * failure is reported, so the result is deterministic for identical inputs.
 */

import type { ValidationCheck, ValidationResult, ValidatorThresholds } from '../../types/validation.js';
import {
  containsReasoningMarker,
  contentTokens,
  countWords,
  extractKeyTerms,
  removeFillerPhrases,
  similarity,
  topicOverlap,
} from '../../utils/text.js';

export const DEFAULT_VALIDATOR_THRESHOLDS: ValidatorThresholds = {
  minWords: 10,
  minChars: 20,
  minUniqueWords: 5,
  maxSimilarity: 0.7,
  minTopicOverlap: 1,
};

/**
 * Reason strings reported per check
 */
export const REJECTION_REASONS: Record<ValidationCheck, string> = {
  length: 'too short',
  placeholder: 'placeholder text',
  substance: 'lacks substance',
  novelty: 'not novel',
  relevance: 'off-topic',
};

const PLACEHOLDER_PATTERNS: RegExp[] = [
  /\[[^\]]*\]/, // [placeholder text], [Error ...]
  /<[^>]*>/, // <placeholder>
  /\b(TODO|FIXME|XXX)\b/i,
];

const PASS: ValidationResult = { ok: true };

function reject(check: ValidationCheck, feedback: string): ValidationResult {
  return { ok: false, check, reason: REJECTION_REASONS[check], feedback };
}

export class ArgumentValidator {
  private readonly thresholds: ValidatorThresholds;
  private readonly topicTerms: string[];

  constructor(
    private readonly topic: string,
    thresholds: Partial<ValidatorThresholds> = {}
  ) {
    this.thresholds = { ...DEFAULT_VALIDATOR_THRESHOLDS, ...thresholds };
    this.topicTerms = extractKeyTerms(topic);
  }

  /**
   * Run every check in order and report the first failure
   */
  isValid(candidate: string, usedArguments: readonly string[]): ValidationResult {
    const checks: Array<() => ValidationResult> = [
      () => this.checkLength(candidate),
      () => this.checkPlaceholder(candidate),
      () => this.checkSubstance(candidate),
      () => this.checkNovelty(candidate, usedArguments),
      () => this.checkRelevance(candidate),
    ];

    for (const check of checks) {
      const result = check();
      if (!result.ok) return result;
    }
    return PASS;
  }

  checkLength(candidate: string): ValidationResult {
    const { minWords, minChars } = this.thresholds;
    if (countWords(candidate) < minWords || candidate.trim().length < minChars) {
      return reject(
        'length',
        `Argument is too short. Provide more detailed reasoning (at least ${minWords} words, ${minChars} characters).`
      );
    }
    return PASS;
  }

  checkPlaceholder(candidate: string): ValidationResult {
    if (PLACEHOLDER_PATTERNS.some((pattern) => pattern.test(candidate))) {
      return reject(
        'placeholder',
        'Argument contains placeholder, bracketed or error text. Write the complete argument in plain prose.'
      );
    }
    return PASS;
  }

  /**
   * Filler and hedging phrases are removed; what remains must still carry
   * enough words and enough distinct content terms.
   */
  checkSubstance(candidate: string): ValidationResult {
    const remaining = removeFillerPhrases(candidate);
    const remainingWords = remaining.length === 0 ? 0 : remaining.split(' ').length;
    const distinctContent = new Set(contentTokens(remaining)).size;
    const minRemainingWords = Math.ceil(this.thresholds.minWords * 0.8);

    if (remainingWords < minRemainingWords || distinctContent < this.thresholds.minUniqueWords) {
      return reject(
        'substance',
        'Argument lacks substantive content. Drop filler and hedging phrases and state concrete claims.'
      );
    }
    return PASS;
  }

  checkNovelty(candidate: string, usedArguments: readonly string[]): ValidationResult {
    for (const used of usedArguments) {
      const score = similarity(candidate, used);
      if (score > this.thresholds.maxSimilarity) {
        const excerpt = used.length > 80 ? `${used.slice(0, 80)}...` : used;
        return reject(
          'novelty',
          `Argument repeats an earlier point ("${excerpt}"). Bring a new perspective or new evidence.`
        );
      }
    }
    return PASS;
  }

  /**
   * Topics made only of stop words have no key terms; those fall back to
   * requiring an explicit reasoning marker.
   */
  checkRelevance(candidate: string): ValidationResult {
    if (this.topicTerms.length === 0) {
      return containsReasoningMarker(candidate)
        ? PASS
        : reject('relevance', 'Argument does not engage with the question. Explain your reasoning about the topic.');
    }

    const required = Math.min(this.thresholds.minTopicOverlap, this.topicTerms.length);
    if (topicOverlap(candidate, this.topicTerms) < required) {
      return reject(
        'relevance',
        `Argument is off-topic. Address the debate topic "${this.topic}" directly.`
      );
    }
    return PASS;
  }

  getThresholds(): Readonly<ValidatorThresholds> {
    return this.thresholds;
  }
}
