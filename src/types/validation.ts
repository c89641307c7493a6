/**
 * Argument Validation Types
 */

/**
 * Checks applied to every candidate argument, in evaluation order
 */
export type ValidationCheck = 'length' | 'placeholder' | 'substance' | 'novelty' | 'relevance';

/**
 * Outcome of validating one candidate
 * `feedback` is phrased as guidance for the agent's next attempt
 */
export type ValidationResult =
  | { ok: true }
  | { ok: false; check: ValidationCheck; reason: string; feedback: string };

/**
 * Thresholds the validator applies
 */
export interface ValidatorThresholds {
  /** Minimum number of words */
  minWords: number;
  /** Minimum number of characters after trimming */
  minChars: number;
  /** Minimum distinct non-filler words */
  minUniqueWords: number;
  /** Similarity above which a candidate is a near-duplicate (0-1) */
  maxSimilarity: number;
  /** Minimum number of topic key terms the candidate must touch */
  minTopicOverlap: number;
}
