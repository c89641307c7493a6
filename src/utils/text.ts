/**
 * Text analysis helpers shared by the validator and the memory manager.
 *
 * Everything here is deterministic: same input, same output.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';

const lexiconSchema = z.object({
  stopWords: z.array(z.string()),
  fillerPhrases: z.array(z.string()),
  reasoningMarkers: z.array(z.string()),
});

export type Lexicon = z.infer<typeof lexiconSchema>;

function loadLexicon(): Lexicon {
  const raw = readFileSync(new URL('../../data/lexicon.json', import.meta.url), 'utf-8');
  return lexiconSchema.parse(JSON.parse(raw));
}

/**
 * Word lists loaded from data/lexicon.json
 */
export const lexicon: Lexicon = loadLexicon();

/**
 * Lowercase, drop possessives and punctuation, collapse whitespace
 */
export function normalizeText(text: string): string {
  return text
    .toLowerCase()
    .replace(/['’]s\b/g, '')
    .replace(/['’]/g, '')
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

const STOP_WORDS = new Set(lexicon.stopWords.map(normalizeText));
const FILLER_PATTERNS = lexicon.fillerPhrases.map(
  (phrase) => new RegExp(`\\b${normalizeText(phrase).replace(/ /g, '\\s+')}\\b`, 'g')
);
const REASONING_PATTERNS = lexicon.reasoningMarkers.map(
  (marker) => new RegExp(`\\b${normalizeText(marker).replace(/ /g, '\\s+')}\\b`)
);

/**
 * Normalized words
 */
export function tokenize(text: string): string[] {
  const normalized = normalizeText(text);
  return normalized.length === 0 ? [] : normalized.split(' ');
}

/**
 * Whitespace-delimited word count of the raw text
 */
export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed.length === 0 ? 0 : trimmed.split(/\s+/).length;
}

export function isStopWord(word: string): boolean {
  return STOP_WORDS.has(word);
}

const SUFFIX_RULES: ReadonlyArray<readonly [suffix: string, replacement: string]> = [
  ['ions', ''],
  ['ion', ''],
  ['ments', ''],
  ['ment', ''],
  ['ness', ''],
  ['ings', ''],
  ['ing', ''],
  ['ors', ''],
  ['or', ''],
  ['ory', ''],
  ['ies', 'y'],
  ['ied', 'y'],
  ['ed', ''],
  ['es', ''],
  ['ly', ''],
  ['s', ''],
];

/**
 * Light suffix stripping so that "regulated", "regulation" and "regulators"
 * all reduce to "regulat". At most one suffix rule applies, and only when at
 * least three characters remain.
 */
export function stem(word: string): string {
  let result = word;

  for (const [suffix, replacement] of SUFFIX_RULES) {
    if (!result.endsWith(suffix)) continue;
    const remainder = result.slice(0, result.length - suffix.length);
    if (remainder.length < 3) continue;
    // "bias", "focus", "analysis" keep their final s
    if (suffix === 's' && /[suia]$/.test(remainder)) continue;
    result = remainder + replacement;
    break;
  }

  if (result.endsWith('e') && result.length - 1 >= 3) {
    result = result.slice(0, -1);
  }

  return result;
}

/**
 * Stemmed tokens that are not stop words
 */
export function contentTokens(text: string): string[] {
  return tokenize(text)
    .filter((word) => word.length >= 2 && !isStopWord(word))
    .map(stem);
}

/**
 * Distinct content stems in first-seen order
 */
export function extractKeyTerms(text: string): string[] {
  return [...new Set(contentTokens(text))];
}

/**
 * Two stems refer to the same term when equal or sharing a 5-character prefix
 */
export function termsMatch(a: string, b: string): boolean {
  if (a === b) return true;
  return a.length >= 5 && b.length >= 5 && a.slice(0, 5) === b.slice(0, 5);
}

/**
 * Number of key terms the text mentions
 */
export function topicOverlap(text: string, keyTerms: readonly string[]): number {
  const tokens = new Set(contentTokens(text));
  let matched = 0;
  for (const term of keyTerms) {
    for (const token of tokens) {
      if (termsMatch(term, token)) {
        matched++;
        break;
      }
    }
  }
  return matched;
}

/**
 * Share of the topic's key terms the text mentions (0-1)
 */
export function topicRelevance(text: string, topic: string): number {
  const keyTerms = extractKeyTerms(topic);
  if (keyTerms.length === 0) return 0;
  return topicOverlap(text, keyTerms) / keyTerms.length;
}

/**
 * Normalized text with filler and hedging phrases removed
 */
export function removeFillerPhrases(text: string): string {
  let cleaned = normalizeText(text);
  for (const pattern of FILLER_PATTERNS) {
    cleaned = cleaned.replace(pattern, ' ');
  }
  return cleaned.replace(/\s+/g, ' ').trim();
}

export function containsReasoningMarker(text: string): boolean {
  const normalized = normalizeText(text);
  return REASONING_PATTERNS.some((pattern) => pattern.test(normalized));
}

function diceCoefficient(a: Map<string, number>, b: Map<string, number>): number {
  let sizeA = 0;
  let sizeB = 0;
  let shared = 0;
  for (const count of a.values()) sizeA += count;
  for (const [key, count] of b) {
    sizeB += count;
    shared += Math.min(count, a.get(key) ?? 0);
  }
  if (sizeA + sizeB === 0) return 0;
  return (2 * shared) / (sizeA + sizeB);
}

function countItems(items: Iterable<string>): Map<string, number> {
  const counts = new Map<string, number>();
  for (const item of items) {
    counts.set(item, (counts.get(item) ?? 0) + 1);
  }
  return counts;
}

/**
 * Distinct runs of `size` consecutive normalized words
 */
export function wordShingles(text: string, size = 3): Set<string> {
  const words = tokenize(text);
  const shingles = new Set<string>();
  for (let i = 0; i + size <= words.length; i++) {
    shingles.add(words.slice(i, i + size).join(' '));
  }
  return shingles;
}

/**
 * Similarity (0-1) between two texts: the larger of the Dice coefficient over
 * distinct content stems and over distinct word 3-grams. The first catches
 * reordered paraphrases, the second near-verbatim copies. Both work on sets,
 * so shared common words do not accumulate with text length.
 */
export function similarity(a: string, b: string): number {
  const tokenScore = diceCoefficient(
    countItems(new Set(contentTokens(a))),
    countItems(new Set(contentTokens(b)))
  );
  const shingleScore = diceCoefficient(countItems(wordShingles(a)), countItems(wordShingles(b)));

  return Math.max(tokenScore, shingleScore);
}
