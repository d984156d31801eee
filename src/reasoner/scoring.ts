import stringSimilarity from 'string-similarity';
import type { InterventionRecord, Priority, ScoredCandidate } from '../types.js';
import { queryPhrases } from './tokenize.js';

export const ROAD_TYPE_BOOST = 0.15;
export const ENVIRONMENT_BOOST_MAX = 0.25;
export const PRIORITY_WEIGHTS: Record<Priority, number> = { High: 0.03, Medium: 0.015, Low: 0.005 };
export const PRIORITY_RANK: Record<Priority, number> = { High: 0, Medium: 1, Low: 2 };
export const DEFAULT_ROAD_TYPE = 'urban';

// Dice similarity below this is noise between unrelated words, not a typo or inflection.
export const MATCH_CUTOFF = 0.6;

export type ScoringQuery = {
  tokens: string[];
  roadType: string;      // normalized, default already applied
  environment?: string;  // normalized
};

export function clamp01(x: number) { return Math.max(0, Math.min(1, x)); }

export function fuzzySimilarity(a: string, b: string): number {
  return stringSimilarity.compareTwoStrings(a, b);
}

export function baseSimilarity(tokens: string[], keywords: readonly string[]): number {
  const longest = Math.max(2, ...keywords.map(kw => kw.split(' ').length));
  const phrases = queryPhrases(tokens, longest);
  let best = 0;
  for (const kw of keywords) {
    for (const p of phrases) {
      const s = fuzzySimilarity(p, kw);
      if (s >= MATCH_CUTOFF && s > best) best = s;
    }
  }
  return best;
}

export function roadTypeBoost(record: InterventionRecord, roadType: string): number {
  if (record.roadTypes.length === 0) return ROAD_TYPE_BOOST;
  return record.roadTypes.includes(roadType) ? ROAD_TYPE_BOOST : 0;
}

export function environmentBoost(record: InterventionRecord, tokens: string[], environment?: string): number {
  const tags = record.environmentTags;
  if (tags.length === 0) return 0;
  // A tag matches when all its words come from the query or the supplied environment.
  const seen = new Set([...tokens, ...(environment ? environment.split(' ') : [])]);
  const matched = tags.filter(tag => tag.split(' ').every(w => seen.has(w)));
  return ENVIRONMENT_BOOST_MAX * (matched.length / tags.length);
}

export function priorityWeight(priority: Priority): number {
  return PRIORITY_WEIGHTS[priority];
}

/**
 * Scores one record against a query:
 * `clamp(base + roadType + environment + priority, 0, 1)`.
 *
 * Boosts only amplify a content match. A record whose keywords match nothing
 * scores 0 with an all-zero breakdown.
 */
export function scoreRecord(record: InterventionRecord, query: ScoringQuery): ScoredCandidate {
  const base = baseSimilarity(query.tokens, record.issueKeywords);
  if (base === 0) {
    return {
      record,
      rawScore: 0,
      boostedScore: 0,
      breakdown: { base: 0, roadType: 0, environment: 0, priority: 0 }
    };
  }
  const breakdown = {
    base,
    roadType: roadTypeBoost(record, query.roadType),
    environment: environmentBoost(record, query.tokens, query.environment),
    priority: priorityWeight(record.priority)
  };
  return {
    record,
    rawScore: base,
    boostedScore: clamp01(base + breakdown.roadType + breakdown.environment + breakdown.priority),
    breakdown
  };
}
