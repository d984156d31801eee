import { EmptyQueryError, InvalidArgumentError } from '../errors.js';
import type { QueryContext, RankedIntervention, RetrievalResult, ScoredCandidate } from '../types.js';
import type { KnowledgeBase } from './knowledge.js';
import { DEFAULT_ROAD_TYPE, PRIORITY_RANK, scoreRecord } from './scoring.js';
import { normalizeText } from './text.js';
import { tokenizeQuery } from './tokenize.js';

export const DEFAULT_MIN_SCORE_THRESHOLD = 0.3;

export function validateContext(ctx: Pick<QueryContext, 'topK' | 'minScoreThreshold'>) {
  if (!Number.isInteger(ctx.topK) || ctx.topK < 1) {
    throw new InvalidArgumentError(`topK must be a positive integer, got ${ctx.topK}`);
  }
  const t = ctx.minScoreThreshold;
  if (!Number.isFinite(t) || t < 0 || t > 1) {
    throw new InvalidArgumentError(`minScoreThreshold must be within [0, 1], got ${t}`);
  }
}

// Score desc, then High > Medium > Low, then id asc.
export function compareCandidates(a: ScoredCandidate, b: ScoredCandidate): number {
  if (b.boostedScore !== a.boostedScore) return b.boostedScore - a.boostedScore;
  const byPriority = PRIORITY_RANK[a.record.priority] - PRIORITY_RANK[b.record.priority];
  if (byPriority !== 0) return byPriority;
  return a.record.id - b.record.id;
}

export function checkMinimumThreshold(
  ranked: readonly RankedIntervention[],
  threshold = DEFAULT_MIN_SCORE_THRESHOLD
): boolean {
  return ranked.length > 0 && ranked[0].score >= threshold;
}

/**
 * Scores every record of the snapshot against the query and returns the best
 * `topK`. Records with no keyword match are left out, so an unrelated query
 * yields an empty list with `confident = false`.
 *
 * Pure: no I/O, and the same arguments on the same snapshot give the same output.
 *
 * @throws InvalidArgumentError for a non-positive `topK` or a threshold outside [0, 1]
 * @throws EmptyQueryError when nothing survives tokenization
 */
export function retrieveAndRank(kb: KnowledgeBase, ctx: QueryContext): RetrievalResult {
  validateContext(ctx);

  const tokens = tokenizeQuery(ctx.queryText);
  if (tokens.length === 0) throw new EmptyQueryError();

  const requestedRoadType = normalizeText(ctx.roadType ?? '');
  const roadType = requestedRoadType || DEFAULT_ROAD_TYPE;
  const environment = normalizeText(ctx.environment ?? '') || undefined;

  const ranked: RankedIntervention[] = kb.getAll()
    .map(record => scoreRecord(record, { tokens, roadType, environment }))
    .filter(c => c.rawScore > 0)
    .sort(compareCandidates)
    .slice(0, ctx.topK)
    .map(c => ({ record: c.record, score: c.boostedScore, breakdown: c.breakdown }));

  return {
    tokens,
    ranked,
    confident: checkMinimumThreshold(ranked, ctx.minScoreThreshold),
    threshold: ctx.minScoreThreshold,
    roadType,
    usedDefaultRoadType: !requestedRoadType
  };
}
