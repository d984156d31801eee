import { z } from 'zod';
import { InvalidArgumentError } from './errors.js';
import { buildFallbackResponse, buildSuccessResponse } from './explainer.js';
import type { KnowledgeBase } from './reasoner/knowledge.js';
import { retrieveAndRank } from './reasoner/reasoner.js';
import type { AdviceResponse, QueryContext, RetrievalResult } from './types.js';

export const SuggestRequestSchema = z.object({
  query: z.string({ required_error: 'query is required' }),
  road_type: z.string().nullish(),
  environment: z.string().nullish(),
  top_k: z.number().nullish(),
  min_score_threshold: z.number().nullish()
});

export type SuggestRequest = z.infer<typeof SuggestRequestSchema>;

export type AdvisorDefaults = {
  topK: number;
  minScoreThreshold: number;
};

export type Advice = {
  context: QueryContext;
  result: RetrievalResult;
  response: AdviceResponse;
};

export function parseSuggestRequest(body: unknown, defaults: AdvisorDefaults): QueryContext {
  const parsed = SuggestRequestSchema.safeParse(body ?? {});
  if (!parsed.success) {
    throw new InvalidArgumentError(parsed.error.issues.map(i => `${i.path.join('.') || 'body'}: ${i.message}`).join('; '));
  }
  const req = parsed.data;
  return {
    queryText: req.query,
    roadType: req.road_type ?? undefined,
    environment: req.environment ?? undefined,
    topK: req.top_k ?? defaults.topK,
    minScoreThreshold: req.min_score_threshold ?? defaults.minScoreThreshold
  };
}

/**
 * One request end to end: validate, rank, then either explain the ranked
 * interventions or hand back the fallback guidance.
 */
export function adviseOnIssue(kb: KnowledgeBase, body: unknown, defaults: AdvisorDefaults): Advice {
  const context = parseSuggestRequest(body, defaults);
  const result = retrieveAndRank(kb, context);
  const response = result.confident
    ? buildSuccessResponse(context.queryText, result, context.environment)
    : buildFallbackResponse(context.queryText, result, context.environment);
  return { context, result, response };
}
