import type {
  ConfidenceLabel,
  FallbackResponse,
  InterventionRecord,
  QuerySummary,
  Recommendation,
  RetrievalResult,
  SuccessResponse
} from './types.js';

export const SYSTEM_NAME = 'Road Safety Advisor v0.1';
const COST_NOTE = 'Material-only costs; excludes labor and taxes';

// Bins for presentation only; the engine never looks at these.
export function scoreToConfidence(score: number, threshold: number): ConfidenceLabel {
  if (score >= 0.85) return 'Very High';
  if (score >= 0.6) return 'High';
  if (score >= threshold) return 'Medium';
  return 'Low';
}

export function formatRecommendation(record: InterventionRecord, score: number, threshold: number): Recommendation {
  return {
    id: record.id,
    intervention: record.interventionText,
    reference: record.reference,
    rationale: record.rationale,
    assumptions: record.assumptions,
    priority: record.priority,
    relevanceScore: Math.round(score * 1000) / 10,
    confidence: scoreToConfidence(score, threshold)
  };
}

export function summarizeQuery(issue: string, result: RetrievalResult, environment?: string): QuerySummary {
  return {
    issue,
    roadType: result.usedDefaultRoadType ? `${result.roadType} (default)` : result.roadType,
    usedDefaultRoadType: result.usedDefaultRoadType,
    environment: environment?.trim() || 'general'
  };
}

export function buildSuccessResponse(issue: string, result: RetrievalResult, environment?: string): SuccessResponse {
  const recommendations = result.ranked.map(r => formatRecommendation(r.record, r.score, result.threshold));
  return {
    status: 'success',
    query: summarizeQuery(issue, result, environment),
    recommendations,
    totalRecommendations: recommendations.length,
    metadata: { system: SYSTEM_NAME, note: COST_NOTE }
  };
}

export function buildFallbackResponse(issue: string, result: RetrievalResult, environment?: string): FallbackResponse {
  return {
    status: 'no_match',
    query: summarizeQuery(issue, result, environment),
    message: 'No direct standards-aligned intervention found in the knowledge base.',
    suggestions: [
      'Refine your query with a specific road type (urban/highway/rural)',
      'Add environment context (e.g., curve, school zone, intersection)',
      'Check for alternative terms related to the issue',
      'Contact administrators to expand the knowledge base'
    ],
    fallbackAction: 'Please consult road safety engineers or refer to IRC SP:84 and IRC SP:87 for general guidance.',
    bestScore: result.ranked[0]?.score ?? null
  };
}

const RULE = '='.repeat(70);
const THIN = '-'.repeat(70);

export function renderReportText(response: SuccessResponse | FallbackResponse): string {
  const lines: string[] = [RULE, 'ROAD SAFETY INTERVENTION RECOMMENDATION REPORT', RULE, ''];
  lines.push('QUERY DETAILS:');
  lines.push(`  Issue: ${response.query.issue}`);
  lines.push(`  Road Type: ${response.query.roadType}`);
  lines.push(`  Environment: ${response.query.environment}`);
  lines.push('');

  if (response.status === 'no_match') {
    lines.push(response.message);
    for (const s of response.suggestions) lines.push(`  - ${s}`);
    lines.push('');
    lines.push(response.fallbackAction);
    lines.push(RULE);
    return lines.join('\n');
  }

  lines.push('RECOMMENDED INTERVENTIONS:');
  lines.push(THIN);
  response.recommendations.forEach((rec, i) => {
    lines.push(`[Recommendation ${i + 1}]`);
    lines.push(`Intervention: ${rec.intervention}`);
    lines.push(`Reference: ${rec.reference}`);
    lines.push(`Rationale: ${rec.rationale}`);
    lines.push(`Assumptions: ${rec.assumptions}`);
    lines.push(`Priority: ${rec.priority}`);
    lines.push(`Confidence: ${rec.confidence} (${rec.relevanceScore}%)`);
    lines.push(THIN);
  });
  lines.push('');
  lines.push(`NOTE: ${COST_NOTE}.`);
  lines.push(RULE);
  return lines.join('\n');
}
