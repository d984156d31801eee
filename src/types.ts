export type Priority = 'High' | 'Medium' | 'Low';

export interface InterventionRecord {
  readonly id: number;
  readonly issueKeywords: readonly string[];   // normalized, never empty
  readonly interventionText: string;
  readonly reference: string;                  // standard / clause citation
  readonly rationale: string;
  readonly assumptions: string;
  readonly roadTypes: readonly string[];       // empty = applies to every road type
  readonly environmentTags: readonly string[]; // empty = no environment boost
  readonly priority: Priority;
}

export interface QueryContext {
  queryText: string;
  roadType?: string;
  environment?: string;
  topK: number;
  minScoreThreshold: number;
}

export interface ScoreBreakdown {
  base: number;
  roadType: number;
  environment: number;
  priority: number;
}

export interface ScoredCandidate {
  record: InterventionRecord;
  rawScore: number;
  boostedScore: number;
  breakdown: ScoreBreakdown;
}

export interface RankedIntervention {
  record: InterventionRecord;
  score: number;
  breakdown: ScoreBreakdown;
}

export interface RetrievalResult {
  tokens: string[];
  ranked: RankedIntervention[];
  confident: boolean;
  threshold: number;
  roadType: string;
  usedDefaultRoadType: boolean;
}

export type ConfidenceLabel = 'Very High' | 'High' | 'Medium' | 'Low';

export interface Recommendation {
  id: number;
  intervention: string;
  reference: string;
  rationale: string;
  assumptions: string;
  priority: Priority;
  relevanceScore: number; // percent, one decimal
  confidence: ConfidenceLabel;
}

export interface QuerySummary {
  issue: string;
  roadType: string;
  usedDefaultRoadType: boolean;
  environment: string;
}

export interface SuccessResponse {
  status: 'success';
  query: QuerySummary;
  recommendations: Recommendation[];
  totalRecommendations: number;
  metadata: { system: string; note: string };
}

export interface FallbackResponse {
  status: 'no_match';
  query: QuerySummary;
  message: string;
  suggestions: string[];
  fallbackAction: string;
  bestScore: number | null;
}

export type AdviceResponse = SuccessResponse | FallbackResponse;

export interface HistoryEntry {
  query: string;
  roadType?: string;
  environment?: string;
  status: AdviceResponse['status'];
  topInterventionIds: number[];
  at: string;
}
