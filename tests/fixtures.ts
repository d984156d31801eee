import type { RawIntervention } from '../src/reasoner/knowledge.js';
import type { InterventionRecord } from '../src/types.js';

export function raw(overrides: Partial<RawIntervention> & { id: number }): RawIntervention {
  return {
    issue_keywords: ['pothole'],
    intervention: `Intervention ${overrides.id}`,
    reference: 'IRC 35',
    rationale: `Rationale ${overrides.id}`,
    road_types: [],
    environment_tags: [],
    priority: 'Medium',
    ...overrides
  };
}

export function record(overrides: Partial<InterventionRecord> & { id: number }): InterventionRecord {
  return {
    issueKeywords: ['pothole'],
    interventionText: `Intervention ${overrides.id}`,
    reference: 'IRC 35',
    rationale: `Rationale ${overrides.id}`,
    assumptions: 'Material-only cost; excludes labor and taxes.',
    roadTypes: [],
    environmentTags: [],
    priority: 'Medium',
    ...overrides
  };
}

/** Small base shared by the engine and advisor tests. */
export const ENGINE_ROWS: RawIntervention[] = [
  raw({ id: 1, issue_keywords: ['pothole'], priority: 'Medium' }),
  raw({ id: 2, issue_keywords: ['chevron', 'curve'], road_types: ['Highway'], environment_tags: ['Curve'], priority: 'High' }),
  raw({ id: 3, issue_keywords: ['faded marking', 'lane marking'], road_types: ['Urban'], environment_tags: ['night'], priority: 'Low' }),
  raw({ id: 4, issue_keywords: ['school zone', 'pedestrian'], road_types: ['Urban'], environment_tags: ['school'], priority: 'High' }),
  raw({ id: 5, issue_keywords: ['guardrail'], road_types: ['Highway'], priority: 'Low' })
];
