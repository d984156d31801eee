import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { LoadError, NotFoundError, errorMessage } from '../errors.js';
import type { InterventionRecord, Priority } from '../types.js';
import { normalizeText } from './text.js';

export const DEFAULT_ASSUMPTIONS = 'Material-only cost; excludes labor and taxes.';

export const RawInterventionSchema = z.object({
  id: z.number().int().positive(),
  issue_keywords: z.array(z.string()),
  intervention: z.string().min(1),
  reference: z.string().min(1),
  rationale: z.string().min(1),
  assumptions: z.string().optional(),
  road_types: z.array(z.string()).default([]),
  environment_tags: z.array(z.string()).default([]),
  priority: z.enum(['High', 'Medium', 'Low'])
});

export type RawIntervention = z.input<typeof RawInterventionSchema>;

export type KnowledgeBaseStats = {
  totalInterventions: number;
  roadTypes: string[];
  priorityBreakdown: Record<Priority, number>;
  references: string[];
};

function normalizeTags(tags: string[]): string[] {
  return Array.from(new Set(tags.map(normalizeText).filter(Boolean)));
}

/**
 * Immutable, loaded-once collection of interventions.
 *
 * Build one with {@link KnowledgeBase.fromRecords}; a malformed row rejects the
 * whole batch so callers never see a partially populated base.
 */
export class KnowledgeBase {
  private readonly records: readonly InterventionRecord[];
  private readonly byId: ReadonlyMap<number, InterventionRecord>;

  private constructor(records: InterventionRecord[]) {
    this.records = Object.freeze(records);
    this.byId = new Map(records.map((r): [number, InterventionRecord] => [r.id, r]));
  }

  static empty(): KnowledgeBase {
    return new KnowledgeBase([]);
  }

  static fromRecords(rows: unknown): KnowledgeBase {
    if (!Array.isArray(rows)) throw new LoadError('Knowledge base source must be an array of records');

    const issues: string[] = [];
    const records: InterventionRecord[] = [];
    const seen = new Set<number>();

    rows.forEach((row: unknown, i: number) => {
      const parsed = RawInterventionSchema.safeParse(row);
      if (!parsed.success) {
        for (const issue of parsed.error.issues) {
          issues.push(`row ${i}: ${issue.path.join('.') || '(record)'} ${issue.message}`);
        }
        return;
      }
      const raw = parsed.data;
      const issueKeywords = normalizeTags(raw.issue_keywords);
      if (issueKeywords.length === 0) {
        issues.push(`row ${i}: id ${raw.id} has no issue keywords`);
        return;
      }
      if (seen.has(raw.id)) {
        issues.push(`row ${i}: duplicate id ${raw.id}`);
        return;
      }
      seen.add(raw.id);
      records.push(Object.freeze({
        id: raw.id,
        issueKeywords: Object.freeze(issueKeywords),
        interventionText: raw.intervention.trim(),
        reference: raw.reference.trim(),
        rationale: raw.rationale.trim(),
        assumptions: raw.assumptions?.trim() || DEFAULT_ASSUMPTIONS,
        roadTypes: Object.freeze(normalizeTags(raw.road_types)),
        environmentTags: Object.freeze(normalizeTags(raw.environment_tags)),
        priority: raw.priority
      }));
    });

    if (issues.length) throw new LoadError('Invalid knowledge base', issues);
    return new KnowledgeBase(records);
  }

  get size(): number {
    return this.records.length;
  }

  getAll(): readonly InterventionRecord[] {
    return this.records;
  }

  getById(id: number): InterventionRecord {
    const rec = this.byId.get(id);
    if (!rec) throw new NotFoundError(`No intervention with id ${id}`);
    return rec;
  }

  /** Records sharing at least one keyword with the argument. A pre-filter; ranking never uses it. */
  searchByKeywords(keywords: Iterable<string>): InterventionRecord[] {
    const wanted = new Set(Array.from(keywords, normalizeText).filter(Boolean));
    if (wanted.size === 0) return [];
    return this.records.filter(r => r.issueKeywords.some(k => wanted.has(k)));
  }

  stats(): KnowledgeBaseStats {
    const priorityBreakdown: Record<Priority, number> = { High: 0, Medium: 0, Low: 0 };
    const roadTypes = new Set<string>();
    const references = new Set<string>();
    for (const r of this.records) {
      priorityBreakdown[r.priority] += 1;
      r.roadTypes.forEach(t => roadTypes.add(t));
      references.add(r.reference);
    }
    return {
      totalInterventions: this.records.length,
      roadTypes: [...roadTypes].sort(),
      priorityBreakdown,
      references: [...references].sort()
    };
  }
}

export function loadKnowledgeBase(file: string): KnowledgeBase {
  const p = path.resolve(process.cwd(), file);
  let rows: unknown;
  try {
    rows = JSON.parse(fs.readFileSync(p, 'utf8'));
  } catch (err) {
    throw new LoadError(`Cannot read knowledge base at ${p}`, [errorMessage(err)]);
  }
  return KnowledgeBase.fromRecords(rows);
}

/**
 * Holds the live snapshot. Readers call {@link current} once per request and
 * keep that reference; a reload builds the replacement completely before
 * swapping it in.
 */
export class KnowledgeBaseHandle {
  private snapshot: KnowledgeBase;

  constructor(initial: KnowledgeBase) {
    this.snapshot = initial;
  }

  current(): KnowledgeBase {
    return this.snapshot;
  }

  reload(build: () => KnowledgeBase): KnowledgeBase {
    const next = build();
    this.snapshot = next;
    return next;
  }
}
