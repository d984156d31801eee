import { Redis } from 'ioredis';
import { z } from 'zod';
import type { HistoryEntry } from './types.js';

/** The slice of the ioredis client the store uses. */
export interface HistoryClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  del(key: string): Promise<number>;
}

export interface HistoryStore {
  record(sessionId: string, entry: HistoryEntry): Promise<void>;
  list(sessionId: string): Promise<HistoryEntry[]>;
  clear(sessionId: string): Promise<void>;
}

const HistoryEntrySchema = z.object({
  query: z.string(),
  roadType: z.string().optional(),
  environment: z.string().optional(),
  status: z.enum(['success', 'no_match']),
  topInterventionIds: z.array(z.number()),
  at: z.string()
});

// Entries that fail validation are dropped.
function normalize(raw: unknown): HistoryEntry[] {
  if (!Array.isArray(raw)) return [];
  const out: HistoryEntry[] = [];
  for (const item of raw) {
    const parsed = HistoryEntrySchema.safeParse(item);
    if (parsed.success) out.push(parsed.data);
  }
  return out;
}

const keyFor = (id: string) => `history:${id}`;

export function createHistoryStore(opts: { client?: HistoryClient | null; limit: number }): HistoryStore {
  const { client, limit } = opts;
  const mem = new Map<string, HistoryEntry[]>();

  if (!client) {
    return {
      async record(sessionId, entry) {
        mem.set(sessionId, [entry, ...(mem.get(sessionId) ?? [])].slice(0, limit));
      },
      async list(sessionId) {
        return [...(mem.get(sessionId) ?? [])];
      },
      async clear(sessionId) {
        mem.delete(sessionId);
      }
    };
  }

  const read = async (sessionId: string): Promise<HistoryEntry[]> => {
    const data = await client.get(keyFor(sessionId));
    if (!data) return [];
    try {
      return normalize(JSON.parse(data));
    } catch (err) {
      console.error(`[historyStore] corrupt history for ${sessionId}, resetting`, err);
      return [];
    }
  };

  return {
    async record(sessionId, entry) {
      const next = [entry, ...(await read(sessionId))].slice(0, limit);
      await client.set(keyFor(sessionId), JSON.stringify(next));
    },
    list: read,
    async clear(sessionId) {
      await client.del(keyFor(sessionId));
    }
  };
}

export function connectRedis(url?: string): Redis {
  const redis = url ? new Redis(url) : new Redis();
  redis.on('error', (e) => console.error('[Redis]', e));
  return redis;
}
