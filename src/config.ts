import { z } from 'zod';
import { DEFAULT_MIN_SCORE_THRESHOLD } from './reasoner/reasoner.js';

const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  KB_PATH: z.string().min(1).default('knowledge/interventions.json'),
  MIN_SCORE_THRESHOLD: z.coerce.number().min(0).max(1).default(DEFAULT_MIN_SCORE_THRESHOLD),
  DEFAULT_TOP_K: z.coerce.number().int().min(1).max(50).default(3),
  HISTORY_LIMIT: z.coerce.number().int().min(1).max(500).default(20),
  REDIS_ENABLED: z.enum(['true', 'false']).default('false').transform(v => v === 'true'),
  REDIS_URL: z.string().optional()
});

export type AppConfig = {
  port: number;
  kbPath: string;
  minScoreThreshold: number;
  defaultTopK: number;
  historyLimit: number;
  redisEnabled: boolean;
  redisUrl?: string;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }
  const c = parsed.data;
  return {
    port: c.PORT,
    kbPath: c.KB_PATH,
    minScoreThreshold: c.MIN_SCORE_THRESHOLD,
    defaultTopK: c.DEFAULT_TOP_K,
    historyLimit: c.HISTORY_LIMIT,
    redisEnabled: c.REDIS_ENABLED,
    redisUrl: c.REDIS_URL || undefined
  };
}
