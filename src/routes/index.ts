import express from 'express';
import cookieParser from 'cookie-parser';
import type { AppConfig } from '../config.js';
import { SYSTEM_NAME } from '../explainer.js';
import type { HistoryStore } from '../historyStore.js';
import type { KnowledgeBaseHandle } from '../reasoner/knowledge.js';
import historyRouter from './history.js';
import { fromMiddlewareError, sendError } from './http.js';
import kbRouter from './kb.js';
import suggestRouter from './suggest.js';

export type AppDeps = {
  config: AppConfig;
  kb: KnowledgeBaseHandle;
  history: HistoryStore;
};

export function createApp({ config, kb, history }: AppDeps) {
  const app = express();
  app.use(express.json());
  app.use(cookieParser());

  app.get('/', (_req, res) => {
    res.json({
      name: SYSTEM_NAME,
      description: 'Road safety intervention recommendations',
      endpoints: {
        '/suggest': 'POST - ranked intervention recommendations',
        '/suggest/report': 'POST - plain-text recommendation report',
        '/kb/stats': 'GET - knowledge base statistics',
        '/kb/interventions': 'GET - all interventions',
        '/kb/interventions/:id': 'GET - one intervention by id',
        '/kb/search': 'GET - interventions sharing any of ?keywords=a,b',
        '/kb/reload': 'POST - reload the knowledge base from disk',
        '/history': 'GET/DELETE - recent queries for this session',
        '/health': 'GET - health check'
      }
    });
  });

  app.get('/health', (_req, res) => {
    res.json({ status: 'healthy', kbSize: kb.current().size });
  });

  app.use('/suggest', suggestRouter(kb, history, {
    topK: config.defaultTopK,
    minScoreThreshold: config.minScoreThreshold
  }));
  app.use('/kb', kbRouter(kb, config.kbPath));
  app.use('/history', historyRouter(history));

  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    sendError(res, fromMiddlewareError(err), 'Server');
  });

  return app;
}
