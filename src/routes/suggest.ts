import express from 'express';
import { adviseOnIssue, type AdvisorDefaults } from '../advisor.js';
import { renderReportText } from '../explainer.js';
import type { HistoryStore } from '../historyStore.js';
import type { KnowledgeBaseHandle } from '../reasoner/knowledge.js';
import { sendError, sessionIdFor } from './http.js';

export default function suggestRouter(kb: KnowledgeBaseHandle, history: HistoryStore, defaults: AdvisorDefaults) {
  const router = express.Router();

  const advise = async (req: express.Request, res: express.Response) => {
    const advice = adviseOnIssue(kb.current(), req.body, defaults);
    const { context, response, result } = advice;
    console.log(`[Suggest] status=${response.status} tokens=${result.tokens.length} top=${result.ranked[0]?.score.toFixed(3) ?? 'none'}`);
    await history.record(sessionIdFor(req, res), {
      query: context.queryText,
      roadType: context.roadType,
      environment: context.environment,
      status: response.status,
      topInterventionIds: result.ranked.map(r => r.record.id),
      at: new Date().toISOString()
    });
    return advice;
  };

  router.post('/', async (req, res) => {
    try {
      const { response } = await advise(req, res);
      res.json(response);
    } catch (error) {
      sendError(res, error, 'Suggest');
    }
  });

  router.post('/report', async (req, res) => {
    try {
      const { response } = await advise(req, res);
      res.type('text/plain').send(renderReportText(response));
    } catch (error) {
      sendError(res, error, 'Suggest');
    }
  });

  return router;
}

