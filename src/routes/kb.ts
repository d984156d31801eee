import express from 'express';
import { InvalidArgumentError } from '../errors.js';
import { type KnowledgeBaseHandle, loadKnowledgeBase } from '../reasoner/knowledge.js';
import { sendError } from './http.js';

export default function kbRouter(kb: KnowledgeBaseHandle, kbPath: string) {
  const router = express.Router();

  router.get('/stats', (_req, res) => {
    res.json(kb.current().stats());
  });

  router.get('/interventions', (_req, res) => {
    res.json(kb.current().getAll());
  });

  router.get('/interventions/:id', (req, res) => {
    try {
      const id = Number(req.params.id);
      if (!Number.isInteger(id) || id < 1) throw new InvalidArgumentError(`Invalid intervention id "${req.params.id}"`);
      res.json(kb.current().getById(id));
    } catch (error) {
      sendError(res, error, 'KB');
    }
  });

  router.get('/search', (req, res) => {
    const raw = typeof req.query.keywords === 'string' ? req.query.keywords : '';
    const keywords = raw.split(',').map(k => k.trim()).filter(Boolean);
    res.json(kb.current().searchByKeywords(keywords));
  });

  router.post('/reload', (_req, res) => {
    try {
      const next = kb.reload(() => loadKnowledgeBase(kbPath));
      console.log(`[KB] reloaded ${next.size} interventions from ${kbPath}`);
      res.json({ status: 'reloaded', size: next.size });
    } catch (error) {
      sendError(res, error, 'KB');
    }
  });

  return router;
}
