import express from 'express';
import type { HistoryStore } from '../historyStore.js';
import { sendError, sessionIdFor } from './http.js';

export default function historyRouter(history: HistoryStore) {
  const router = express.Router();

  router.get('/', async (req, res) => {
    try {
      res.json({ entries: await history.list(sessionIdFor(req, res)) });
    } catch (error) {
      sendError(res, error, 'History');
    }
  });

  router.delete('/', async (req, res) => {
    try {
      await history.clear(sessionIdFor(req, res));
      res.status(204).end();
    } catch (error) {
      sendError(res, error, 'History');
    }
  });

  return router;
}
