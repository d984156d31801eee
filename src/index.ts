import 'dotenv/config';

import { loadConfig } from './config.js';
import { connectRedis, createHistoryStore } from './historyStore.js';
import { KnowledgeBaseHandle, loadKnowledgeBase } from './reasoner/knowledge.js';
import { createApp } from './routes/index.js';

const config = loadConfig();

const kb = new KnowledgeBaseHandle(loadKnowledgeBase(config.kbPath));
console.log(`[KB] loaded ${kb.current().size} interventions from ${config.kbPath}`);

const history = createHistoryStore({
  client: config.redisEnabled ? connectRedis(config.redisUrl) : null,
  limit: config.historyLimit
});

const app = createApp({ config, kb, history });
app.listen(config.port, () => console.log(`[Server] listening on port ${config.port}`));
