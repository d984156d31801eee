import fs from 'fs';
import os from 'os';
import path from 'path';
import { once } from 'events';
import type { Server } from 'http';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import type { AppConfig } from '../src/config.js';
import { createHistoryStore } from '../src/historyStore.js';
import { KnowledgeBaseHandle, loadKnowledgeBase } from '../src/reasoner/knowledge.js';
import { createApp } from '../src/routes/index.js';
import { ENGINE_ROWS, raw } from './fixtures.js';

let dir: string;
let kbFile: string;
let server: Server;
let base: string;

beforeAll(async () => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'rsa-routes-'));
  kbFile = path.join(dir, 'interventions.json');
  fs.writeFileSync(kbFile, JSON.stringify(ENGINE_ROWS));

  const config: AppConfig = {
    port: 0,
    kbPath: kbFile,
    minScoreThreshold: 0.3,
    defaultTopK: 3,
    historyLimit: 10,
    redisEnabled: false
  };
  const app = createApp({
    config,
    kb: new KnowledgeBaseHandle(loadKnowledgeBase(kbFile)),
    history: createHistoryStore({ limit: config.historyLimit })
  });
  server = app.listen(0, '127.0.0.1');
  await once(server, 'listening');
  const address = server.address();
  if (!address || typeof address === 'string') throw new Error('server has no TCP address');
  base = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  server.close();
  await once(server, 'close');
  fs.rmSync(dir, { recursive: true, force: true });
});

const postJson = (url: string, body: unknown, headers: Record<string, string> = {}) =>
  fetch(base + url, {
    method: 'POST',
    headers: { 'content-type': 'application/json', ...headers },
    body: JSON.stringify(body)
  });

describe('POST /suggest', () => {
  it('answers, issues a session cookie and records the query', async () => {
    const res = await postJson('/suggest', { query: 'pothole on the road' });
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'success', recommendations: [{ id: 1 }] });

    const setCookie = res.headers.get('set-cookie') ?? '';
    expect(setCookie).toMatch(/^sessionId=[0-9a-f-]{36};/);
    const cookie = setCookie.split(';')[0];

    const history = await fetch(`${base}/history`, { headers: { cookie } });
    expect(history.headers.get('set-cookie')).toBeNull();
    expect(await history.json()).toMatchObject({
      entries: [{ query: 'pothole on the road', status: 'success', topInterventionIds: [1] }]
    });

    const cleared = await fetch(`${base}/history`, { method: 'DELETE', headers: { cookie } });
    expect(cleared.status).toBe(204);
    expect(await (await fetch(`${base}/history`, { headers: { cookie } })).json()).toEqual({ entries: [] });
  });

  it('rejects a query with no meaningful terms with 422', async () => {
    const res = await postJson('/suggest', { query: 'the of' });
    expect(res.status).toBe(422);
    const message = 'Query has no meaningful terms after normalization';
    expect(await res.json()).toEqual({ error: message, code: 'EMPTY_QUERY', details: message });
  });

  it('rejects an out-of-range top_k with 400', async () => {
    const res = await postJson('/suggest', { query: 'pothole', top_k: 0 });
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ code: 'INVALID_ARGUMENT' });
  });

  it('turns a malformed JSON body into a JSON 400', async () => {
    const res = await fetch(`${base}/suggest`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: '{"query": '
    });
    expect(res.status).toBe(400);
    expect(res.headers.get('content-type')).toMatch(/^application\/json/);
    expect(await res.json()).toMatchObject({ code: 'INVALID_ARGUMENT' });
  });

  it('renders the plain-text report', async () => {
    const res = await postJson('/suggest/report', { query: 'pothole' });
    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toMatch(/^text\/plain/);
    const text = await res.text();
    expect(text).toContain('[Recommendation 1]');
    expect(text).toContain('Intervention: Intervention 1');
  });
});

describe('GET /', () => {
  it('lists the knowledge base endpoints', async () => {
    const body = await (await fetch(`${base}/`)).json();
    expect(body).toMatchObject({
      endpoints: {
        '/kb/interventions': expect.any(String),
        '/kb/interventions/:id': expect.any(String),
        '/kb/search': expect.any(String),
        '/kb/reload': expect.any(String)
      }
    });
  });
});

describe('/kb', () => {
  it('returns one intervention by id', async () => {
    const res = await fetch(`${base}/kb/interventions/2`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ id: 2, issueKeywords: ['chevron', 'curve'] });
  });

  it('rejects a non-numeric id with 400', async () => {
    const res = await fetch(`${base}/kb/interventions/abc`);
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ code: 'INVALID_ARGUMENT' });
  });

  it('answers 404 for an unknown id', async () => {
    const res = await fetch(`${base}/kb/interventions/99`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: 'No intervention with id 99',
      code: 'NOT_FOUND',
      details: 'No intervention with id 99'
    });
  });

  it('splits and normalizes comma-separated search keywords', async () => {
    const res = await fetch(`${base}/kb/search?keywords=Pothole,%20guardrail`);
    expect(await res.json()).toMatchObject([{ id: 1 }, { id: 5 }]);
    expect(await (await fetch(`${base}/kb/search?keywords=`)).json()).toEqual([]);
  });

  it('keeps the previous snapshot when a reload fails', async () => {
    fs.writeFileSync(kbFile, JSON.stringify([raw({ id: 1 }), raw({ id: 1 })]));
    const failed = await fetch(`${base}/kb/reload`, { method: 'POST' });
    expect(failed.status).toBe(500);
    expect(await failed.json()).toEqual({ error: 'Internal Server Error', code: 'LOAD_ERROR' });
    expect(await (await fetch(`${base}/health`)).json()).toEqual({ status: 'healthy', kbSize: 5 });

    fs.writeFileSync(kbFile, JSON.stringify([raw({ id: 1 }), raw({ id: 2 })]));
    const ok = await fetch(`${base}/kb/reload`, { method: 'POST' });
    expect(await ok.json()).toEqual({ status: 'reloaded', size: 2 });
    expect(await (await fetch(`${base}/health`)).json()).toEqual({ status: 'healthy', kbSize: 2 });
  });
});
