import type { Server } from 'node:http';
import { afterAll, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import { HandlerRegistry } from '../../../src/core/handlers/handlerRegistry';
import { CoordinatorHandler } from '../../../src/core/orchestration/coordinator';
import { InMemorySessionBackend } from '../../../src/core/session/inMemorySessionBackend';
import { SessionStore } from '../../../src/core/session/sessionStore';
import { TutorService } from '../../../src/core/tutorService';
import { createApp } from '../../../src/http/app';
import { createFakeLLM, textResponse, toolCallResponse } from '../../helpers/llm';

const router = createFakeLLM('router-model');
const chat = createFakeLLM('chat-model');

let server: Server;
let baseUrl: string;

beforeAll(async () => {
  const registry = new HandlerRegistry(chat.client);
  const coordinator = new CoordinatorHandler({ registry, chatClient: chat.client, routerClient: router.client });
  const sessions = new SessionStore({ backend: new InMemorySessionBackend(), maxHistory: 5, expiryMs: 3_600_000 });
  const app = createApp({ service: new TutorService({ coordinator, registry, sessions }), sessionBackend: 'memory' });

  server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
  });
  const address = server.address();
  if (!address || typeof address === 'string') throw new Error('Server has no TCP address');
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve) => server.close(() => resolve()));
});

beforeEach(() => {
  router.chat.mockReset();
  chat.chat.mockReset();
});

function post(path: string, body: unknown) {
  return fetch(`${baseUrl}${path}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
}

describe('HTTP app', () => {
  it('reports that it is running', async () => {
    const res = await fetch(`${baseUrl}/`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ message: 'Study router is running', handlers: ['math', 'physics', 'biology'] });
  });

  it('reports health with the session backend', async () => {
    const res = await fetch(`${baseUrl}/health`);
    const body = await res.json();
    expect(body).toMatchObject({ status: 'ok', session_backend: 'memory' });
    expect(body).not.toHaveProperty('cache_healthy');
  });

  it('answers a question and returns the session id', async () => {
    router.chat.mockResolvedValue(toolCallResponse('route_to_math_handler', { reasoning: 'Algebra' }));
    chat.chat.mockResolvedValue(textResponse('x = 5'));

    const res = await post('/ask', { query: 'Solve 2x + 5 = 15 for x', session_id: 'http-1' });

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      answer: 'x = 5',
      handler_used: 'Math Tutor',
      confidence: 0.85,
      sources: ['Math Tutor', 'chat-model', 'equation_solver'],
      session_id: 'http-1',
    });

    const info = await fetch(`${baseUrl}/sessions/http-1`);
    expect(await info.json()).toMatchObject({ exists: true, turnCount: 1 });

    const cleared = await fetch(`${baseUrl}/sessions/http-1`, { method: 'DELETE' });
    expect(await cleared.json()).toEqual({ cleared: true, session_id: 'http-1' });
  });

  it('rejects invalid bodies with 400', async () => {
    const res = await post('/ask', { query: '' });
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: 'Validation error' });
  });

  it('rejects malformed JSON with 400', async () => {
    const res = await fetch(`${baseUrl}/ask`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"query":',
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Malformed JSON body' });
  });

  it('previews a route', async () => {
    router.chat.mockRejectedValue(new Error('router down'));

    const res = await post('/route', { query: 'Explain the force of gravity' });

    expect(await res.json()).toEqual({
      query: 'Explain the force of gravity',
      decision: {
        action: 'delegate',
        handlerKey: 'physics',
        reasoning: 'Fallback (error: router down) - physics keywords detected.',
        source: 'fallback',
      },
      would_delegate: true,
    });
  });

  it('lists handlers', async () => {
    const res = await fetch(`${baseUrl}/handlers`);
    expect(await res.json()).toMatchObject({
      handlers: [
        { key: 'math', name: 'Math Tutor', tools: ['equation_solver', 'formula_lookup'] },
        { key: 'physics', name: 'Physics Tutor', tools: ['formula_lookup'] },
        { key: 'biology', name: 'Biology Tutor', tools: [] },
      ],
    });
  });

  it('asks one handler directly and 404s on unknown handlers', async () => {
    chat.chat.mockResolvedValue(textResponse('Mitochondria make ATP.'));

    const ok = await post('/handlers/biology/ask', { query: 'What do mitochondria do?' });
    expect(await ok.json()).toMatchObject({ answer: 'Mitochondria make ATP.', confidence: 0.85 });

    const missing = await post('/handlers/chemistry/ask', { query: 'What is pH?' });
    expect(missing.status).toBe(404);
    expect(await missing.json()).toEqual({ error: 'Unknown handler: chemistry', code: 'HANDLER_NOT_FOUND' });
  });

  it('reports unknown sessions', async () => {
    const info = await fetch(`${baseUrl}/sessions/ghost`);
    expect(await info.json()).toEqual({ exists: false });

    const res = await fetch(`${baseUrl}/sessions/ghost`, { method: 'DELETE' });
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Unknown session: ghost', code: 'SESSION_NOT_FOUND' });
  });

  it('returns 404 for unknown routes', async () => {
    const res = await fetch(`${baseUrl}/nope`);
    expect(res.status).toBe(404);
  });
});
