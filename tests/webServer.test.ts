/**
 * Tests for the web API, run against an in-process server on an ephemeral port
 */

import fetch from 'node-fetch';
import { RawData, WebSocket } from 'ws';
import { WebServer, WebServerEvent } from '../src/infrastructure/web/WebServer.js';
import { SessionService } from '../src/application/services/SessionService.js';
import { HumanizerService, EMPTY_ARTICLE_WARNING } from '../src/application/services/HumanizerService.js';
import { ModelInvocationError } from '../src/core/errors.js';
import { CompletionResult } from '../src/core/entities/Model.js';
import { FakeLlmClientFactory, deferred } from './fakes.js';

describe('WebServer', () => {
  let factory: FakeLlmClientFactory;
  let sessions: SessionService;
  let server: WebServer;
  let baseUrl: string;

  const request = async (method: string, path: string, body?: unknown) => {
    const res = await fetch(`${baseUrl}${path}`, {
      method,
      headers: { 'Content-Type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    return { status: res.status, body: await res.json() };
  };

  const createSession = async (): Promise<string> => {
    const { body } = await request('POST', '/api/sessions', {});
    return body.data.sessionId;
  };

  beforeEach(async () => {
    jest.spyOn(console, 'error').mockImplementation(() => {});
    factory = new FakeLlmClientFactory();
    sessions = new SessionService();
    server = new WebServer(sessions, new HumanizerService(factory, 'test-secret'), 0);
    await server.start();
    baseUrl = `http://127.0.0.1:${server.getPort()}`;
  });

  afterEach(async () => {
    await server.stop();
    jest.restoreAllMocks();
  });

  test('should serve the page', async () => {
    const res = await fetch(`${baseUrl}/`);
    expect(res.status).toBe(200);
    expect(await res.text()).toContain('<title>AI Article Humanizer (Groq)</title>');
  });

  test('should list the available models', async () => {
    const { status, body } = await request('GET', '/api/models');

    expect(status).toBe(200);
    expect(body).toEqual({
      success: true,
      data: {
        models: ['llama-3.3-70b-versatile', 'llama-3.1-8b-instant', 'mixtral-8x7b-32768'],
        defaultModel: 'llama-3.1-8b-instant',
      },
    });
  });

  test('should create a session in initial mode', async () => {
    const { status, body } = await request('POST', '/api/sessions', { model: 'mixtral-8x7b-32768' });

    expect(status).toBe(201);
    expect(body.data).toMatchObject({ model: 'mixtral-8x7b-32768', mode: 'initial', messages: [] });
    expect(sessions.hasSession(body.data.sessionId)).toBe(true);
  });

  test('should warn about a blank article without changing the session', async () => {
    const sessionId = await createSession();

    const { status, body } = await request('POST', `/api/sessions/${sessionId}/turns`, { input: '   ' });

    expect(status).toBe(422);
    expect(body.warning).toBe(EMPTY_ARTICLE_WARNING);
    expect(body.data.messages).toEqual([]);
    expect(factory.calls).toHaveLength(0);
  });

  test('should run an initial turn and then a refinement', async () => {
    factory.queue({ type: 'content', content: 'Hello, world.' }, { type: 'content', content: 'Hi.' });
    const sessionId = await createSession();

    const first = await request('POST', `/api/sessions/${sessionId}/turns`, { input: 'Hello world.' });
    expect(first.status).toBe(200);
    expect(first.body.data.mode).toBe('initial');
    expect(first.body.data.session.mode).toBe('refinement');

    const second = await request('POST', `/api/sessions/${sessionId}/turns`, { input: 'make it shorter' });
    expect(second.body.data.mode).toBe('refinement');
    expect(
      second.body.data.session.messages.map((m: { role: string; content: string }) => [m.role, m.content])
    ).toEqual([
      ['user', 'Hello world.'],
      ['assistant', 'Hello, world.'],
      ['user', 'make it shorter'],
      ['assistant', 'Hi.'],
    ]);
  });

  test('should report model failures generically', async () => {
    factory.queue(new ModelInvocationError('HTTP error! status: 429', 'llama-3.1-8b-instant', 429));
    const sessionId = await createSession();

    const { status, body } = await request('POST', `/api/sessions/${sessionId}/turns`, { input: 'Article' });

    expect(status).toBe(502);
    expect(body).toEqual({ success: false, error: 'Model request failed' });
    expect(sessions.getSession(sessionId).conversation.isEmpty()).toBe(true);
  });

  test('should return 404 for unknown sessions', async () => {
    const { status, body } = await request('GET', '/api/sessions/nope');

    expect(status).toBe(404);
    expect(body).toEqual({ success: false, error: 'Session not found: nope' });
  });

  test('should validate request bodies', async () => {
    const sessionId = await createSession();

    const missingInput = await request('POST', `/api/sessions/${sessionId}/turns`, {});
    const badModel = await request('PUT', `/api/sessions/${sessionId}/model`, { model: 'gpt-4o' });

    expect(missingInput.status).toBe(400);
    expect(badModel.status).toBe(400);
    expect(sessions.getSession(sessionId).model).toBe('llama-3.1-8b-instant');
  });

  test('should switch the model for later turns', async () => {
    const sessionId = await createSession();

    const { status, body } = await request('PUT', `/api/sessions/${sessionId}/model`, {
      model: 'llama-3.3-70b-versatile',
    });
    await request('POST', `/api/sessions/${sessionId}/turns`, { input: 'Article' });

    expect(status).toBe(200);
    expect(body.data.model).toBe('llama-3.3-70b-versatile');
    expect(factory.calls[0].model).toBe('llama-3.3-70b-versatile');
  });

  test('should list sessions', async () => {
    const sessionId = await createSession();

    const { body } = await request('GET', '/api/sessions');

    expect(body.data).toHaveLength(1);
    expect(body.data[0]).toMatchObject({ sessionId, messageCount: 0 });
  });

  describe('WebSocket updates', () => {
    const openSocket = () => new WebSocket(baseUrl.replace('http', 'ws'));

    const nextEvent = (ws: WebSocket, type: WebServerEvent['type']) =>
      new Promise<WebServerEvent>((resolve, reject) => {
        const onMessage = (data: RawData) => {
          const event: WebServerEvent = JSON.parse(data.toString());
          if (event.type === type) {
            ws.off('message', onMessage);
            resolve(event);
          }
        };
        ws.on('message', onMessage);
        ws.on('error', reject);
      });

    const startRefinableSession = async (): Promise<string> => {
      const sessionId = await createSession();
      await request('POST', `/api/sessions/${sessionId}/turns`, { input: 'Draft article.' });
      return sessionId;
    };

    test('should push an update after an initial turn', async () => {
      const sessionId = await createSession();
      const ws = openSocket();
      await nextEvent(ws, 'connected');

      const updated = nextEvent(ws, 'conversation_updated');
      await request('POST', `/api/sessions/${sessionId}/turns`, { input: 'Article' });

      expect(await updated).toMatchObject({ type: 'conversation_updated', sessionId });
      ws.close();
    });

    test('should push the follow-up before the model answers', async () => {
      const sessionId = await startRefinableSession();
      const reply = deferred<CompletionResult>();
      factory.queue(reply.promise);
      const ws = openSocket();
      await nextEvent(ws, 'connected');

      const updated = nextEvent(ws, 'conversation_updated');
      const turn = request('POST', `/api/sessions/${sessionId}/turns`, { input: 'make it shorter' });
      await updated;

      const pending = sessions.getSession(sessionId);
      expect(pending.turnInFlight).toBe(true);
      expect(pending.conversation.messages().map((m) => m.role)).toEqual(['user', 'assistant', 'user']);

      reply.resolve({ type: 'content', content: 'Short.' });
      const { status, body } = await turn;

      expect(status).toBe(200);
      expect(body.data.session.messages).toHaveLength(4);
      ws.close();
    });

    test('should keep the unanswered follow-up when a refinement fails', async () => {
      const sessionId = await startRefinableSession();
      factory.queue(new ModelInvocationError('HTTP error! status: 503', 'llama-3.1-8b-instant', 503));
      const ws = openSocket();
      await nextEvent(ws, 'connected');

      const updated = nextEvent(ws, 'conversation_updated');
      const { status, body } = await request('POST', `/api/sessions/${sessionId}/turns`, {
        input: 'more formal',
      });
      await updated;

      expect(status).toBe(502);
      expect(body).toEqual({ success: false, error: 'Model request failed' });
      const messages = sessions.getSession(sessionId).conversation.messages();
      expect(messages.map((m) => [m.role, m.content])).toEqual([
        ['user', 'Draft article.'],
        ['assistant', 'Polished text'],
        ['user', 'more formal'],
      ]);
      ws.close();
    });
  });

  test('should answer malformed JSON with a JSON error', async () => {
    const sessionId = await createSession();

    const res = await fetch(`${baseUrl}/api/sessions/${sessionId}/turns`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"input": ',
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ success: false, error: 'Invalid JSON body' });
    expect(sessions.getSession(sessionId).conversation.isEmpty()).toBe(true);
  });
});
