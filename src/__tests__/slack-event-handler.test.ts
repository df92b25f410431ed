import * as fsp from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import type { Server } from 'node:http';
import { request } from 'undici';
import { computeSlackSignature, verifySlackSignature } from '../slack-event-handler';
import { createRelayServer } from '../server';
import { EventIntake } from '../event-intake';
import { ProcessedEventStore } from '../processed-event-store';
import type { Logger, SendOutcome } from '../types';

const mockLogger: Logger = {
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
  debug: jest.fn(),
};

const SECRET = 'test-secret';

describe('verifySlackSignature', () => {
  const body = Buffer.from('{"type":"event_callback"}');
  const nowMs = 1_700_000_000_000;
  const timestamp = String(nowMs / 1000);

  it('accepts a signature made with the signing secret', () => {
    const signature = computeSlackSignature(SECRET, timestamp, body);
    expect(signature.startsWith('v0=')).toBe(true);
    expect(verifySlackSignature(SECRET, timestamp, body, signature, nowMs)).toBe(true);
  });

  it('rejects a signature made with another secret', () => {
    const signature = computeSlackSignature('other-secret', timestamp, body);
    expect(verifySlackSignature(SECRET, timestamp, body, signature, nowMs)).toBe(false);
  });

  it('rejects stale timestamps', () => {
    const signature = computeSlackSignature(SECRET, timestamp, body);
    expect(verifySlackSignature(SECRET, timestamp, body, signature, nowMs + 6 * 60 * 1000)).toBe(false);
  });

  it('rejects a non-numeric timestamp', () => {
    expect(verifySlackSignature(SECRET, 'soon', body, 'v0=abc', nowMs)).toBe(false);
  });
});

describe('relay server', () => {
  let tmpDir: string;
  let server: Server;
  let baseUrl: string;
  let createRun: jest.Mock;

  async function start(signingSecret?: string): Promise<void> {
    const store = new ProcessedEventStore(path.join(tmpDir, 'processed_events.json'), mockLogger);
    createRun = jest.fn(async () => ({ runId: 'run_1', threadId: 'thread_1', status: 'queued' }));
    const intake = new EventIntake({
      store,
      runner: {
        createRun,
        pollUntilTerminal: async () => 'completed',
        fetchLatestMessage: async () => 'answer',
      },
      notifier: { sendIfNew: async (): Promise<SendOutcome> => 'sent' },
      logger: mockLogger,
    });
    server = createRelayServer({ intake, store, logger: mockLogger, signingSecret });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('server is not listening on a TCP port');
    baseUrl = `http://127.0.0.1:${address.port}`;
  }

  beforeEach(async () => {
    tmpDir = await fsp.mkdtemp(path.join(os.tmpdir(), 'relay-server-test-'));
    jest.clearAllMocks();
  });

  afterEach(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await fsp.rm(tmpDir, { recursive: true, force: true });
  });

  async function post(body: string, headers: Record<string, string> = {}) {
    const resp = await request(`${baseUrl}/slack`, {
      method: 'POST',
      headers: { 'content-type': 'application/json', ...headers },
      body,
    });
    return { status: resp.statusCode, json: await resp.body.json() };
  }

  it('echoes the url_verification challenge', async () => {
    await start();
    const res = await post(JSON.stringify({ type: 'url_verification', challenge: 'abc123' }));
    expect(res).toEqual({ status: 200, json: { challenge: 'abc123' } });
  });

  it('processes a message event end to end', async () => {
    await start();
    const res = await post(JSON.stringify({
      type: 'event_callback',
      event_id: 'Ev1',
      event: { type: 'message', channel: 'C1', text: 'hi', ts: '1700000000.100' },
    }));
    expect(res).toEqual({ status: 200, json: { status: 'ok' } });
    expect(createRun).toHaveBeenCalledWith('hi');
  });

  it('answers 400 for a body that is not JSON', async () => {
    await start();
    const res = await post('not json');
    expect(res).toEqual({ status: 400, json: { status: 'error', message: 'Invalid JSON body' } });
  });

  it('answers 400 for an envelope with mistyped fields', async () => {
    await start();
    const res = await post(JSON.stringify({ event_id: 42 }));
    expect(res.status).toBe(400);
    expect(createRun).not.toHaveBeenCalled();
  });

  it('rejects unsigned requests when a signing secret is configured', async () => {
    await start(SECRET);
    const res = await post(JSON.stringify({ type: 'url_verification', challenge: 'abc123' }));
    expect(res).toEqual({ status: 401, json: { status: 'error', message: 'Invalid Slack signature' } });
  });

  it('accepts correctly signed requests', async () => {
    await start(SECRET);
    const body = JSON.stringify({ type: 'url_verification', challenge: 'abc123' });
    const timestamp = String(Math.floor(Date.now() / 1000));
    const res = await post(body, {
      'x-slack-request-timestamp': timestamp,
      'x-slack-signature': computeSlackSignature(SECRET, timestamp, Buffer.from(body)),
    });
    expect(res).toEqual({ status: 200, json: { challenge: 'abc123' } });
  });

  it('rejects other methods on /slack', async () => {
    await start();
    const resp = await request(`${baseUrl}/slack`, { method: 'GET' });
    expect(resp.statusCode).toBe(405);
    await resp.body.text();
  });

  it('reports health and 404s unknown paths', async () => {
    await start();
    const health = await request(`${baseUrl}/healthz`);
    expect(health.statusCode).toBe(200);
    expect(await health.body.json()).toEqual({ status: 'ok', processedEvents: 0 });

    const missing = await request(`${baseUrl}/nope`);
    expect(missing.statusCode).toBe(404);
    await missing.body.text();
  });
});
