/**
 * Assistant Run Client
 *
 * Talks to the job-style assistant backend (Assistants v2 "threads/runs"
 * API): open a thread+run seeded with the user's message, poll the run until
 * it stops moving, then read back the newest message. Every response is
 * decoded against a schema; anything that does not match surfaces as a
 * StructuralError instead of an undefined field further down.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { request, type Dispatcher } from 'undici';
import { z } from 'zod';
import { RunTimeoutError, StructuralError, TransportError } from './errors.js';
import type { Logger, RunHandle, RunStatus } from './types.js';

/** Statuses after which the run may still change. Everything else is terminal. */
const ACTIVE_RUN_STATUSES: ReadonlySet<string> = new Set(['queued', 'in_progress']);

const UNEXPECTED_STRUCTURE = 'Unexpected API response structure';

const createdRunSchema = z.object({
  id: z.string(),
  thread_id: z.string(),
  status: z.string(),
});

/** List endpoints return newest first; only `data[0]` is decoded further. */
const listSchema = z.object({
  data: z.array(z.unknown()).min(1),
});

const runSchema = z.object({ status: z.string() });

const messageSchema = z.object({ content: z.array(z.unknown()).min(1) });

const textContentSchema = z.object({
  text: z.object({ value: z.string() }),
});

export type AssistantClientOptions = {
  apiUrl: string;
  apiKey: string;
  assistantId: string;
  betaHeader: string;
  logger: Logger;
  pollIntervalMs: number;
  /** Upper bound for pollUntilTerminal. Unset waits indefinitely. */
  maxWaitMs?: number;
  /** Custom undici dispatcher (connection pool, proxy, MockAgent in tests). */
  dispatcher?: Dispatcher;
};

export type PollOptions = {
  pollIntervalMs?: number;
  maxWaitMs?: number;
  signal?: AbortSignal;
};

/** The slice of the client the event intake drives. */
export interface AssistantRunner {
  createRun(inputText: string): Promise<RunHandle>;
  pollUntilTerminal(threadId: string, options?: PollOptions): Promise<RunStatus>;
  fetchLatestMessage(threadId: string): Promise<string>;
}

export function isTerminalRunStatus(status: RunStatus): boolean {
  return !ACTIVE_RUN_STATUSES.has(status);
}

export class AssistantClient implements AssistantRunner {
  private readonly opts: AssistantClientOptions;

  constructor(opts: AssistantClientOptions) {
    this.opts = { ...opts, apiUrl: opts.apiUrl.replace(/\/+$/, '') };
  }

  async createRun(inputText: string): Promise<RunHandle> {
    const { logger, assistantId } = this.opts;
    logger.info(`AssistantClient: creating run for input text: ${inputText}`);

    const body = await this.call('create run', 'POST', '/threads/runs', {
      assistant_id: assistantId,
      thread: {
        messages: [{ role: 'user', content: inputText }],
      },
    });
    const run = decode(createdRunSchema, body);

    logger.info(`AssistantClient: run ${run.id} created on thread ${run.thread_id} (status=${run.status})`);
    return { runId: run.id, threadId: run.thread_id, status: run.status };
  }

  async pollUntilTerminal(threadId: string, options: PollOptions = {}): Promise<RunStatus> {
    const { logger } = this.opts;
    const intervalMs = options.pollIntervalMs ?? this.opts.pollIntervalMs;
    const maxWaitMs = options.maxWaitMs ?? this.opts.maxWaitMs;
    const startedAt = Date.now();

    const { signal } = options;

    for (;;) {
      signal?.throwIfAborted();

      const body = await this.call(
        'get run status',
        'GET',
        `/threads/${encodeURIComponent(threadId)}/runs`,
        undefined,
        signal,
      );
      const status = decode(runSchema, decode(listSchema, body).data[0]).status;
      if (isTerminalRunStatus(status)) {
        logger.info(`AssistantClient: run on thread ${threadId} finished with status: ${status}`);
        return status;
      }

      const waitedMs = Date.now() - startedAt;
      if (maxWaitMs !== undefined && waitedMs >= maxWaitMs) {
        throw new RunTimeoutError(threadId, waitedMs);
      }

      logger.debug(`AssistantClient: waiting for run on thread ${threadId} (status=${status})`);
      try {
        await sleep(intervalMs, undefined, { signal });
      } catch (err) {
        // timers/promises rejects with a generic AbortError
        if (signal?.aborted) throw signal.reason;
        throw err;
      }
    }
  }

  async fetchLatestMessage(threadId: string): Promise<string> {
    const { logger } = this.opts;
    logger.info(`AssistantClient: getting messages for thread ${threadId}`);

    const body = await this.call('get thread messages', 'GET', `/threads/${encodeURIComponent(threadId)}/messages`);
    const newest = decode(messageSchema, decode(listSchema, body).data[0]);
    const latest = decode(textContentSchema, newest.content[0]);

    logger.debug(`AssistantClient: latest message on thread ${threadId} is ${latest.text.value.length} chars`);
    return latest.text.value;
  }

  private async call(
    operation: string,
    method: 'GET' | 'POST',
    pathname: string,
    payload?: unknown,
    signal?: AbortSignal,
  ): Promise<unknown> {
    const { apiUrl, apiKey, betaHeader, dispatcher, logger } = this.opts;
    const resp = await request(`${apiUrl}${pathname}`, {
      method,
      headers: {
        'content-type': 'application/json',
        authorization: `Bearer ${apiKey}`,
        'openai-beta': betaHeader,
      },
      body: payload === undefined ? undefined : JSON.stringify(payload),
      dispatcher,
      signal,
    });
    const text = await resp.body.text();

    if (resp.statusCode < 200 || resp.statusCode >= 300) {
      logger.error(`AssistantClient: failed to ${operation}: ${resp.statusCode}, ${text}`);
      throw new TransportError({ operation, statusCode: resp.statusCode, body: text });
    }

    try {
      return JSON.parse(text);
    } catch {
      throw new StructuralError(`${UNEXPECTED_STRUCTURE}: ${operation} returned non-JSON body`);
    }
  }
}

function decode<T>(schema: z.ZodType<T>, value: unknown): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const field = parsed.error.issues[0]?.path.join('.');
    throw new StructuralError(UNEXPECTED_STRUCTURE, field || undefined);
  }
  return parsed.data;
}
