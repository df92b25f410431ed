/**
 * Slack Events API endpoint.
 *
 * Reads the raw request body, checks the Slack request signature when a
 * signing secret is configured, decodes the JSON envelope and hands it to
 * the event intake.
 */

import { createHmac, timingSafeEqual } from 'node:crypto';
import type { IncomingMessage, ServerResponse } from 'node:http';
import { z } from 'zod';
import type { EventIntake } from './event-intake.js';
import { headerValue, readRawBody, sendJson } from './http.js';
import type { Logger, SlackEventsApiPayload } from './types.js';

export type SlackEventHandlerDeps = {
  intake: EventIntake;
  logger: Logger;
  /** When unset, requests are accepted without signature verification. */
  signingSecret?: string;
};

// ---------------------------------------------------------------------------
// Slack request signature verification
// ---------------------------------------------------------------------------

const SLACK_SIGNATURE_VERSION = 'v0';
const SLACK_TIMESTAMP_TOLERANCE_S = 60 * 5; // 5 minutes

export function computeSlackSignature(signingSecret: string, timestamp: string, rawBody: Buffer): string {
  const sigBasestring = `${SLACK_SIGNATURE_VERSION}:${timestamp}:${rawBody.toString('utf-8')}`;
  return `${SLACK_SIGNATURE_VERSION}=` +
    createHmac('sha256', signingSecret).update(sigBasestring).digest('hex');
}

export function verifySlackSignature(
  signingSecret: string,
  timestamp: string,
  rawBody: Buffer,
  signature: string,
  nowMs = Date.now(),
): boolean {
  const ts = parseInt(timestamp, 10);
  if (Number.isNaN(ts)) return false;
  const now = Math.floor(nowMs / 1000);
  if (Math.abs(now - ts) > SLACK_TIMESTAMP_TOLERANCE_S) return false;

  const mySignature = computeSlackSignature(signingSecret, timestamp, rawBody);
  if (mySignature.length !== signature.length) return false;
  return timingSafeEqual(Buffer.from(mySignature), Buffer.from(signature));
}

// ---------------------------------------------------------------------------
// Main handler
// ---------------------------------------------------------------------------

const envelopeSchema: z.ZodType<SlackEventsApiPayload> = z.object({
  token: z.string().optional(),
  type: z.string().optional(),
  challenge: z.string().optional(),
  team_id: z.string().optional(),
  api_app_id: z.string().optional(),
  event: z.object({
    type: z.string().optional(),
    subtype: z.string().optional(),
    channel: z.string().optional(),
    user: z.string().optional(),
    bot_id: z.string().optional(),
    text: z.string().optional(),
    ts: z.string().optional(),
    thread_ts: z.string().optional(),
    event_ts: z.string().optional(),
  }).optional(),
  event_id: z.string().optional(),
  event_time: z.number().optional(),
});

export async function handleSlackEvents(
  req: IncomingMessage,
  res: ServerResponse,
  deps: SlackEventHandlerDeps,
): Promise<void> {
  if (req.method !== 'POST') {
    sendJson(res, 405, { status: 'error', message: 'Method not allowed' });
    return;
  }

  let rawBody: Buffer;
  try {
    rawBody = await readRawBody(req);
  } catch {
    sendJson(res, 400, { status: 'error', message: 'Failed to read request body' });
    return;
  }

  if (deps.signingSecret) {
    const signature = headerValue(req.headers, 'x-slack-signature') ?? '';
    const timestamp = headerValue(req.headers, 'x-slack-request-timestamp') ?? '';
    if (!verifySlackSignature(deps.signingSecret, timestamp, rawBody, signature)) {
      deps.logger.warn('SlackEvents: invalid Slack signature, rejecting request');
      sendJson(res, 401, { status: 'error', message: 'Invalid Slack signature' });
      return;
    }
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(rawBody.toString('utf-8'));
  } catch {
    sendJson(res, 400, { status: 'error', message: 'Invalid JSON body' });
    return;
  }
  const parsed = envelopeSchema.safeParse(decoded);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    sendJson(res, 400, {
      status: 'error',
      message: `Invalid event envelope: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unknown'}`,
    });
    return;
  }
  const payload = parsed.data;

  deps.logger.debug(
    `SlackEvents: received type=${payload.type ?? '-'} event_id=${payload.event_id ?? '-'} ` +
    `channel=${payload.event?.channel ?? '-'}`,
  );

  const result = await deps.intake.handle(payload, req.headers);
  sendJson(res, result.statusCode, result.body);
}
