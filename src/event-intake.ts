/**
 * Event Intake
 *
 * Turns one Slack Events API delivery into at most one assistant run and
 * one threaded reply:
 *
 *   url_verification   → echo the challenge (store untouched)
 *   retry delivery     → ack, the first attempt is still being handled
 *   bot message        → ack, never answer ourselves
 *   already processed  → ack with "Event already processed"
 *   new event          → claim, run the assistant, post the outcome
 *
 * The claim happens before any work and is never undone: an event that
 * fails mid-run is not reprocessed on redelivery.
 */

import type { AssistantRunner } from './assistant-client.js';
import type { ProcessedEventStore } from './processed-event-store.js';
import type { ReplyNotifier } from './slack-notifier.js';
import { RelayError, StructuralError, errorMessage } from './errors.js';
import { headerValue } from './http.js';
import type {
  InboundEvent,
  IntakeResult,
  Logger,
  RequestHeaders,
  RunStatus,
  SlackEventsApiPayload,
} from './types.js';

export const SLACK_RETRY_HEADER = 'x-slack-retry-num';

export type EventIntakeDeps = {
  store: ProcessedEventStore;
  runner: AssistantRunner;
  notifier: ReplyNotifier;
  logger: Logger;
};

/** How the assistant step ended. Every variant still produces a thread reply. */
type ExecutionOutcome =
  | { kind: 'answered'; reply: string }
  | { kind: 'run-failed'; runId: string; status: RunStatus };

const ALREADY_PROCESSED: IntakeResult = {
  statusCode: 200,
  body: { status: 'ok', message: 'Event already processed' },
};

export class EventIntake {
  private readonly deps: EventIntakeDeps;

  constructor(deps: EventIntakeDeps) {
    this.deps = deps;
  }

  async handle(payload: SlackEventsApiPayload, headers: RequestHeaders): Promise<IntakeResult> {
    const { store, logger } = this.deps;

    if (payload.type === 'url_verification') {
      return { statusCode: 200, body: { challenge: payload.challenge } };
    }

    const retryNum = headerValue(headers, SLACK_RETRY_HEADER);
    if (retryNum !== undefined) {
      logger.info(`EventIntake: retry request received (attempt ${retryNum}) event_id=${payload.event_id ?? '-'}`);
      return { statusCode: 200, body: { status: 'ok' } };
    }

    const event = toInboundEvent(payload);
    if (!event) {
      logger.warn('EventIntake: rejecting payload without event_id, event.channel or event.ts');
      return {
        statusCode: 400,
        body: { status: 'error', message: 'Missing required fields: event_id, event.channel, event.ts' },
      };
    }

    if (payload.event?.bot_id || payload.event?.subtype === 'bot_message') {
      logger.debug(`EventIntake: ignoring bot message event_id=${event.eventId}`);
      return { statusCode: 200, body: { status: 'ok', message: 'Ignored bot message' } };
    }

    logger.info(
      `EventIntake: processing event ${event.eventId} from channel ${event.channelId}, thread ${event.threadTs}`,
    );

    if (store.has(event.eventId)) {
      logger.info(`EventIntake: event ${event.eventId} already processed`);
      return ALREADY_PROCESSED;
    }
    if (!(await store.tryClaim(event.eventId))) {
      logger.info(`EventIntake: event ${event.eventId} claimed by a concurrent delivery`);
      return ALREADY_PROCESSED;
    }

    return this.execute(event);
  }

  private async execute(event: InboundEvent): Promise<IntakeResult> {
    const { notifier, logger } = this.deps;
    try {
      const outcome = await this.runAssistant(event);
      if (outcome.kind === 'answered') {
        await notifier.sendIfNew(event.channelId, event.threadTs, outcome.reply);
        return { statusCode: 200, body: { status: 'ok' } };
      }

      const message = `Run failed with status: ${outcome.status}`;
      logger.warn(`EventIntake: ${message} event_id=${event.eventId} run_id=${outcome.runId}`);
      await notifier.sendIfNew(event.channelId, event.threadTs, message);
      return { statusCode: 200, body: { status: 'error', message } };
    } catch (err) {
      const message = `Error: ${errorMessage(err)}`;
      logger.error(`EventIntake: event ${event.eventId} failed [${faultTag(err)}]: ${message}`);
      await this.notifyFault(event, message);
      return { statusCode: 200, body: { status: 'error', message } };
    }
  }

  private async runAssistant(event: InboundEvent): Promise<ExecutionOutcome> {
    const { runner, logger } = this.deps;
    const run = await runner.createRun(event.text);
    logger.info(`EventIntake: event ${event.eventId} started run ${run.runId}`);
    const status = await runner.pollUntilTerminal(run.threadId);
    if (status !== 'completed') {
      return { kind: 'run-failed', runId: run.runId, status };
    }
    return { kind: 'answered', reply: await runner.fetchLatestMessage(run.threadId) };
  }

  private async notifyFault(event: InboundEvent, message: string): Promise<void> {
    try {
      await this.deps.notifier.sendIfNew(event.channelId, event.threadTs, message);
    } catch (err) {
      this.deps.logger.error(
        `EventIntake: could not post failure notice for ${event.eventId}: ${errorMessage(err)}`,
      );
    }
  }
}

/** Normalize the envelope; null when the fields a reply needs are missing. */
export function toInboundEvent(payload: SlackEventsApiPayload): InboundEvent | null {
  const eventId = payload.event_id?.trim();
  const channelId = payload.event?.channel?.trim();
  const threadTs = payload.event?.thread_ts?.trim() || payload.event?.ts?.trim();
  if (!eventId || !channelId || !threadTs) return null;
  return {
    eventId,
    channelId,
    threadTs,
    text: payload.event?.text ?? '',
  };
}

/**
 * Log tag for a fault: the RelayError code, plus the offending field for
 * decoding failures. Anything else is UNEXPECTED.
 */
export function faultTag(err: unknown): string {
  if (err instanceof StructuralError && err.field) return `${err.code}:${err.field}`;
  if (err instanceof RelayError) return err.code;
  return 'UNEXPECTED';
}
