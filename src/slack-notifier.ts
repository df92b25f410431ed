/**
 * Slack Notifier
 *
 * Posts a reply into a Slack thread unless the thread already ends with the
 * exact same text. A failed post is escalated to the configured admin in
 * the same thread and then reported to the caller.
 */

import { WebClient, type RetryOptions, type WebClientOptions } from '@slack/web-api';
import { formatLinks } from './link-format.js';
import { PlatformLookupError, SlackSendError, errorMessage } from './errors.js';
import type { Logger, SendOutcome } from './types.js';

/**
 * The two Web API methods the notifier needs. `WebClient` from
 * @slack/web-api satisfies this shape.
 */
export interface SlackClient {
  conversations: {
    replies(args: { channel: string; ts: string }): Promise<{
      messages?: Array<{ text?: string }>;
    }>;
  };
  chat: {
    postMessage(args: { channel: string; thread_ts: string; text: string }): Promise<{
      message?: { text?: string };
    }>;
  };
}

/** At most three attempts per Web API call, a few seconds in total. */
export const SLACK_RETRY_CONFIG: RetryOptions = {
  retries: 2,
  factor: 2,
  minTimeout: 500,
  maxTimeout: 2000,
};

export function createSlackWebClient(botToken: string, options: WebClientOptions = {}): WebClient {
  return new WebClient(botToken, { ...options, retryConfig: SLACK_RETRY_CONFIG });
}

export type SlackNotifierOptions = {
  client: SlackClient;
  logger: Logger;
  /** Member id tagged when a reply cannot be posted. */
  adminMemberId?: string;
};

/** The slice of the notifier the event intake drives. */
export interface ReplyNotifier {
  sendIfNew(channel: string, threadTs: string, text: string): Promise<SendOutcome>;
}

export class SlackNotifier implements ReplyNotifier {
  private readonly opts: SlackNotifierOptions;

  constructor(opts: SlackNotifierOptions) {
    this.opts = opts;
  }

  async sendIfNew(channel: string, threadTs: string, text: string): Promise<SendOutcome> {
    const { client, logger } = this.opts;
    const formatted = formatLinks(text);
    logger.info(`SlackNotifier: preparing reply for channel ${channel}, thread ${threadTs}: ${formatted}`);

    const lastMessage = await this.getLastMessage(channel, threadTs);
    if (lastMessage === formatted) {
      logger.info(`SlackNotifier: duplicate message detected, not sending: ${formatted}`);
      return 'suppressed';
    }

    try {
      const resp = await client.chat.postMessage({ channel, thread_ts: threadTs, text: formatted });
      logger.info(`SlackNotifier: message sent to Slack: ${resp.message?.text ?? formatted}`);
      return 'sent';
    } catch (err) {
      const failure = new SlackSendError(slackErrorDetail(err), err);
      logger.error(`SlackNotifier: ${failure.message}`);
      await this.alertAdmin(channel, threadTs, failure.message);
      throw failure;
    }
  }

  /**
   * Text of the newest message in the thread, or undefined when the thread
   * is empty or cannot be read. Lookup failures never block a send.
   */
  async getLastMessage(channel: string, threadTs: string): Promise<string | undefined> {
    const { client, logger } = this.opts;
    try {
      const resp = await client.conversations.replies({ channel, ts: threadTs });
      const messages = resp.messages ?? [];
      const last = messages[messages.length - 1];
      if (!last) return undefined;
      logger.debug(`SlackNotifier: last message in ${channel}/${threadTs}: ${last.text ?? ''}`);
      return last.text;
    } catch (err) {
      const lookup = new PlatformLookupError(slackErrorDetail(err), err);
      logger.warn(`SlackNotifier: ${lookup.message}`);
      return undefined;
    }
  }

  private async alertAdmin(channel: string, threadTs: string, description: string): Promise<void> {
    const { client, logger, adminMemberId } = this.opts;
    if (!adminMemberId) {
      logger.warn('SlackNotifier: no admin member configured, skipping failure alert');
      return;
    }
    try {
      await client.chat.postMessage({
        channel,
        thread_ts: threadTs,
        text: `<@${adminMemberId}> ${description}`,
      });
    } catch (err) {
      logger.error(`SlackNotifier: admin alert failed: ${slackErrorDetail(err)}`);
    }
  }
}

/**
 * Slack platform errors carry the API error code (e.g. `channel_not_found`)
 * in `data.error`; prefer that over the generic message.
 */
export function slackErrorDetail(err: unknown): string {
  if (err && typeof err === 'object' && 'data' in err) {
    const data = err.data;
    if (data && typeof data === 'object' && 'error' in data && typeof data.error === 'string') {
      return data.error;
    }
  }
  return errorMessage(err);
}
