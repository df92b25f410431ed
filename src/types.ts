/**
 * Type definitions shared across the Slack Assistant Relay
 */

/** Single-string log lines; context is interpolated into the message. */
export interface Logger {
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
  debug(msg: string): void;
}

/** Raw Slack Events API envelope (subset we read). */
export type SlackEventsApiPayload = {
  token?: string;
  type?: string;
  challenge?: string;
  team_id?: string;
  api_app_id?: string;
  event?: {
    type?: string;
    subtype?: string;
    channel?: string;
    user?: string;
    bot_id?: string;
    text?: string;
    ts?: string;
    thread_ts?: string;
    event_ts?: string;
  };
  event_id?: string;
  event_time?: number;
};

/** One inbound Slack message, normalized from the envelope. */
export type InboundEvent = {
  eventId: string;
  channelId: string;
  /** Thread key replies go under: `thread_ts` when present, else the message `ts`. */
  threadTs: string;
  text: string;
};

/** JSON answer written back to Slack for every webhook call. */
export type IntakeResponseBody =
  | { challenge: string | undefined }
  | { status: 'ok' | 'error'; message?: string };

export type IntakeResult = {
  statusCode: number;
  body: IntakeResponseBody;
};

/** Header bag as Node hands it over on IncomingMessage. */
export type RequestHeaders = Record<string, string | string[] | undefined>;

export type RunStatus =
  | 'queued'
  | 'in_progress'
  | 'completed'
  | 'failed'
  | 'incomplete'
  | (string & {});

export type RunHandle = {
  runId: string;
  /** Backend thread id (not the Slack thread ts). */
  threadId: string;
  status: RunStatus;
};

export type SendOutcome = 'sent' | 'suppressed';
