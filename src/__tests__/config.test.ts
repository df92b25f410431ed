import { resolveConfig } from '../config';
import { ConfigError } from '../errors';

const REQUIRED = {
  ASSISTANT_API_KEY: 'test-key',
  ASSISTANT_ID: 'asst_test',
  SLACK_BOT_TOKEN: 'xoxb-test',
};

describe('resolveConfig', () => {
  it('applies defaults around the required values', () => {
    expect(resolveConfig(REQUIRED)).toEqual({
      assistant: {
        apiUrl: 'https://api.openai.com/v1',
        apiKey: 'test-key',
        assistantId: 'asst_test',
        betaHeader: 'assistants=v2',
        pollIntervalMs: 5000,
        maxWaitMs: undefined,
      },
      slack: {
        botToken: 'xoxb-test',
        adminMemberId: undefined,
        signingSecret: undefined,
      },
      processedEventsFile: 'processed_events.json',
      port: 8080,
      logLevel: 'info',
    });
  });

  it('reads overrides and trims the api url', () => {
    const config = resolveConfig({
      ...REQUIRED,
      ASSISTANT_API_URL: 'https://assistant.test/v1/',
      SLACK_ADMIN_MEMBER_ID: 'UADMIN',
      RUN_POLL_INTERVAL_MS: '250',
      RUN_MAX_WAIT_MS: '60000',
      PORT: '3000',
      LOG_LEVEL: 'debug',
    });
    expect(config.assistant.apiUrl).toBe('https://assistant.test/v1');
    expect(config.assistant.pollIntervalMs).toBe(250);
    expect(config.assistant.maxWaitMs).toBe(60000);
    expect(config.slack.adminMemberId).toBe('UADMIN');
    expect(config.port).toBe(3000);
    expect(config.logLevel).toBe('debug');
  });

  it('accepts API_KEY as the credential name', () => {
    const config = resolveConfig({ API_KEY: 'legacy-key', ASSISTANT_ID: 'asst_test', SLACK_BOT_TOKEN: 'xoxb-test' });
    expect(config.assistant.apiKey).toBe('legacy-key');
  });

  it('treats blank values as unset', () => {
    const config = resolveConfig({ ...REQUIRED, PORT: '', SLACK_SIGNING_SECRET: '  ' });
    expect(config.port).toBe(8080);
    expect(config.slack.signingSecret).toBeUndefined();
  });

  it('lists every missing required value', () => {
    let caught: unknown;
    try {
      resolveConfig({});
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({
      issues: [
        'ASSISTANT_API_KEY is required',
        'ASSISTANT_ID is required',
        'SLACK_BOT_TOKEN is required',
      ],
    });
  });

  it('rejects a non-numeric port', () => {
    expect(() => resolveConfig({ ...REQUIRED, PORT: 'eighty' })).toThrow(/^Invalid configuration: PORT: /);
  });
});
