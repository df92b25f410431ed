import { AssistantClient } from './assistant-client.js';
import { loadConfig } from './config.js';
import { errorMessage } from './errors.js';
import { EventIntake } from './event-intake.js';
import { createLogger } from './logger.js';
import { ProcessedEventStore } from './processed-event-store.js';
import { createRelayServer } from './server.js';
import { SlackNotifier, createSlackWebClient } from './slack-notifier.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);

  const store = new ProcessedEventStore(config.processedEventsFile, logger);
  await store.load();

  const runner = new AssistantClient({ ...config.assistant, logger });
  const notifier = new SlackNotifier({
    client: createSlackWebClient(config.slack.botToken),
    logger,
    adminMemberId: config.slack.adminMemberId,
  });
  const intake = new EventIntake({ store, runner, notifier, logger });

  if (!config.slack.signingSecret) {
    logger.warn('Relay: SLACK_SIGNING_SECRET not set, Slack request signatures are not verified');
  }

  const server = createRelayServer({
    intake,
    store,
    logger,
    signingSecret: config.slack.signingSecret,
  });
  server.listen(config.port, () => {
    logger.info(`Relay: listening on port ${config.port} (POST /slack)`);
  });

  const shutdown = (signal: string) => {
    logger.info(`Relay: ${signal} received, closing server`);
    server.close();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((err) => {
  console.error(`Relay: failed to start: ${errorMessage(err)}`);
  process.exitCode = 1;
});
