import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import type { ProcessedEventStore } from './processed-event-store.js';
import { handleSlackEvents, type SlackEventHandlerDeps } from './slack-event-handler.js';
import { sendJson } from './http.js';
import { errorMessage } from './errors.js';

export type RelayServerDeps = SlackEventHandlerDeps & {
  store: ProcessedEventStore;
};

const ROUTES = new Set(['/slack', '/healthz']);

async function route(req: IncomingMessage, res: ServerResponse, deps: RelayServerDeps): Promise<void> {
  const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);

  if (!ROUTES.has(url.pathname)) {
    sendJson(res, 404, { status: 'error', message: 'Not found' });
    return;
  }

  switch (url.pathname) {
    case '/slack':
      await handleSlackEvents(req, res, deps);
      break;
    case '/healthz':
      sendJson(res, 200, { status: 'ok', processedEvents: deps.store.size });
      break;
  }
}

export function createRelayServer(deps: RelayServerDeps): Server {
  return createServer((req, res) => {
    route(req, res, deps).catch((err) => {
      deps.logger.error(`RelayServer: unhandled error on ${req.method ?? '-'} ${req.url ?? '-'}: ${errorMessage(err)}`);
      if (!res.headersSent) {
        sendJson(res, 500, { status: 'error', message: 'Internal server error' });
      } else {
        res.end();
      }
    });
  });
}
