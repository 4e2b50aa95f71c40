import { createServer } from 'http';
import { createEngineContext } from '@core/context';
import { createConnection } from '@db/connection';
import { API_PREFIX } from '@shared/constants';
import { createApp } from './app';
import { config } from './config';
import { closeWebSocket, initWebSocket, websocketEvents } from './websocket';

const connection = createConnection(config.database);

const ctx = createEngineContext(connection.db, {
  events: websocketEvents,
  options: {
    maxRetries: config.transactions.maxRetries,
    statisticsTopN: config.statistics.topN,
  },
});

const app = createApp(ctx, { clientUrl: config.clientUrl, logRequests: !config.isProd });
const server = createServer(app);

initWebSocket(server);

function shutdown(signal: string) {
  console.warn(`[SERVER] ${signal} received, shutting down`);
  closeWebSocket();
  server.close(() => {
    connection.close().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error('[DB] Failed to close pool:', err);
        process.exit(1);
      },
    );
  });
  setTimeout(() => process.exit(1), 5000).unref();
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

server.listen(config.port, () => {
  console.warn(`[SERVER] CFP schedule engine API on port ${config.port}`);
  console.warn(`[SERVER] Health: http://localhost:${config.port}${API_PREFIX}/health`);
});

export { app, server };
