import { createServer } from 'http';
import { API_PREFIX } from '@shared/constants';
import { createApp } from './app';
import { config } from './config';

const app = createApp();
const server = createServer(app);

function shutdown(signal: string) {
  console.warn(`[SERVER] ${signal} received, shutting down`);
  server.close(() => process.exit(0));
  setTimeout(() => process.exit(1), 5000).unref();
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

server.listen(config.port, () => {
  console.warn(`[SERVER] Workflow lifecycle tracker API on port ${config.port}`);
  console.warn(
    `[SERVER] Health: http://localhost:${config.port}${API_PREFIX}/health`,
  );
});

export { app, server };
