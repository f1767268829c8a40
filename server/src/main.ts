import 'dotenv/config';
import { createServer } from 'node:http';
import { parseIntBounded } from './aiConfig';
import { createApp } from './index';
import { createServiceLogger } from './logger';
import { createNodeHandler } from './node';
import { createServices } from './services';
import type { Env } from './types';

const env: Env = process.env;
const logger = createServiceLogger(env, 'server');
const services = createServices(env);
const app = createApp(services);
const port = parseIntBounded(env.PORT, 8000, 1, 65535);

if (!services.config.ai.apiKey) {
  logger.warn('server.model_unconfigured', { hint: 'set OPENAI_API_KEY to enable answers' });
}
if (!services.config.auth.secretKey) {
  logger.warn('server.auth_unconfigured', { hint: 'set SECRET_KEY to enable login' });
}

const httpServer = createServer(
  createNodeHandler(app, logger, { maxBodyBytes: services.config.limits.maxBodyBytes })
);

const sweepIntervalMs = services.config.sessions.sweepIntervalMs;
const sweeper =
  sweepIntervalMs > 0
    ? setInterval(() => {
        const removed = services.sessions.sweepExpired();
        if (removed > 0) logger.info('sessions.swept', { removed });
      }, sweepIntervalMs)
    : null;
sweeper?.unref();

httpServer.listen(port, () => {
  logger.info('server.listening', {
    port,
    model: services.config.ai.chat.model,
    moderation: services.config.ai.moderation.enabled
  });
});

const shutdown = (signal: string) => {
  logger.info('server.shutdown', { signal });
  if (sweeper) clearInterval(sweeper);
  httpServer.close((error) => {
    if (error) {
      logger.error('server.close_failed', { reason: error.message });
      process.exit(1);
    }
    process.exit(0);
  });
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
