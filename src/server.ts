import http from 'http';

import { config } from './config';
import { connectDatabase, disconnectDatabase } from './config/database';
import { createApp } from './app';
import { CredentialService } from './services/credentials';
import { createDeploymentQueue } from './services/queue';
import { SlidingWindowLimiter } from './services/rateLimiter';
import { MongoCredentialStore } from './stores/mongoCredentialStore';
import { MongoJobStore } from './stores/mongoJobStore';

async function bootstrap(): Promise<void> {
  // Connect to MongoDB
  await connectDatabase();

  const credentials = new CredentialService(new MongoCredentialStore(), config.auth);
  const jobs = new MongoJobStore();
  const queue = createDeploymentQueue(config.queue.driver, jobs, config.queue.concurrency);
  const limiter = new SlidingWindowLimiter({
    enabled: config.rateLimit.enabled,
    limit: config.rateLimit.maxRequests,
    windowMs: config.rateLimit.windowSeconds * 1000,
    exemptPath: config.rateLimit.exemptPath,
  });

  const app = createApp({ credentials, queue, jobs, limiter });
  const server = http.createServer(app);

  server.listen(config.port, () => {
    console.log(`[Server] Cloud Deploy API running on port ${config.port}`);
    console.log(`[Server] Environment: ${config.env}, deployment queue: ${config.queue.driver}`);
  });

  const shutdown = (signal: string) => {
    console.log(`[Server] ${signal} received, shutting down`);
    server.close();
    queue
      .close()
      .then(() => disconnectDatabase())
      .then(() => process.exit(0))
      .catch((err) => {
        console.error('[Server] Shutdown failed:', err);
        process.exit(1);
      });
  };
  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));
}

bootstrap().catch((err) => {
  console.error('[Server] Failed to start:', err);
  process.exit(1);
});
