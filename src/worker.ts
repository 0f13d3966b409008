import { Worker, Job } from 'bullmq';
import { connectDatabase, disconnectDatabase } from './config/database';
import { config } from './config';
import { DEPLOYMENT_QUEUE_NAME } from './services/queue';
import { DeploymentJobData, DeploymentOutcome, runDeployment } from './services/deploymentPipeline';
import { MongoJobStore } from './stores/mongoJobStore';

/**
 * Consumer for QUEUE_DRIVER=bullmq. With the default in-process driver the API
 * server runs deployments itself and this process is not needed.
 */
async function startWorker(): Promise<void> {
  await connectDatabase();

  const store = new MongoJobStore();

  const worker = new Worker<DeploymentJobData, DeploymentOutcome>(
    DEPLOYMENT_QUEUE_NAME,
    (job: Job<DeploymentJobData>) => {
      console.log(`[Worker] Running deployment ${job.data.deploymentId} for app ${job.data.appId}`);
      return runDeployment(store, job.data);
    },
    {
      connection: config.redis,
      concurrency: config.queue.concurrency,
    }
  );

  worker.on('completed', (job, outcome) => {
    console.log(`[Worker] Job ${job.id} finished: deployment ${outcome.deploymentId} is ${outcome.status}`);
  });

  worker.on('failed', (job, err) => {
    console.error(`[Worker] Job ${job?.id} failed:`, err.message);
  });

  const shutdown = (signal: string) => {
    console.log(`[Worker] ${signal} received, draining`);
    worker
      .close()
      .then(() => disconnectDatabase())
      .then(() => process.exit(0))
      .catch((err) => {
        console.error('[Worker] Failed to close cleanly:', err);
        process.exit(1);
      });
  };
  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));

  console.log('[Worker] Deployment worker started');
}

startWorker().catch((err) => {
  console.error('[Worker] Failed to start:', err);
  process.exit(1);
});
