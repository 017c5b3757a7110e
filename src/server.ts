import express from 'express';
import { loadConfig, loadDotenv } from './config';
import { createRelay } from './index';
import { createLogger, setLogLevel } from './lib/logger';

loadDotenv();
const config = loadConfig();
setLogLevel(config.logLevel);

const log = createLogger('server');
const relay = createRelay(config);

relay.queue.on('job:completed', (job) => {
  log.info(`Job ${job.id} completed after ${job.attempts} attempt(s)`);
});
relay.queue.on('job:failed', (job, error) => {
  log.warn(`Job ${job.id} failed permanently: ${error.message}`);
});
relay.coordinator.on('worker:dead', (worker, revoked) => {
  log.warn(`Worker ${worker.id} declared dead; ${revoked.length} job(s) returned to the queue`);
});

const app = express();
app.use('/api/queue', relay.router);

relay.start();
const server = app.listen(config.port, () => {
  log.info(`Queue API listening on port ${config.port}`);
  log.info(`  - database: ${config.databasePath}`);
  log.info(`  - lease ${config.leaseMs}ms, heartbeat ${config.heartbeatIntervalMs}ms x${config.livenessFactor}`);
});

function shutdown(signal: string) {
  log.info(`${signal} received; draining`);
  relay.intake.close();
  server.close((error) => {
    if (error) log.error('Error closing HTTP server:', error);
    relay.shutdown();
    process.exit(error ? 1 : 0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
