/**
 * Market Mirror API Server
 * Incremental market data mirror over HTTP, with queued background updates
 */

import { createApp, VERSION } from './app.js';
import { getConfig } from './config.js';
import { checkHealth, closePool } from './services/database.js';
import { closeProgressStream } from './services/progress-stream.js';
import { closeQueues } from './workers/queue.js';
import { startUpdateWorker } from './workers/update-worker.js';
import { formatErrorForLog } from './utils/errors.js';

let updateWorker: ReturnType<typeof startUpdateWorker> | null = null;

async function start() {
  const config = getConfig();

  // Log env status on startup
  console.log('[Startup] DATABASE_URL:', config.DATABASE_URL ? `${config.DATABASE_URL.substring(0, 30)}...` : 'NOT SET');
  console.log('[Startup] REDIS_HOST:', config.REDIS_HOST);
  console.log('[Startup] TUSHARE_TOKEN:', config.TUSHARE_TOKEN ? 'SET' : 'NOT SET');
  console.log('[Startup] ALPACA_API_KEY:', config.ALPACA_API_KEY ? 'SET' : 'NOT SET');

  // Check database connection
  const { healthy, error } = await checkHealth();
  if (!healthy) {
    console.error('[Startup] Database connection failed:', error);
    process.exit(1);
  }
  console.log('✓ Database connected');

  // Start background workers
  if (config.ENABLE_WORKERS) {
    updateWorker = startUpdateWorker();
    console.log('✓ Update worker started');
  }

  // Start HTTP server
  createApp().listen(config.PORT, () => {
    console.log(`✓ Market mirror API v${VERSION} running on port ${config.PORT}`);
    console.log(`  Health: http://localhost:${config.PORT}/health`);
    console.log(`  API: http://localhost:${config.PORT}/api/v1`);
  });
}

// Graceful shutdown
async function shutdown(signal: string) {
  console.log(`\n${signal} received, shutting down gracefully...`);

  try {
    if (updateWorker) {
      await updateWorker.close();
      console.log('✓ Update worker stopped');
    }

    await closeQueues();
    console.log('✓ Job queues closed');

    await closeProgressStream();
    console.log('✓ Progress stream closed');

    await closePool();
    console.log('✓ Database pool closed');

    process.exit(0);
  } catch (error) {
    console.error('Error during shutdown:', error);
    process.exit(1);
  }
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

start().catch((error) => {
  console.error('Failed to start server:', formatErrorForLog(error));
  process.exit(1);
});
