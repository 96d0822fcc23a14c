/**
 * Update Worker
 * Runs queued best-effort updates and streams batch progress over Redis
 */

import { Worker } from 'bullmq';
import type { Job } from 'bullmq';
import { createOrchestrator, defaultRunOptions } from '../services/mirror.js';
import { parseDataRequest } from '../services/requests.js';
import { combineReporters, consoleProgress } from '../services/progress.js';
import { createPublishingReporter, publishProgress } from '../services/progress-stream.js';
import { formatErrorForResponse } from '../utils/errors.js';
import { getRedisConnection, UPDATES_QUEUE } from './queue.js';
import type { ProgressReporter } from '../services/progress.js';
import type { UpdateJobData, UpdateJobProgress } from './queue.js';
import type { FetchSummary } from '../types/index.js';

/** The parts of a BullMQ job an update run touches */
export type UpdateJob = Pick<Job<UpdateJobData, FetchSummary>, 'id' | 'data' | 'updateProgress'>;

/**
 * Reporter that mirrors batch completion into the job's progress field
 */
function jobProgressReporter(job: UpdateJob): ProgressReporter {
  const progress: UpdateJobProgress = { completed: 0, total: 0, failed: 0 };
  return {
    batchStarted: (event) => {
      progress.total = event.total;
    },
    batchDone: (event) => {
      progress.total = event.total;
      progress.completed++;
      if (event.status === 'failed') progress.failed++;
      job.updateProgress({ ...progress }).catch((err) => {
        console.error(`[Update Worker] Failed to record progress for job ${job.id}:`, err);
      });
    },
  };
}

export async function processUpdate(job: UpdateJob): Promise<FetchSummary> {
  const jobId = job.id ?? 'unknown';

  try {
    const request = parseDataRequest(job.data.request);
    console.log(`[Update Worker] Processing job ${jobId} for ${request.dataset}`);

    const orchestrator = createOrchestrator(request.dataset);
    const summary = await orchestrator.update(request, {
      ...defaultRunOptions(),
      runId: jobId,
      progress: combineReporters(consoleProgress, jobProgressReporter(job), createPublishingReporter(jobId)),
    });

    await publishProgress(jobId, { type: 'finished', status: 'completed' }).catch((err) => {
      console.error(`[Update Worker] Failed to publish completion for job ${jobId}:`, err);
    });
    return summary;
  } catch (error) {
    console.error(`[Update Worker] Error in job ${jobId}:`, error);
    await publishProgress(jobId, {
      type: 'finished',
      status: 'failed',
      error: formatErrorForResponse(error),
    }).catch((err) => {
      console.error(`[Update Worker] Failed to publish failure for job ${jobId}:`, err);
    });
    throw error;
  }
}

/**
 * Start the update worker
 */
export function startUpdateWorker(concurrency = 1): Worker<UpdateJobData, FetchSummary> {
  const worker = new Worker<UpdateJobData, FetchSummary>(UPDATES_QUEUE, processUpdate, {
    connection: getRedisConnection(),
    concurrency,
  });

  worker.on('completed', (job) => {
    console.log(`[Update Worker] Job ${job.id} completed`);
  });

  worker.on('failed', (job, err) => {
    console.error(`[Update Worker] Job ${job?.id} failed:`, err.message);
  });

  worker.on('error', (err) => {
    console.error('[Update Worker] Worker error:', err);
  });

  console.log('[Update Worker] Started');

  return worker;
}
