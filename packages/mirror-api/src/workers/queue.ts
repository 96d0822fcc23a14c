/**
 * BullMQ Job Queue Setup
 * Update runs are queued so HTTP callers get a job id back immediately
 */

import { Queue } from 'bullmq';
import { getConfig } from '../config.js';
import { serializeDataRequest } from '../services/requests.js';
import type { DataRequestInputType } from '../services/requests.js';
import type { DataRequest, FetchSummary } from '../types/index.js';

export const UPDATES_QUEUE = 'updates';

export interface UpdateJobData {
  /** Re-validated by the worker */
  request: DataRequestInputType;
}

export interface UpdateJobProgress {
  completed: number;
  total: number;
  failed: number;
}

export interface UpdateJobStatus {
  id: string;
  state: string;
  progress: UpdateJobProgress | null;
  result: FetchSummary | null;
  failedReason: string | null;
}

// Redis connection options - using simple config object
// This avoids version conflicts between ioredis versions
export const getRedisConnection = () => {
  const config = getConfig();
  return {
    host: config.REDIS_HOST,
    port: config.REDIS_PORT,
    maxRetriesPerRequest: null as null, // Required for BullMQ
  };
};

let updateQueue: Queue<UpdateJobData, FetchSummary> | null = null;

export function getUpdateQueue(): Queue<UpdateJobData, FetchSummary> {
  if (!updateQueue) {
    updateQueue = new Queue<UpdateJobData, FetchSummary>(UPDATES_QUEUE, {
      connection: getRedisConnection(),
      defaultJobOptions: {
        attempts: 3,
        backoff: {
          type: 'exponential',
          delay: 1000,
        },
        removeOnComplete: 1000,
        removeOnFail: 1000,
      },
    });
  }
  return updateQueue;
}

export async function enqueueUpdate(request: DataRequest): Promise<string> {
  const job = await getUpdateQueue().add('update', { request: serializeDataRequest(request) });
  if (!job.id) {
    throw new Error('Queue did not assign a job id');
  }
  console.log(`[Queue] Enqueued update ${job.id} for ${request.dataset}`);
  return job.id;
}

function isProgress(value: unknown): value is UpdateJobProgress {
  return (
    typeof value === 'object' &&
    value !== null &&
    'completed' in value &&
    'total' in value &&
    'failed' in value
  );
}

export async function getUpdateJobStatus(jobId: string): Promise<UpdateJobStatus | null> {
  const job = await getUpdateQueue().getJob(jobId);
  if (!job) return null;

  return {
    id: jobId,
    state: await job.getState(),
    progress: isProgress(job.progress) ? job.progress : null,
    result: job.returnvalue ?? null,
    failedReason: job.failedReason || null,
  };
}

// Graceful shutdown
export async function closeQueues(): Promise<void> {
  if (updateQueue) {
    await updateQueue.close();
    updateQueue = null;
  }
}
