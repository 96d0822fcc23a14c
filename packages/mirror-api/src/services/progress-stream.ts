/**
 * Progress Streaming Service
 * Uses Redis pub/sub to stream batch progress from update workers to SSE routes
 *
 * - Worker runs the orchestrator with a publishing reporter
 * - Reporter publishes to Redis channel: updates:{jobId}:progress
 * - SSE route subscribes to the channel and forwards to the client
 */

import { Redis } from 'ioredis';
import { getConfig } from '../config.js';
import type { BatchDoneEvent, BatchEvent, ProgressReporter } from './progress.js';

const getRedisConnection = () => {
  const config = getConfig();
  return { host: config.REDIS_HOST, port: config.REDIS_PORT };
};

// Publisher client (singleton)
let publisher: Redis | null = null;

function getPublisher(): Redis {
  if (!publisher) {
    publisher = new Redis(getRedisConnection());
    publisher.on('error', (err: Error) => {
      console.error('[ProgressStream] Publisher error:', err);
    });
  }
  return publisher;
}

export type ProgressMessage =
  | { type: 'batchStarted'; index: number; total: number; symbols: number; start: number; end: number }
  | { type: 'batchDone'; index: number; total: number; status: 'succeeded' | 'failed'; inserted: number; error?: string }
  | { type: 'finished'; status: 'completed' | 'failed'; error?: string };

export function getProgressChannel(jobId: string): string {
  return `updates:${jobId}:progress`;
}

export function toStartedMessage(event: BatchEvent): ProgressMessage {
  return {
    type: 'batchStarted',
    index: event.index,
    total: event.total,
    symbols: event.batch.symbols.length,
    start: event.batch.start,
    end: event.batch.end,
  };
}

export function toDoneMessage(event: BatchDoneEvent): ProgressMessage {
  return {
    type: 'batchDone',
    index: event.index,
    total: event.total,
    status: event.status,
    inserted: event.inserted,
    error: event.error,
  };
}

export async function publishProgress(jobId: string, message: ProgressMessage): Promise<void> {
  await getPublisher().publish(getProgressChannel(jobId), JSON.stringify(message));
}

/**
 * Reporter that publishes every batch event for a job. Publish failures are
 * logged and never reach the orchestrator.
 */
export function createPublishingReporter(jobId: string): ProgressReporter {
  const send = (message: ProgressMessage) => {
    publishProgress(jobId, message).catch((err) => {
      console.error(`[ProgressStream] Failed to publish progress for job ${jobId}:`, err);
    });
  };
  return {
    batchStarted: (event) => send(toStartedMessage(event)),
    batchDone: (event) => send(toDoneMessage(event)),
  };
}

/**
 * Subscribe to progress for a job
 * onReady runs once the subscription is live; messages published before that are lost.
 * Returns a cleanup function to unsubscribe
 */
export function subscribeToProgress(
  jobId: string,
  onMessage: (message: ProgressMessage) => void,
  onReady?: () => void
): () => void {
  const subscriber = new Redis(getRedisConnection());
  const channel = getProgressChannel(jobId);

  subscriber.subscribe(channel).then(() => {
    console.log(`[ProgressStream] Subscribed to ${channel}`);
    onReady?.();
  }).catch((err) => {
    console.error(`[ProgressStream] Failed to subscribe to ${channel}:`, err);
  });

  subscriber.on('message', (msgChannel: string, message: string) => {
    if (msgChannel === channel) {
      try {
        onMessage(JSON.parse(message) as ProgressMessage);
      } catch (err) {
        console.error('[ProgressStream] Failed to parse message:', err);
      }
    }
  });

  let closed = false;
  return () => {
    if (closed) return;
    closed = true;
    console.log(`[ProgressStream] Unsubscribing from ${channel}`);
    subscriber.unsubscribe(channel).catch((err) => {
      console.error(`[ProgressStream] Failed to unsubscribe from ${channel}:`, err);
    });
    subscriber.quit().catch((err) => {
      console.error('[ProgressStream] Failed to close subscriber:', err);
    });
  };
}

/**
 * Close the publisher connection (for graceful shutdown)
 */
export async function closeProgressStream(): Promise<void> {
  if (publisher) {
    await publisher.quit();
    publisher = null;
  }
}
