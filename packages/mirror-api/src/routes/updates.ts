/**
 * Update Routes
 * POST /api/v1/updates                 - queue a best-effort update, returns the job id
 * GET  /api/v1/updates/:jobId          - job state, progress and summary
 * GET  /api/v1/updates/:jobId/events   - batch progress as server-sent events
 */

import { Router, type IRouter } from 'express';
import { defaultUpdateWindow } from '../services/mirror.js';
import { parseDataRequest } from '../services/requests.js';
import { subscribeToProgress } from '../services/progress-stream.js';
import { enqueueUpdate, getUpdateJobStatus } from '../workers/queue.js';
import { formatErrorForResponse, getErrorStatusCode, logError } from '../utils/errors.js';
import type { ProgressMessage } from '../services/progress-stream.js';
import type { UpdateJobStatus } from '../workers/queue.js';

const router: IRouter = Router();

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * POST /updates - body as for /downloads; time defaults to the configured lookback
 */
router.post('/', async (req, res) => {
  const context = { endpoint: 'updates/create', body: req.body };

  try {
    const body: unknown = req.body;
    let input = body;
    if (isObject(body) && body.time === undefined) {
      const window = defaultUpdateWindow();
      if (window.kind === 'window') {
        input = { ...body, time: { start: window.start, end: window.end } };
      }
    }
    const request = parseDataRequest(input);
    const jobId = await enqueueUpdate(request);

    res.status(202).json({ success: true, jobId, errors: [] });
  } catch (error) {
    logError('updates/create', error, context);
    res.status(getErrorStatusCode(error)).json({
      success: false,
      jobId: null,
      errors: [formatErrorForResponse(error)],
    });
  }
});

/**
 * GET /updates/:jobId
 */
router.get('/:jobId', async (req, res) => {
  const { jobId } = req.params;
  const context = { endpoint: 'updates/read', jobId };

  try {
    const status = await getUpdateJobStatus(jobId);
    if (!status) {
      return res.status(404).json({
        success: false,
        job: null,
        errors: ['Update job not found'],
      });
    }
    res.json({ success: true, job: status, errors: [] });
  } catch (error) {
    logError('updates/read', error, context);
    res.status(getErrorStatusCode(error)).json({
      success: false,
      job: null,
      errors: [formatErrorForResponse(error)],
    });
  }
});

/**
 * GET /updates/:jobId/events - stream progress until the job finishes
 */
router.get('/:jobId/events', async (req, res) => {
  const { jobId } = req.params;
  const context = { endpoint: 'updates/events', jobId };

  try {
    const status = await getUpdateJobStatus(jobId);
    if (!status) {
      return res.status(404).json({
        success: false,
        errors: ['Update job not found'],
      });
    }

    // Set up SSE headers
    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      'Connection': 'keep-alive',
      'X-Accel-Buffering': 'no', // Disable nginx buffering
    });

    let ended = false;
    const sendEvent = (data: ProgressMessage) => {
      if (ended) return;
      res.write(`data: ${JSON.stringify(data)}\n\n`);
      if (data.type === 'finished') {
        ended = true;
        res.end();
      }
    };

    const finishedMessage = (current: UpdateJobStatus): ProgressMessage | null =>
      current.state === 'completed' || current.state === 'failed'
        ? { type: 'finished', status: current.state, error: current.failedReason ?? undefined }
        : null;

    const already = finishedMessage(status);
    if (already) {
      sendEvent(already);
      return;
    }

    const unsubscribe = subscribeToProgress(
      jobId,
      (message) => {
        sendEvent(message);
        if (message.type === 'finished') unsubscribe();
      },
      () => {
        // The job may have finished before the subscription went live
        getUpdateJobStatus(jobId)
          .then((latest) => {
            const finished = latest ? finishedMessage(latest) : null;
            if (finished) {
              sendEvent(finished);
              unsubscribe();
            }
          })
          .catch((err) => {
            logError('updates/events', err, context);
          });
      }
    );

    // Clean up on client disconnect
    req.on('close', () => {
      unsubscribe();
    });
  } catch (error) {
    logError('updates/events', error, context);
    res.status(getErrorStatusCode(error)).json({
      success: false,
      errors: [formatErrorForResponse(error)],
    });
  }
});

export default router;
