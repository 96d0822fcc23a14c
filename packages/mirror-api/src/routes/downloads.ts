/**
 * Download Routes
 * POST /api/v1/downloads - strict run, waits for completion and returns the summary
 */

import { Router, type IRouter } from 'express';
import { createOrchestrator, defaultRunOptions } from '../services/mirror.js';
import { parseDataRequest } from '../services/requests.js';
import { consoleProgress } from '../services/progress.js';
import { formatErrorForResponse, getErrorStatusCode, logError } from '../utils/errors.js';

const router: IRouter = Router();

router.post('/', async (req, res) => {
  const context = { endpoint: 'downloads', body: req.body };

  try {
    const request = parseDataRequest(req.body);
    const orchestrator = createOrchestrator(request.dataset);
    const summary = await orchestrator.download(request, {
      ...defaultRunOptions(),
      progress: consoleProgress,
    });

    res.json({ success: true, summary, errors: [] });
  } catch (error) {
    logError('downloads', error, context);
    res.status(getErrorStatusCode(error)).json({
      success: false,
      summary: null,
      errors: [formatErrorForResponse(error)],
    });
  }
});

export default router;
