import request from 'supertest';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('../src/services/database.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../src/services/database.js')>();
  return { ...actual, checkHealth: vi.fn(async () => ({ healthy: true })) };
});

vi.mock('../src/workers/queue.js', () => ({
  enqueueUpdate: vi.fn(async () => 'job-1'),
  getUpdateJobStatus: vi.fn(async () => null),
}));

vi.mock('../src/services/progress-stream.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../src/services/progress-stream.js')>();
  return { ...actual, subscribeToProgress: vi.fn() };
});

import { createApp } from '../src/app.js';
import { resetConfig } from '../src/config.js';
import { checkHealth } from '../src/services/database.js';
import { setStore } from '../src/services/mirror.js';
import { subscribeToProgress } from '../src/services/progress-stream.js';
import { enqueueUpdate, getUpdateJobStatus } from '../src/workers/queue.js';
import { parseYmd } from '../src/utils/time.js';
import { MemoryStore } from './helpers/memory-store.js';
import { page, reply } from './helpers/tushare-replies.js';

const AUTH = { Authorization: 'Bearer test-secret' };
const day = (ymd: string) => parseYmd(ymd, 480);

describe('HTTP API', () => {
  const mockFetch = vi.fn<[string, RequestInit], Promise<Response>>();
  let store: MemoryStore;

  beforeEach(() => {
    process.env.MIRROR_API_KEY = 'test-secret';
    process.env.TUSHARE_TOKEN = 'test-secret';
    resetConfig();
    store = new MemoryStore();
    setStore(store);
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);
    vi.mocked(checkHealth).mockResolvedValue({ healthy: true });
    vi.mocked(enqueueUpdate).mockResolvedValue('job-1');
    vi.mocked(getUpdateJobStatus).mockResolvedValue(null);
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    setStore(null);
    delete process.env.MIRROR_API_KEY;
    delete process.env.TUSHARE_TOKEN;
    resetConfig();
  });

  it('reports health without auth', async () => {
    const res = await request(createApp()).get('/health');

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ status: 'healthy', version: '0.1.0' });
  });

  describe('auth', () => {
    it('requires a bearer key', async () => {
      const res = await request(createApp()).get('/api/v1/datasets');

      expect(res.status).toBe(401);
      expect(res.body).toEqual({
        success: false,
        errors: ['Authentication required. Provide Bearer token with the API key.'],
      });
    });

    it('rejects other schemes and wrong keys', async () => {
      const app = createApp();

      const basic = await request(app).get('/api/v1/datasets').set('Authorization', 'Basic abc');
      expect(basic.status).toBe(401);
      expect(basic.body.errors).toEqual(['Unsupported authentication scheme: Basic. Use Bearer token.']);

      const wrong = await request(app).get('/api/v1/datasets').set('Authorization', 'Bearer nope');
      expect(wrong.status).toBe(401);
      expect(wrong.body.errors).toEqual(['Invalid API key']);
    });
  });

  it('lists datasets', async () => {
    const res = await request(createApp()).get('/api/v1/datasets').set(AUTH);

    expect(res.status).toBe(200);
    const keys = res.body.datasets.map((d: { key: string }) => d.key);
    expect(keys).toEqual(['tushare/stock/daily', 'tushare/stock/weekly', 'tushare/index/daily', 'tushare/fund/daily', 'alpaca/stock/daily']);
  });

  describe('downloads', () => {
    it('fetches, stores and serves bars back', async () => {
      mockFetch.mockImplementation(async () =>
        reply(
          page([
            ['000001.SZ', '20240102', 9.2, 9.5, 9.1, 9.4, 2000, 180.2],
            ['000001.SZ', '20240103', 9.4, 9.5, 9.3, 9.45, 1234, 100.5],
          ])
        )
      );
      const app = createApp();

      const download = await request(app)
        .post('/api/v1/downloads')
        .set(AUTH)
        .send({ dataset: 'tushare/stock/daily', time: { start: '2024-01-02', end: '2024-01-04' }, symbols: ['000001.sz'] });

      expect(download.status).toBe(200);
      expect(download.body.summary).toMatchObject({
        mode: 'strict',
        window: { start: day('20240102'), end: day('20240104') },
        batches: 1,
        succeeded: 1,
        recordsInserted: 2,
      });
      expect(mockFetch).toHaveBeenCalledTimes(1);

      const bars = await request(app)
        .get('/api/v1/datasets/tushare/stock/daily/bars')
        .query({ symbol: '000001.SZ', start: '2024-01-01', end: '2024-01-10' })
        .set(AUTH);

      expect(bars.status).toBe(200);
      expect(bars.body.bars.map((b: { start: number; close: number }) => [b.start, b.close])).toEqual([
        [day('20240102'), 9.4],
        [day('20240103'), 9.45],
      ]);

      const coverage = await request(app)
        .get('/api/v1/datasets/tushare/stock/daily/coverage')
        .query({ symbols: '000001.SZ', start: '2024-01-01', end: '2024-01-05' })
        .set(AUTH);

      expect(coverage.body.coverage.symbols).toEqual([
        {
          symbol: '000001.SZ',
          covered: [{ start: day('20240102'), end: day('20240104') }],
          missing: [
            { start: day('20240101'), end: day('20240102') },
            { start: day('20240104'), end: day('20240105') },
          ],
        },
      ]);
    });

    it('rejects an inverted window with 400', async () => {
      const res = await request(createApp())
        .get('/api/v1/datasets/tushare/stock/daily/coverage')
        .query({ symbols: '000001.SZ', start: '2024-01-05', end: '2024-01-02' })
        .set(AUTH);

      expect(res.status).toBe(400);
      expect(res.body.errors).toEqual([
        'Interval start must precede end: [2024-01-04T16:00:00.000Z, 2024-01-01T16:00:00.000Z)',
      ]);
    });

    it('rejects a malformed request', async () => {
      const res = await request(createApp())
        .post('/api/v1/downloads')
        .set(AUTH)
        .send({ dataset: 'tushare/stock/daily', time: { start: '2024-01-02', end: '2024-01-04' }, symbols: [] });

      expect(res.status).toBe(400);
      expect(res.body.errors[0]).toMatch(/^Invalid data request: symbols/);
    });

    it('rejects an unknown dataset', async () => {
      const res = await request(createApp())
        .post('/api/v1/downloads')
        .set(AUTH)
        .send({ dataset: 'nope/x/y', time: { at: '2024-01-02' }, symbols: 'all' });

      expect(res.status).toBe(400);
      expect(res.body.errors).toEqual(['Unknown dataset: nope/x/y']);
    });

    it('returns 400 for unparseable JSON', async () => {
      const res = await request(createApp())
        .post('/api/v1/downloads')
        .set(AUTH)
        .set('Content-Type', 'application/json')
        .send('{"dataset":');

      expect(res.status).toBe(400);
      expect(res.body.success).toBe(false);
    });
  });

  describe('updates', () => {
    it('queues an update over the default window', async () => {
      const res = await request(createApp())
        .post('/api/v1/updates')
        .set(AUTH)
        .send({ dataset: 'tushare/stock/daily', symbols: 'all' });

      expect(res.status).toBe(202);
      expect(res.body).toEqual({ success: true, jobId: 'job-1', errors: [] });
      const queued = vi.mocked(enqueueUpdate).mock.calls[0][0];
      expect(queued.time.kind).toBe('window');
      expect(queued.scope).toEqual({ kind: 'all' });
    });

    it('returns 404 for an unknown job', async () => {
      const res = await request(createApp()).get('/api/v1/updates/missing').set(AUTH);

      expect(res.status).toBe(404);
      expect(res.body.errors).toEqual(['Update job not found']);
    });

    it('ends the event stream at once for a finished job', async () => {
      vi.mocked(getUpdateJobStatus).mockResolvedValueOnce({
        id: 'job-1',
        state: 'completed',
        progress: { completed: 1, total: 1, failed: 0 },
        result: null,
        failedReason: null,
      });

      const res = await request(createApp()).get('/api/v1/updates/job-1/events').set(AUTH);

      expect(res.status).toBe(200);
      expect(res.headers['content-type']).toBe('text/event-stream');
      expect(res.text).toBe('data: {"type":"finished","status":"completed"}\n\n');
    });

    it('ends the event stream when the job finished while subscribing', async () => {
      const unsubscribe = vi.fn();
      vi.mocked(subscribeToProgress).mockImplementation((_jobId, _onMessage, onReady) => {
        onReady?.();
        return unsubscribe;
      });
      vi.mocked(getUpdateJobStatus)
        .mockResolvedValueOnce({ id: 'job-1', state: 'active', progress: null, result: null, failedReason: null })
        .mockResolvedValueOnce({ id: 'job-1', state: 'failed', progress: null, result: null, failedReason: 'boom' });

      const res = await request(createApp()).get('/api/v1/updates/job-1/events').set(AUTH);

      expect(res.status).toBe(200);
      expect(res.text).toBe('data: {"type":"finished","status":"failed","error":"boom"}\n\n');
      expect(unsubscribe).toHaveBeenCalled();
    });
  });

  it('answers unknown endpoints with 404', async () => {
    const res = await request(createApp()).get('/api/v1/nothing-here').set(AUTH);

    expect(res.status).toBe(404);
    expect(res.body.errors).toEqual(['Unknown endpoint: GET /api/v1/nothing-here']);
  });
});
