jest.mock('../pipeline', () => ({
  runPipeline: jest.fn()
}));

jest.mock('../events', () => ({
  emitLog: jest.fn(),
  emitProgress: jest.fn()
}));

import * as fs from 'fs';
import * as http from 'http';
import * as os from 'os';
import * as path from 'path';
import { loadConfig } from '../config';
import { emitLog } from '../events';
import { currentJob, RunReport } from '../job';
import { runPipeline } from '../pipeline';
import { createApp, triggerRun } from '../server';

const report: RunReport = {
  country: 'ca',
  regionName: 'Canada',
  feeds: { country: 1, news: 0, movies: 0, sports: 0 },
  totalEntries: 1,
  uniqueIds: 1,
  epgMatched: 0,
  epgUnmatched: 1,
  guideBytes: null,
  filesGenerated: ['playlist.m3u8', 'index.html'],
  durationMs: 10
};

const flush = () => new Promise(resolve => setImmediate(resolve));

describe('server', () => {
  const publishDir = fs.mkdtempSync(path.join(os.tmpdir(), 'iptv-server-'));
  const config = loadConfig({ PUBLISH_DIR: publishDir });
  let server: http.Server;
  let baseUrl = '';

  beforeAll(async () => {
    fs.writeFileSync(path.join(publishDir, 'playlist.m3u8'), '#EXTM3U\n\n');
    server = createApp(config).listen(0);
    await new Promise(resolve => server.once('listening', resolve));
    const address = server.address();
    if (address && typeof address === 'object') baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise(resolve => server.close(resolve));
    fs.rmSync(publishDir, { recursive: true, force: true });
  });

  beforeEach(() => {
    currentJob.running = false;
    jest.mocked(runPipeline).mockReset();
    jest.mocked(runPipeline).mockResolvedValue(report);
    jest.mocked(emitLog).mockClear();
  });

  describe('POST /api/run', () => {
    it('starts a run and answers 202', async () => {
      const res = await fetch(`${baseUrl}/api/run`, { method: 'POST' });

      expect(res.status).toBe(202);
      expect(await res.json()).toEqual({ started: true });
      expect(runPipeline).toHaveBeenCalledWith(config);
    });

    it('answers 409 while a run is in progress', async () => {
      currentJob.running = true;

      const res = await fetch(`${baseUrl}/api/run`, { method: 'POST' });

      expect(res.status).toBe(409);
      expect(await res.json()).toEqual({ error: 'A publish run is already in progress' });
      expect(runPipeline).not.toHaveBeenCalled();
    });
  });

  describe('GET endpoints', () => {
    it('reports health', async () => {
      const res = await fetch(`${baseUrl}/api/health`);

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ status: 'healthy', running: false, lastRun: null });
    });

    it('returns the job status', async () => {
      currentJob.running = true;

      const res = await fetch(`${baseUrl}/api/job-status`);

      expect(await res.json()).toEqual({ running: true, startTime: null, endTime: null, stats: null });
    });

    it('serves the published playlist', async () => {
      const res = await fetch(`${baseUrl}/playlist.m3u8`);

      expect(res.status).toBe(200);
      expect(await res.text()).toBe('#EXTM3U\n\n');
    });
  });

  describe('triggerRun', () => {
    it('refuses to start a second run', () => {
      currentJob.running = true;

      expect(triggerRun(config, 'scheduled')).toBe(false);
      expect(runPipeline).not.toHaveBeenCalled();
      expect(emitLog).toHaveBeenCalledWith('Publish run already in progress, skipping...', 'warning');
    });

    it('logs a failed run', async () => {
      jest.mocked(runPipeline).mockRejectedValueOnce(new Error('EACCES: permission denied'));

      expect(triggerRun(config, 'scheduled')).toBe(true);
      await flush();

      expect(emitLog).toHaveBeenCalledWith('Starting publish run (scheduled)...', 'info');
      expect(emitLog).toHaveBeenCalledWith('Publish run failed: EACCES: permission denied', 'error');
    });
  });
});
