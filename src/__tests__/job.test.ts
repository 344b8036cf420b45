import { currentJob, startJob, completeJob, getJobStatus, RunReport } from '../job';

function makeReport(overrides: Partial<RunReport> = {}): RunReport {
  return {
    country: 'ca',
    regionName: 'Canada',
    feeds: { country: 2, news: 1, movies: 0, sports: 3 },
    totalEntries: 6,
    uniqueIds: 5,
    epgMatched: 3,
    epgUnmatched: 2,
    guideBytes: 2048,
    filesGenerated: ['playlist.m3u8', 'epg.xml.gz', 'index.html'],
    durationMs: 1500,
    ...overrides
  };
}

describe('job module', () => {
  beforeEach(() => {
    currentJob.running = false;
    currentJob.startTime = null;
    currentJob.endTime = null;
    currentJob.stats = null;
  });

  describe('startJob', () => {
    it('sets running to true', () => {
      startJob();
      expect(currentJob.running).toBe(true);
    });

    it('sets startTime to current time', () => {
      const before = Date.now();
      startJob();
      const after = Date.now();

      expect(currentJob.startTime).toBeGreaterThanOrEqual(before);
      expect(currentJob.startTime).toBeLessThanOrEqual(after);
    });

    it('clears endTime and stats from the previous run', () => {
      currentJob.endTime = Date.now();
      currentJob.stats = makeReport();
      startJob();
      expect(currentJob.endTime).toBeNull();
      expect(currentJob.stats).toBeNull();
    });
  });

  describe('completeJob', () => {
    it('sets running to false and records endTime', () => {
      currentJob.running = true;
      const before = Date.now();
      completeJob(null);

      expect(currentJob.running).toBe(false);
      expect(currentJob.endTime).toBeGreaterThanOrEqual(before);
    });

    it('stores the run report', () => {
      const report = makeReport({ guideBytes: null, filesGenerated: ['playlist.m3u8', 'index.html'] });
      completeJob(report);
      expect(currentJob.stats).toEqual(report);
    });
  });

  describe('getJobStatus', () => {
    it('returns a copy of job status', () => {
      startJob();
      const status = getJobStatus();

      expect(status).toEqual(getJobStatus());
      expect(status).not.toBe(currentJob);
    });

    it('modifications to returned object do not affect original', () => {
      startJob();
      const status = getJobStatus();
      status.running = false;

      expect(currentJob.running).toBe(true);
    });
  });
});
