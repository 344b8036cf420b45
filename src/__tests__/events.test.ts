import { eventBus, emitLog, emitProgress, emitProgressComplete, LogMessage, ProgressUpdate } from '../events';

describe('events module', () => {
  beforeEach(() => {
    eventBus.removeAllListeners();
  });

  describe('emitLog', () => {
    it('emits log event with info type by default', (done) => {
      eventBus.once('log', (log: LogMessage) => {
        expect(log.type).toBe('info');
        expect(log.message).toBe('Fetching feeds');
        expect(typeof log.timestamp).toBe('number');
        done();
      });

      emitLog('Fetching feeds');
    });

    it('emits log event with specified type', (done) => {
      eventBus.once('log', (log: LogMessage) => {
        expect(log.type).toBe('warning');
        expect(log.message).toBe('movies feed failed - HTTP 404');
        done();
      });

      emitLog('movies feed failed - HTTP 404', 'warning');
    });

    it('includes timestamp in log event', (done) => {
      const before = Date.now();
      eventBus.once('log', (log: LogMessage) => {
        const after = Date.now();
        expect(log.timestamp).toBeGreaterThanOrEqual(before);
        expect(log.timestamp).toBeLessThanOrEqual(after);
        done();
      });

      emitLog('Test');
    });
  });

  describe('emitProgress', () => {
    it('emits progress event with fetch phase by default', (done) => {
      eventBus.once('progress', (progress: ProgressUpdate) => {
        expect(progress.phase).toBe('fetch');
        expect(progress.message).toBe('Fetching news...');
        expect(progress.current).toBe(1);
        expect(progress.total).toBe(4);
        done();
      });

      emitProgress('Fetching news...', 1, 4);
    });

    it('emits progress event with specified phase', (done) => {
      eventBus.once('progress', (progress: ProgressUpdate) => {
        expect(progress.phase).toBe('enrich');
        done();
      });

      emitProgress('Loading channel database...', 0, 2, 'enrich');
    });

    it('sets completed to true when current >= total', (done) => {
      eventBus.once('progress', (progress: ProgressUpdate) => {
        expect(progress.completed).toBe(true);
        done();
      });

      emitProgress('Done', 4, 4);
    });

    it('sets completed to false when current < total', (done) => {
      eventBus.once('progress', (progress: ProgressUpdate) => {
        expect(progress.completed).toBe(false);
        done();
      });

      emitProgress('In progress', 2, 4);
    });

    it('sets completed to false when total is 0', (done) => {
      eventBus.once('progress', (progress: ProgressUpdate) => {
        expect(progress.completed).toBe(false);
        done();
      });

      emitProgress('No total', 0, 0);
    });
  });

  describe('emitProgressComplete', () => {
    it('emits a completed update for the given phase', (done) => {
      eventBus.once('progress', (progress: ProgressUpdate) => {
        expect(progress).toEqual({
          phase: 'publish',
          message: 'Published 3 files',
          current: 3,
          total: 3,
          completed: true
        });
        done();
      });

      emitProgressComplete('publish', 'Published 3 files', 3);
    });
  });
});
