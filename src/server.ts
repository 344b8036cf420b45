import 'dotenv/config';
import express from 'express';
import cron from 'node-cron';
import { AppConfig, loadConfig } from './config';
import { runPipeline } from './pipeline';
import { getJobStatus } from './job';
import { emitLog } from './events';
import { errorMessage, PipelineBusyError } from './errors';
import { tui } from './services/tui';

/**
 * Start a run without waiting for it. Returns false when one is already going.
 */
export function triggerRun(config: AppConfig, reason: string): boolean {
    if (getJobStatus().running) {
        emitLog('Publish run already in progress, skipping...', 'warning');
        return false;
    }
    emitLog(`Starting publish run (${reason})...`, 'info');
    runPipeline(config).catch(e => {
        if (e instanceof PipelineBusyError) return;
        emitLog(`Publish run failed: ${errorMessage(e)}`, 'error');
    });
    return true;
}

export function createApp(config: AppConfig) {
    const app = express();

    app.get('/api/health', (req, res) => {
        const status = getJobStatus();
        res.json({
            status: 'healthy',
            running: status.running,
            lastRun: status.endTime ? new Date(status.endTime).toISOString() : null,
            uptime: process.uptime()
        });
    });

    app.get('/api/job-status', (req, res) => {
        res.json(getJobStatus());
    });

    app.post('/api/run', (req, res) => {
        if (!triggerRun(config, 'manual')) {
            res.status(409).json({ error: 'A publish run is already in progress' });
            return;
        }
        res.status(202).json({ started: true });
    });

    // playlist.m3u8, epg.xml.gz, index.html
    app.use(express.static(config.publishDir));

    return app;
}

if (require.main === module) {
    tui.init();
    const config = loadConfig();
    const app = createApp(config);

    if (config.schedule) {
        if (!cron.validate(config.schedule)) {
            emitLog(`Invalid SCHEDULE "${config.schedule}" - scheduled runs disabled`, 'error');
        } else {
            cron.schedule(config.schedule, () => {
                triggerRun(config, 'scheduled');
            });
            emitLog(`Scheduled publish runs: ${config.schedule}`, 'info');
        }
    }

    app.listen(config.port, () => {
        emitLog(`Server listening on port ${config.port}, serving ${config.publishDir}`, 'success');
    });
}
