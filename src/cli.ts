#!/usr/bin/env node
import 'dotenv/config';
import { loadConfig } from './config';
import { runPipeline } from './pipeline';
import { emitLog } from './events';
import { errorMessage } from './errors';
import { tui } from './services/tui';

/**
 * Single publish run for CI jobs and cron. Upstream failures still exit 0;
 * only a configuration or filesystem error exits 1.
 */
async function main(): Promise<number> {
    tui.init();
    try {
        const config = loadConfig();
        await runPipeline(config);
        return 0;
    } catch (e) {
        emitLog(`Run failed: ${errorMessage(e)}`, 'error');
        return 1;
    }
}

main().then(code => {
    process.exitCode = code;
});
