import { eventBus, LogMessage, Phase, ProgressUpdate } from '../events';
import { RunReport } from '../job';

interface PhaseState {
    current: number;
    total: number;
    message: string;
    completed: boolean;
    completedAt?: number;
}

/**
 * Terminal output for the CLI and the server.
 * Log lines are printed as they arrive; progress is throttled and only the
 * most recent active phase is drawn.
 */
class TuiManager {
    private phases: Partial<Record<Phase, PhaseState>> = {};
    private lastUpdate = 0;
    private isInitialized = false;

    init() {
        if (this.isInitialized) return;
        this.isInitialized = true;

        eventBus.on('log', (log: LogMessage) => this.handleLog(log));

        eventBus.on('progress', (progress: ProgressUpdate) => {
            const existing = this.phases[progress.phase];
            const isComplete = progress.completed || (progress.total > 0 && progress.current >= progress.total);

            this.phases[progress.phase] = {
                current: progress.current,
                total: progress.total,
                message: progress.message,
                completed: isComplete,
                completedAt: isComplete ? Date.now() : existing?.completedAt
            };
            this.printProgress();
        });

        eventBus.on('report', (report: RunReport) => this.printReport(report));
    }

    private handleLog(log: LogMessage) {
        const time = new Date(log.timestamp).toLocaleTimeString([], { hour12: false });
        const prefix = `[${time}] [${log.type.toUpperCase().padEnd(7)}]`;
        if (log.type === 'error') console.error(`${prefix} ${log.message}`);
        else console.log(`${prefix} ${log.message}`);
    }

    private printProgress() {
        const now = Date.now();
        if (now - this.lastUpdate < 300) return;
        this.lastUpdate = now;

        const entries = Object.entries(this.phases).filter(
            (e): e is [string, PhaseState] => e[1] !== undefined
        );
        if (entries.length === 0) return;

        // Active phases first, then the most recently completed
        entries.sort((a, b) => {
            if (a[1].completed && !b[1].completed) return 1;
            if (!a[1].completed && b[1].completed) return -1;
            if (a[1].completed && b[1].completed) {
                return (b[1].completedAt || 0) - (a[1].completedAt || 0);
            }
            return 0;
        });

        const [phase, data] = entries[0];
        const label = phase.charAt(0).toUpperCase() + phase.slice(1);
        const percentage = data.total > 0 ? Math.min(1, data.current / data.total) : (data.completed ? 1 : 0);
        const barWidth = 40;
        const filledWidth = Math.floor(barWidth * percentage);

        const bar = '█'.repeat(filledWidth) + '░'.repeat(barWidth - filledWidth);
        const pct = Math.round(percentage * 100).toString().padStart(3);
        const checkmark = data.completed ? ' ✓' : '';
        const countDisplay = data.total > 0 ? `${data.current}/${data.total}` : (data.completed ? 'Done' : '...');

        console.log(`${label.padEnd(8)} | ${bar} | ${pct}% | ${countDisplay.padEnd(10)} | ${data.message.substring(0, 45)}${checkmark}`);
    }

    private printReport(report: RunReport) {
        const feeds = Object.entries(report.feeds).map(([k, v]) => `${k}=${v}`).join(' ');
        console.log(`Summary  | ${report.regionName} | ${feeds} | ids=${report.uniqueIds} | epg ${report.epgMatched}/${report.uniqueIds} matched | ${(report.durationMs / 1000).toFixed(1)}s`);
    }
}

export const tui = new TuiManager();
