import type { Category } from './services/feeds';

export interface RunReport {
    country: string;
    regionName: string;
    feeds: Record<Category, number>;
    totalEntries: number;
    uniqueIds: number;
    epgMatched: number;
    epgUnmatched: number;
    guideBytes: number | null;
    filesGenerated: string[];
    durationMs: number;
}

export interface JobStatus {
    running: boolean;
    startTime: number | null;
    endTime: number | null;
    stats: RunReport | null;
}

export const currentJob: JobStatus = {
    running: false,
    startTime: null,
    endTime: null,
    stats: null
};

export function startJob() {
    currentJob.running = true;
    currentJob.startTime = Date.now();
    currentJob.endTime = null;
    currentJob.stats = null;
}

export function completeJob(stats: JobStatus['stats']) {
    currentJob.running = false;
    currentJob.endTime = Date.now();
    currentJob.stats = stats;
}

export function getJobStatus(): JobStatus {
    return { ...currentJob };
}
