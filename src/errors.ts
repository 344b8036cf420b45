import axios from 'axios';

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export class PipelineBusyError extends Error {
    constructor() {
        super('A publish run is already in progress');
        this.name = 'PipelineBusyError';
    }
}

/**
 * Short description of a caught error for log lines.
 * HTTP errors carry the status code when the server answered.
 */
export function errorMessage(e: unknown): string {
    if (axios.isAxiosError(e)) {
        if (e.response) return `HTTP ${e.response.status}`;
        if (e.code === 'ECONNABORTED' || e.code === 'ETIMEDOUT') return `timed out (${e.message})`;
        return e.message;
    }
    if (e instanceof Error) return e.message;
    return String(e);
}
