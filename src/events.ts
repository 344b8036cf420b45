import { EventEmitter } from 'events';

export const eventBus = new EventEmitter();

export type LogType = 'info' | 'success' | 'warning' | 'error';
export type Phase = 'fetch' | 'enrich' | 'epg' | 'publish';

export interface LogMessage {
    type: LogType;
    message: string;
    timestamp: number;
}

export interface ProgressUpdate {
    phase: Phase;
    message: string;
    current: number;
    total: number;
    completed?: boolean;
}

export function emitLog(message: string, type: LogType = 'info') {
    const log: LogMessage = {
        type,
        message,
        timestamp: Date.now()
    };
    eventBus.emit('log', log);
    // TUI handles all terminal output via eventBus
}

export function emitProgress(message: string, current: number, total: number, phase: Phase = 'fetch') {
    const update: ProgressUpdate = {
        phase,
        message,
        current,
        total,
        completed: total > 0 && current >= total
    };
    eventBus.emit('progress', update);
}

export function emitProgressComplete(phase: Phase, message: string, total: number) {
    const update: ProgressUpdate = {
        phase,
        message,
        current: total,
        total,
        completed: true
    };
    eventBus.emit('progress', update);
}
