import type { SubtitleEntryData } from '../types/subtitle';

/**
 * A message printed by a worker process, one JSON object per line.
 */
export type WorkerMessage =
    | { type: 'progress'; percent: number; message: string }
    | { type: 'partial'; updates: Record<string, string> }
    | { type: 'full'; entries: SubtitleEntryData[] }
    | { type: 'error'; message: string }
    | { type: 'log'; message: string };

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toEntryData(value: unknown): SubtitleEntryData | null {
    if (!isRecord(value)) return null;
    const { startTime, endTime, originalText, translatedText } = value;
    if (typeof startTime !== 'number' || typeof endTime !== 'number') return null;
    return {
        startTime,
        endTime,
        originalText: typeof originalText === 'string' ? originalText : '',
        translatedText: typeof translatedText === 'string' ? translatedText : '',
    };
}

/**
 * Parses one line of worker output. Lines that are not JSON objects of a
 * known shape are passed through as log messages.
 */
export function parseWorkerLine(line: string): WorkerMessage {
    let parsed: unknown;
    try {
        parsed = JSON.parse(line);
    } catch {
        return { type: 'log', message: line };
    }
    if (!isRecord(parsed)) return { type: 'log', message: line };

    switch (parsed.type) {
        case 'progress':
            return {
                type: 'progress',
                percent: typeof parsed.percent === 'number' ? parsed.percent : 0,
                message: typeof parsed.message === 'string' ? parsed.message : '',
            };
        case 'partial': {
            const updates: Record<string, string> = {};
            if (isRecord(parsed.updates)) {
                for (const [key, text] of Object.entries(parsed.updates)) {
                    if (typeof text === 'string') updates[key] = text;
                }
            }
            return { type: 'partial', updates };
        }
        case 'full': {
            const entries = Array.isArray(parsed.entries) ? parsed.entries.map(toEntryData) : [];
            return { type: 'full', entries: entries.filter((entry): entry is SubtitleEntryData => entry !== null) };
        }
        case 'error':
            return { type: 'error', message: typeof parsed.message === 'string' ? parsed.message : 'Unknown worker error' };
        default:
            return { type: 'log', message: line };
    }
}

/**
 * Splits a worker's stdout chunks into complete lines.
 * The last incomplete line stays in the buffer until more output arrives.
 */
export class StreamLineBuffer {
    private buffer: string = '';

    /**
     * Appends a chunk and returns the complete, non-empty lines.
     */
    process(chunk: string): string[] {
        this.buffer += chunk;
        if (this.buffer.indexOf('\n') === -1) {
            return [];
        }

        const lines = this.buffer.split('\n');
        this.buffer = lines.pop() || '';

        return lines.map((line) => line.replace(/\r$/, '')).filter((line) => line.trim().length > 0);
    }

    /**
     * Returns what is left once the stream has ended.
     */
    flush(): string[] {
        if (this.buffer.trim().length > 0) {
            const line = this.buffer;
            this.buffer = '';
            return [line];
        }
        return [];
    }
}
