import { describe, it, expect } from 'vitest';
import { StreamLineBuffer, parseWorkerLine } from '../streamBuffer';

describe('StreamLineBuffer', () => {
    it('should hold incomplete lines until the newline arrives', () => {
        const buffer = new StreamLineBuffer();
        expect(buffer.process('{"type":"prog')).toEqual([]);
        expect(buffer.process('ress"}\nnext')).toEqual(['{"type":"progress"}']);
        expect(buffer.flush()).toEqual(['next']);
        expect(buffer.flush()).toEqual([]);
    });

    it('should strip carriage returns and skip blank lines', () => {
        const buffer = new StreamLineBuffer();
        expect(buffer.process('a\r\n\r\n  \nb\n')).toEqual(['a', 'b']);
    });
});

describe('parseWorkerLine', () => {
    it('should parse progress messages', () => {
        expect(parseWorkerLine('{"type":"progress","percent":42,"message":"Transcribing"}')).toEqual({
            type: 'progress',
            percent: 42,
            message: 'Transcribing',
        });
    });

    it('should keep only string values of partial updates', () => {
        expect(parseWorkerLine('{"type":"partial","updates":{"1":"Hello\\nBonjour","2":7}}')).toEqual({
            type: 'partial',
            updates: { '1': 'Hello\nBonjour' },
        });
    });

    it('should drop full update entries without numeric times', () => {
        const line = JSON.stringify({
            type: 'full',
            entries: [
                { startTime: 0, endTime: 1000, originalText: 'One' },
                { startTime: 'x', endTime: 2000 },
            ],
        });
        expect(parseWorkerLine(line)).toEqual({
            type: 'full',
            entries: [{ startTime: 0, endTime: 1000, originalText: 'One', translatedText: '' }],
        });
    });

    it('should parse worker errors', () => {
        expect(parseWorkerLine('{"type":"error","message":"model missing"}')).toEqual({ type: 'error', message: 'model missing' });
    });

    it('should pass other output through as log lines', () => {
        expect(parseWorkerLine('loading model...')).toEqual({ type: 'log', message: 'loading model...' });
        expect(parseWorkerLine('{"type":"unknown"}')).toEqual({ type: 'log', message: '{"type":"unknown"}' });
        expect(parseWorkerLine('[1,2]')).toEqual({ type: 'log', message: '[1,2]' });
    });
});
