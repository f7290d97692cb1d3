import { spawn } from 'node:child_process';
import type { Job, RunningJobStatus } from '../types/job';
import type { Optimizer, SubtitleGenerator, Transcriber, WorkerHandlers } from '../types/workers';
import { createAbortError, isAbortError } from '../utils/errorUtils';
import { StreamLineBuffer, parseWorkerLine, type WorkerMessage } from '../utils/streamBuffer';

/** Lines of stderr kept for the failure message. */
const STDERR_TAIL_LINES = 20;

/**
 * Splits a configured command line into the program and its arguments.
 * Single and double quotes group words; quotes do not nest.
 */
export function splitCommandLine(commandLine: string): string[] {
    const parts: string[] = [];
    let current = '';
    let quote: '"' | "'" | null = null;
    let hasToken = false;

    for (const char of commandLine) {
        if (quote) {
            if (char === quote) {
                quote = null;
            } else {
                current += char;
            }
        } else if (char === '"' || char === "'") {
            quote = char;
            hasToken = true;
        } else if (/\s/.test(char)) {
            if (hasToken) {
                parts.push(current);
                current = '';
                hasToken = false;
            }
        } else {
            current += char;
            hasToken = true;
        }
    }
    if (hasToken) parts.push(current);
    return parts;
}

/**
 * Builds the arguments that describe one stage of a job to a worker.
 */
export function buildWorkerArgs(job: Job, stage: RunningJobStatus, prompt?: string): string[] {
    const p = job.parameters;
    const args = [
        '--stage', stage,
        '--file', job.filePath,
        '--kind', job.kind,
        '--target-language', p.targetLanguage,
        '--batch-size', String(p.batchSize),
        '--thread-num', String(p.threadNum),
        '--llm-model', p.llmModel,
        '--max-word-count-cjk', String(p.maxWordCountCjk),
        '--max-word-count-english', String(p.maxWordCountEnglish),
        '--layout', p.subtitleLayout,
    ];
    if (p.needOptimize) args.push('--optimize');
    if (p.needTranslate) args.push('--translate');
    if (p.needSplit) args.push('--split');
    if (prompt) args.push('--prompt', prompt);
    return args;
}

/**
 * Runs a worker process to completion.
 *
 * Stdout carries one JSON message per line. The promise resolves when the
 * process exits with code 0 without reporting an error, and rejects with the
 * worker's error message (or the tail of stderr) otherwise. Aborting the
 * signal kills the process and rejects with an AbortError.
 *
 * @param commandLine Configured command line of the worker.
 * @param args Arguments appended to the command line.
 * @param onMessage Receives each parsed stdout message.
 * @param signal Cancels the run.
 */
export function runSidecar(
    commandLine: string,
    args: string[],
    onMessage: (message: WorkerMessage) => void,
    signal: AbortSignal
): Promise<void> {
    const [program, ...baseArgs] = splitCommandLine(commandLine);
    if (!program) {
        return Promise.reject(new Error('No worker command configured'));
    }
    if (signal.aborted) {
        return Promise.reject(createAbortError('Job was cancelled'));
    }

    console.log(`[Sidecar] Spawning ${program} ${[...baseArgs, ...args].join(' ')}`);

    return new Promise<void>((resolve, reject) => {
        const child = spawn(program, [...baseArgs, ...args], { signal, stdio: ['ignore', 'pipe', 'pipe'] });
        const stdoutBuffer = new StreamLineBuffer();
        const stderrBuffer = new StreamLineBuffer();
        const stderrTail: string[] = [];
        let reportedError: string | null = null;
        let settled = false;

        const settle = (error?: Error) => {
            if (settled) return;
            settled = true;
            if (error) {
                reject(error);
            } else {
                resolve();
            }
        };

        const handleLine = (line: string) => {
            const message = parseWorkerLine(line);
            if (message.type === 'error') {
                reportedError = message.message;
            } else if (message.type === 'log') {
                console.log('[Sidecar]', message.message);
            }
            onMessage(message);
        };

        const keepStderr = (lines: string[]) => {
            stderrTail.push(...lines);
            stderrTail.splice(0, Math.max(0, stderrTail.length - STDERR_TAIL_LINES));
        };

        child.stdout.setEncoding('utf-8');
        child.stderr.setEncoding('utf-8');
        child.stdout.on('data', (chunk: string) => {
            stdoutBuffer.process(chunk).forEach(handleLine);
        });
        child.stderr.on('data', (chunk: string) => {
            keepStderr(stderrBuffer.process(chunk));
        });

        child.on('error', (error) => {
            if (signal.aborted || isAbortError(error)) {
                console.log(`[Sidecar] ${program} was cancelled`);
                settle(createAbortError('Job was cancelled'));
                return;
            }
            console.error(`[Sidecar] Failed to run ${program}:`, error);
            settle(error);
        });

        child.on('close', (code) => {
            stdoutBuffer.flush().forEach(handleLine);
            keepStderr(stderrBuffer.flush());
            console.log(`[Sidecar] ${program} finished with code ${code}`);

            if (signal.aborted) {
                settle(createAbortError('Job was cancelled'));
            } else if (reportedError !== null) {
                settle(new Error(reportedError));
            } else if (code !== 0) {
                const detail = stderrTail.join('\n').trim();
                settle(new Error(detail || `Worker exited with code ${code}`));
            } else {
                settle();
            }
        });
    });
}

function forwardProgress(handlers: WorkerHandlers) {
    return (message: WorkerMessage) => {
        if (message.type === 'progress') {
            handlers.onProgress(message.percent, message.message);
        }
    };
}

/**
 * Creates a transcriber that runs the given command for each job.
 */
export function createSidecarTranscriber(commandLine: string): Transcriber {
    return {
        run: (job, handlers, signal) =>
            runSidecar(commandLine, buildWorkerArgs(job, 'transcribing'), forwardProgress(handlers), signal),
    };
}

/**
 * Creates an optimizer that runs the given command for each job and
 * forwards streamed document updates.
 */
export function createSidecarOptimizer(commandLine: string): Optimizer {
    return {
        run: (job, prompt, handlers, signal) =>
            runSidecar(
                commandLine,
                buildWorkerArgs(job, 'optimizing', prompt),
                (message) => {
                    switch (message.type) {
                        case 'progress':
                            handlers.onProgress(message.percent, message.message);
                            break;
                        case 'partial':
                            handlers.onPartialUpdate(message.updates);
                            break;
                        case 'full':
                            handlers.onFullUpdate(message.entries);
                            break;
                    }
                },
                signal
            ),
    };
}

/**
 * Creates the generator of the last subtitle stage.
 */
export function createSidecarGenerator(commandLine: string): SubtitleGenerator {
    return {
        run: (job, handlers, signal) =>
            runSidecar(commandLine, buildWorkerArgs(job, 'generating'), forwardProgress(handlers), signal),
    };
}
