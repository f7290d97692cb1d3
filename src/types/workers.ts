import type { Job, JobKind, JobParameters, RunningJobStatus } from './job';
import type { SaveOptions, SubtitleEntryData } from './subtitle';

/** Callback for worker progress (0-100). */
export type ProgressCallback = (percent: number, message: string) => void;

/** Callbacks shared by every worker. */
export interface WorkerHandlers {
    onProgress: ProgressCallback;
}

/** Callbacks of the optimizer, which also streams document updates. */
export interface OptimizerHandlers extends WorkerHandlers {
    /** Text updates keyed by entry key. */
    onPartialUpdate: (updates: Record<string, string>) => void;
    /** Replacement of the whole document (e.g. after re-splitting). */
    onFullUpdate: (entries: SubtitleEntryData[]) => void;
}

/**
 * Speech-to-text collaborator. Resolves on success, rejects with the error
 * message on failure, and stops when the signal aborts.
 */
export interface Transcriber {
    run(job: Job, handlers: WorkerHandlers, signal: AbortSignal): Promise<void>;
}

/**
 * Subtitle optimization/translation collaborator.
 */
export interface Optimizer {
    run(job: Job, prompt: string, handlers: OptimizerHandlers, signal: AbortSignal): Promise<void>;
}

/**
 * Collaborator for the final stage of the subtitle pipeline.
 */
export interface SubtitleGenerator {
    run(job: Job, handlers: WorkerHandlers, signal: AbortSignal): Promise<void>;
}

/**
 * Reads and writes subtitle documents.
 */
export interface DocumentCodec {
    load(filePath: string): Promise<SubtitleEntryData[]>;
    save(entries: SubtitleEntryData[], filePath: string, options: SaveOptions): Promise<void>;
}

/**
 * Creates jobs from source files.
 */
export interface JobFactory {
    create(filePath: string, kind: JobKind, parameters: JobParameters): Promise<Job>;
}

/** Callbacks the scheduler passes to the executor for one run. */
export interface JobRunHandlers extends WorkerHandlers {
    /** Called when the run moves to the next stage. */
    onStage: (stage: RunningJobStatus) => void;
}

/**
 * Runs a job through the stages of its kind.
 */
export interface JobExecutor {
    run(job: Job, handlers: JobRunHandlers, signal: AbortSignal): Promise<void>;
}
