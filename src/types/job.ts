import type { SubtitleLayout } from './subtitle';

/**
 * What a job produces.
 *
 * - `subtitle`: transcribe, optionally optimize/translate, then generate the output.
 * - `transcription`: transcribe only.
 * - `optimization`: optimize/translate an existing subtitle file.
 */
export type JobKind = 'subtitle' | 'transcription' | 'optimization';

/** Stages during which a worker is active for the job. */
export type RunningJobStatus = 'transcribing' | 'optimizing' | 'generating';

/** Terminal outcomes of a run. */
export type TerminalJobStatus = 'completed' | 'failed';

/**
 * Status of a job.
 */
export type JobStatus = 'pending' | RunningJobStatus | TerminalJobStatus;

/**
 * Worker parameters captured when the job is created.
 * The scheduler never reads these; they are handed to the workers as-is.
 */
export interface JobParameters {
    /** Target language for translation. */
    targetLanguage: string;
    /** Whether the optimizer should polish the transcript. */
    needOptimize: boolean;
    /** Whether the optimizer should translate the transcript. */
    needTranslate: boolean;
    /** Whether long lines should be re-split. */
    needSplit: boolean;
    /** Number of entries sent to the optimizer per request. */
    batchSize: number;
    /** Number of optimizer requests in flight. */
    threadNum: number;
    /** Reference text given to the optimizer. */
    customPrompt: string;
    /** Model name used by the optimizer. */
    llmModel: string;
    /** Maximum characters per line for CJK text when splitting. */
    maxWordCountCjk: number;
    /** Maximum words per line for English text when splitting. */
    maxWordCountEnglish: number;
    /** Layout of bilingual output files. */
    subtitleLayout: SubtitleLayout;
}

/** Metadata probed from the source file. */
export interface MediaInfo {
    /** File size in bytes. */
    sizeBytes: number;
    /** Lower-case extension without the dot. */
    extension: string;
    /** Media category inferred from the extension. */
    mediaType: 'video' | 'audio' | 'subtitle';
}

/**
 * A unit of work in a batch.
 */
export interface Job {
    /** Unique identifier. */
    id: string;
    /** Full path of the source file; unique within a batch. */
    filePath: string;
    /** Display name of the source file. */
    fileName: string;
    kind: JobKind;
    status: JobStatus;
    /** Progress of the current stage (0-100). */
    progress: number;
    /** Last message reported by the worker. */
    progressMessage: string;
    parameters: JobParameters;
    /** Error message if status is 'failed'. */
    errorMessage?: string;
    media?: MediaInfo;
}
