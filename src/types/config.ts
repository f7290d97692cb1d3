import type { CompletionPolicy } from './completion';
import type { SubtitleLayout } from './subtitle';

/**
 * Configuration for the application.
 */
export interface AppConfig {
    /** Command line of the transcription worker (e.g. `whisper-worker --json`). */
    transcriberCommand: string;
    /** Command line of the subtitle optimization worker. */
    optimizerCommand: string;
    /** Command line of the worker that renders the final subtitled output. */
    generatorCommand: string;
    /** Target language for translation. */
    targetLanguage: string;
    /** Enable subtitle optimization. */
    needOptimize: boolean;
    /** Enable subtitle translation. */
    needTranslate: boolean;
    /** Re-split long lines after optimization. */
    needSplit: boolean;
    /** Entries per optimizer request. Default: 10. */
    batchSize: number;
    /** Concurrent optimizer requests. Default: 4. */
    threadNum: number;
    /** Reference text handed to the optimizer. */
    customPrompt: string;
    /** Optimizer model name. */
    llmModel: string;
    /** Max characters per CJK line. Default: 18. */
    maxWordCountCjk: number;
    /** Max words per English line. Default: 12. */
    maxWordCountEnglish: number;
    /** Layout of bilingual exports. */
    subtitleLayout: SubtitleLayout;
    /** `[V4+ Styles]` section written into ASS exports. Empty uses the built-in style. */
    assStyle: string;
    /** Action to take when a batch finishes. */
    completionPolicy: CompletionPolicy;
    /** Grace window before suspend/shutdown, in seconds. Default: 60. */
    countdownSeconds: number;
}
