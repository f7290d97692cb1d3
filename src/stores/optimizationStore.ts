import { createStore } from 'zustand/vanilla';
import type { AppConfig } from '../types/config';
import type { Job } from '../types/job';
import type { SaveOptions } from '../types/subtitle';
import type { DocumentCodec, JobFactory, Optimizer } from '../types/workers';
import { ACCEPTED, type CommandResult, rejected } from '../types/result';
import { toJobParameters } from './configStore';
import type { Notifier } from './notificationStore';
import { createSubtitleStore, type SubtitleStore } from './subtitleStore';
import { toErrorMessage } from '../utils/errorUtils';
import { FileIntakeQueue } from '../utils/fileIntakeQueue';
import { isTerminalStatus, transitionJobStatus } from '../utils/jobStateMachine';
import { getFileName } from '../utils/jobUtils';
import { getExtension, isSubtitleFile } from '../utils/mediaFormats';
import { SubtitleFormatError } from '../utils/subtitleFormats';

/** State interface for the subtitle optimization session. */
export interface OptimizationState {
    /** The job of the loaded document. */
    currentJob: Job | null;
    /** Whether the optimizer is running. */
    isProcessing: boolean;
    /** Whether a queued or selected file is being loaded. */
    isLoading: boolean;
    /** Paths waiting in the intake queue, head first. */
    pendingFiles: string[];
    /** Reference text given to the optimizer. */
    customPrompt: string;

    /**
     * Queues subtitle files. When the session has nothing left to work on,
     * the first queued file is loaded straight away.
     *
     * @param filePaths Dropped or selected files.
     * @return The number of files queued.
     */
    enqueueFiles: (filePaths: string[]) => Promise<number>;

    /**
     * Loads the next queued file. Files that fail to load are skipped.
     * Does nothing while another file is loading.
     *
     * @return True if a file was loaded.
     */
    processNextFile: () => Promise<boolean>;

    /**
     * Loads a subtitle document and creates its job.
     *
     * @param filePath The subtitle file.
     */
    loadFile: (filePath: string) => Promise<CommandResult>;

    /**
     * Runs the optimizer on the loaded document. Once it finishes, the next
     * queued file is loaded and processed.
     */
    process: () => CommandResult;

    /** Stops the optimizer and returns the job to pending. */
    cancel: () => void;

    setCustomPrompt: (prompt: string) => void;

    /**
     * Writes the document with the configured layout. ASS targets also get
     * the configured style section.
     *
     * @param filePath Target path. Defaults to the loaded file.
     */
    saveDocument: (filePath?: string) => Promise<CommandResult>;
}

/** Dependencies of the optimization session. */
export interface OptimizationStoreDeps {
    optimizer: Optimizer;
    jobFactory: JobFactory;
    getConfig: () => AppConfig;
    /** Codec of the session's document, used when no subtitle store is given. */
    codec: DocumentCodec;
    subtitles?: SubtitleStore;
    notify?: Notifier;
}

const logNotifier: Notifier = (variant, title, message) => {
    console.log(`[Optimization] (${variant}) ${title}: ${message}`);
};

/**
 * Creates a subtitle optimization session fed by a file intake queue.
 */
export function createOptimizationStore({
    optimizer,
    jobFactory,
    getConfig,
    codec,
    subtitles = createSubtitleStore({ codec }),
    notify = logNotifier,
}: OptimizationStoreDeps) {
    const queue = new FileIntakeQueue();
    let activeRun: AbortController | null = null;

    const store = createStore<OptimizationState>((set, get) => {
        const syncQueue = () => set({ pendingFiles: queue.toArray() });

        const patchCurrent = (updater: (job: Job) => Job) => {
            const { currentJob } = get();
            if (currentJob) set({ currentJob: updater(currentJob) });
        };

        /** Moves on to the next queued file once a run has finished. */
        const advance = () => {
            if (queue.isEmpty) return;
            get()
                .processNextFile()
                .then((loaded) => {
                    if (loaded) get().process();
                })
                .catch((error) => {
                    console.error('[Optimization] Failed to continue with the next file:', error);
                });
        };

        /** Reads a document and makes it the current job. */
        const loadDocument = async (filePath: string): Promise<CommandResult> => {
            try {
                const job = await jobFactory.create(filePath, 'optimization', toJobParameters(getConfig()));
                await subtitles.getState().loadDocument(filePath);
                set({ currentJob: { ...job, status: 'pending', progress: 0, progressMessage: '' } });
                console.log('[Optimization] Loaded', filePath);
                return ACCEPTED;
            } catch (error) {
                const reason = toErrorMessage(error);
                console.error('[Optimization] Failed to load file:', error);
                notify('error', 'Failed to load file', `${getFileName(filePath)}: ${reason}`);
                const code = error instanceof SubtitleFormatError && error.code === 'UnsupportedFormat' ? 'UnsupportedFormat' : 'WorkerError';
                return rejected(code, reason);
            }
        };

        /** Marks the session as loading until the task settles. */
        const whileLoading = async <T>(task: () => Promise<T>): Promise<T> => {
            set({ isLoading: true });
            try {
                return await task();
            } finally {
                set({ isLoading: false });
            }
        };

        const finishRun = (controller: AbortController, error?: unknown) => {
            if (activeRun !== controller) return;
            activeRun = null;

            if (error === undefined) {
                patchCurrent((job) => ({
                    ...job,
                    status: transitionJobStatus(job.status, { type: 'succeed' }) ?? job.status,
                    progress: 100,
                }));
                const name = get().currentJob?.fileName ?? '';
                console.log('[Optimization] Finished', name);
                notify('success', 'Optimization completed', name);
            } else {
                const message = toErrorMessage(error);
                patchCurrent((job) => ({
                    ...job,
                    status: transitionJobStatus(job.status, { type: 'fail' }) ?? job.status,
                    errorMessage: message,
                }));
                console.error('[Optimization] Failed:', message);
                notify('error', 'Optimization failed', message);
            }

            set({ isProcessing: false });
            advance();
        };

        return {
            currentJob: null,
            isProcessing: false,
            isLoading: false,
            pendingFiles: [],
            customPrompt: getConfig().customPrompt,

            enqueueFiles: async (filePaths) => {
                const accepted = filePaths.filter((filePath) => {
                    if (isSubtitleFile(filePath)) return true;
                    notify('warning', 'Format error', `${getFileName(filePath)} is not a supported subtitle file`);
                    return false;
                });
                if (accepted.length === 0) return 0;

                queue.enqueue(...accepted);
                syncQueue();
                console.log(`[Optimization] Queued ${accepted.length} files (${queue.size} waiting)`);

                const { isProcessing, isLoading, currentJob } = get();
                if (!isProcessing && !isLoading && (!currentJob || isTerminalStatus(currentJob.status))) {
                    await get().processNextFile();
                }
                return accepted.length;
            },

            processNextFile: async () => {
                if (get().isLoading) return false;

                return whileLoading(async () => {
                    let next = queue.dequeueNext();
                    while (next !== undefined) {
                        syncQueue();
                        const result = await loadDocument(next);
                        if (result.accepted) return true;
                        next = queue.dequeueNext();
                    }
                    syncQueue();
                    return false;
                });
            },

            loadFile: async (filePath) => {
                if (get().isProcessing) {
                    notify('warning', 'Busy', 'Wait for the current optimization to finish');
                    return rejected('BusyBatch', 'An optimization is running');
                }
                if (get().isLoading) {
                    notify('warning', 'Busy', 'Wait for the current file to finish loading');
                    return rejected('BusyBatch', 'A file is being loaded');
                }

                return whileLoading(() => loadDocument(filePath));
            },

            process: () => {
                const { currentJob, isProcessing, customPrompt } = get();
                if (!currentJob) {
                    notify('warning', 'Warning', 'Load a subtitle file first');
                    return rejected('NothingLoaded', 'No subtitle file is loaded');
                }
                if (isProcessing) {
                    notify('warning', 'Busy', 'An optimization is already running');
                    return rejected('BusyBatch', 'An optimization is already running');
                }
                if (get().isLoading) {
                    notify('warning', 'Busy', 'Wait for the current file to finish loading');
                    return rejected('BusyBatch', 'A file is being loaded');
                }
                const status = transitionJobStatus(currentJob.status, { type: 'start', kind: currentJob.kind });
                if (!status) {
                    notify('warning', 'Warning', 'This file has already been optimized');
                    return rejected('JobCompleted', `${currentJob.fileName} has already been optimized`);
                }

                const controller = new AbortController();
                activeRun = controller;
                const job: Job = { ...currentJob, status, progress: 0, progressMessage: '', errorMessage: undefined };
                set({ currentJob: job, isProcessing: true });
                console.log('[Optimization] Started', job.fileName);

                let run: Promise<void>;
                try {
                    run = optimizer.run(
                        job,
                        customPrompt,
                        {
                            onProgress: (percent, message) => {
                                if (activeRun !== controller) return;
                                patchCurrent((j) => ({ ...j, progress: Math.min(100, Math.max(0, percent)), progressMessage: message }));
                            },
                            onPartialUpdate: (updates) => {
                                if (activeRun !== controller) return;
                                subtitles.getState().applyPartialUpdate(updates);
                            },
                            onFullUpdate: (entries) => {
                                if (activeRun !== controller) return;
                                subtitles.getState().setEntries(entries);
                            },
                        },
                        controller.signal
                    );
                } catch (error) {
                    run = Promise.reject(error);
                }

                run.then(
                    () => finishRun(controller),
                    (error: unknown) => finishRun(controller, error ?? new Error('Optimization failed'))
                ).catch((error) => {
                    console.error('[Optimization] Listener failed after run:', error);
                });
                return ACCEPTED;
            },

            cancel: () => {
                const controller = activeRun;
                if (!controller) return;

                activeRun = null;
                controller.abort();
                patchCurrent((job) => ({
                    ...job,
                    status: transitionJobStatus(job.status, { type: 'reset' }) ?? 'pending',
                    progress: 0,
                    progressMessage: '',
                }));
                set({ isProcessing: false });
                console.log('[Optimization] Cancelled');
                notify('info', 'Cancelled', 'Optimization has been cancelled');
            },

            setCustomPrompt: (prompt) => set({ customPrompt: prompt }),

            saveDocument: async (filePath) => {
                const target = filePath ?? subtitles.getState().filePath;
                if (!target) {
                    return rejected('NothingLoaded', 'No subtitle file is loaded');
                }
                const { subtitleLayout, assStyle } = getConfig();
                const options: SaveOptions = { layout: subtitleLayout };
                if (assStyle.trim() && getExtension(target) === 'ass') {
                    options.style = assStyle;
                }
                try {
                    await subtitles.getState().saveDocument(target, options);
                    notify('success', 'Saved', getFileName(target));
                    return ACCEPTED;
                } catch (error) {
                    const reason = toErrorMessage(error);
                    console.error('[Optimization] Failed to save:', error);
                    notify('error', 'Save failed', reason);
                    const code = error instanceof SubtitleFormatError && error.code === 'UnsupportedFormat' ? 'UnsupportedFormat' : 'WorkerError';
                    return rejected(code, reason);
                }
            },
        };
    });

    return Object.assign(store, { subtitles, queue });
}

/** Store instance returned by createOptimizationStore. */
export type OptimizationStore = ReturnType<typeof createOptimizationStore>;
