import { createStore } from 'zustand/vanilla';
import type { AppConfig } from '../types/config';
import type { CompletionPolicy } from '../types/completion';
import type { Job, JobKind } from '../types/job';
import type { JobExecutor, JobFactory } from '../types/workers';
import { ACCEPTED, type CommandResult, rejected } from '../types/result';
import type { CompletionDispatcher } from '../services/completionService';
import { toJobParameters } from './configStore';
import type { Notifier } from './notificationStore';
import { EventBus } from '../utils/eventBus';
import { toErrorMessage } from '../utils/errorUtils';
import { isRunningStatus, transitionJobStatus } from '../utils/jobStateMachine';
import { findNextRunnableJob, findRunningJob, isSameFile, updateJob } from '../utils/jobUtils';
import { getExtension, isAcceptedFile } from '../utils/mediaFormats';

/** Events emitted by the batch scheduler. */
export interface BatchEvents {
    job_started: { job: Job };
    job_finished: { job: Job };
    job_failed: { job: Job; message: string };
    batch_finished: { completed: number; failed: number };
}

/** Whether the scheduler is driving a batch. */
export type SchedulerState = 'idle' | 'active';

/** State interface for the batch scheduler store. */
export interface BatchState {
    /** Jobs in list order. */
    jobs: Job[];
    schedulerState: SchedulerState;
    /** ID of the job whose worker is active. */
    activeJobId: string | null;
    /** Action to take once a batch finishes. */
    completionPolicy: CompletionPolicy;

    /**
     * Creates a job for a file and appends it to the list.
     *
     * @param filePath Source file.
     * @param kind What the job produces.
     */
    addJob: (filePath: string, kind: JobKind) => Promise<CommandResult>;

    /**
     * Adds several files in order.
     *
     * @return One result per path.
     */
    addJobs: (filePaths: string[], kind: JobKind) => Promise<CommandResult[]>;

    /**
     * Starts running every unfinished job, one at a time, in list order.
     */
    startBatch: () => CommandResult;

    /**
     * Stops the batch and cancels the running job. Safe to call at any time.
     */
    cancelBatch: () => void;

    /**
     * Starts a single job.
     *
     * @param id Job ID.
     */
    startJob: (id: string) => CommandResult;

    /**
     * Cancels a job's run and returns it to pending. Idempotent.
     *
     * @param id Job ID.
     */
    cancelJob: (id: string) => void;

    /**
     * Returns a finished job to pending so that it runs again.
     *
     * @param id Job ID.
     */
    resetJob: (id: string) => CommandResult;

    /**
     * Removes a job from the list.
     *
     * @param id Job ID.
     */
    removeJob: (id: string) => CommandResult;

    /** Removes every job. */
    clearAll: () => CommandResult;

    /**
     * Sets the action taken when a batch finishes.
     */
    setCompletionPolicy: (policy: CompletionPolicy) => void;
}

/** Dependencies of the batch store. */
export interface BatchStoreDeps {
    executor: JobExecutor;
    jobFactory: JobFactory;
    /** Reads the current configuration when a job is created. */
    getConfig: () => AppConfig;
    /** Runs the completion policy once a batch finishes. */
    completion?: CompletionDispatcher;
    notify?: Notifier;
    events?: EventBus<BatchEvents>;
}

const logNotifier: Notifier = (variant, title, message) => {
    console.log(`[BatchStore] (${variant}) ${title}: ${message}`);
};

/**
 * Creates a batch scheduler.
 *
 * At most one job runs at a time. When the driven job reaches a terminal
 * status, the scheduler scans the list from the top for the next job that
 * is neither completed nor failed, so jobs returned to pending by a cancel
 * run again in their original position.
 */
export function createBatchStore({
    executor,
    jobFactory,
    getConfig,
    completion,
    notify = logNotifier,
    events = new EventBus<BatchEvents>(),
}: BatchStoreDeps) {
    /** Abort controllers of dispatched runs, by job ID. */
    const runs = new Map<string, AbortController>();

    const store = createStore<BatchState>((set, get) => {
        const findJob = (id: string) => get().jobs.find((job) => job.id === id);

        const patchJob = (id: string, updater: (job: Job) => Job) => {
            set((state) => ({ jobs: updateJob(state.jobs, id, updater) }));
        };

        /** True if the run was cancelled or superseded. */
        const isStale = (id: string, controller: AbortController) => runs.get(id) !== controller;

        const finishBatch = () => {
            if (get().schedulerState !== 'active') return;

            const { jobs } = get();
            const completed = jobs.filter((job) => job.status === 'completed').length;
            const failed = jobs.filter((job) => job.status === 'failed').length;

            set({ schedulerState: 'idle', activeJobId: null });
            console.log(`[BatchStore] Batch finished: ${completed} completed, ${failed} failed`);
            events.emit('batch_finished', { completed, failed });
            notify('success', 'All done', 'All tasks have been processed');

            if (completion) {
                completion.dispatch(get().completionPolicy).catch((error) => {
                    console.error('[BatchStore] Completion action failed:', error);
                    notify('error', 'Completion action failed', toErrorMessage(error));
                });
            }
        };

        /** Starts the first unfinished job, or finishes the batch when there is none. */
        const advance = () => {
            if (get().schedulerState !== 'active') return;

            const next = findNextRunnableJob(get().jobs);
            if (!next) {
                finishBatch();
                return;
            }

            const result = get().startJob(next.id);
            if (!result.accepted) {
                console.error(`[BatchStore] Could not start ${next.fileName}: ${result.reason}`);
                set({ schedulerState: 'idle' });
                notify('error', 'Batch stopped', result.reason);
            }
        };

        const handleSuccess = (id: string, controller: AbortController) => {
            if (isStale(id, controller)) return;
            runs.delete(id);

            patchJob(id, (job) => ({
                ...job,
                status: transitionJobStatus(job.status, { type: 'succeed' }) ?? job.status,
                progress: 100,
            }));
            set({ activeJobId: null });

            const job = findJob(id);
            if (job) {
                console.log(`[BatchStore] Completed ${job.fileName}`);
                events.emit('job_finished', { job });
                notify('success', 'Task completed', job.fileName);
            }
            advance();
        };

        const handleFailure = (id: string, controller: AbortController, error: unknown) => {
            if (isStale(id, controller)) return;
            runs.delete(id);

            const message = toErrorMessage(error);
            patchJob(id, (job) => ({
                ...job,
                status: transitionJobStatus(job.status, { type: 'fail' }) ?? job.status,
                errorMessage: message,
            }));
            set({ activeJobId: null });

            const job = findJob(id);
            if (job) {
                console.error(`[BatchStore] Failed to process ${job.fileName}:`, message);
                events.emit('job_failed', { job, message });
                notify('error', 'Task failed', `${job.fileName}: ${message}`);
            }
            advance();
        };

        /** Stops tracking a run and returns the job to pending. */
        const cancelRun = (id: string): boolean => {
            const job = findJob(id);
            if (!job) return false;

            const controller = runs.get(id);
            if (!controller && !isRunningStatus(job.status)) return false;

            runs.delete(id);
            controller?.abort();
            patchJob(id, (current) => ({
                ...current,
                status: transitionJobStatus(current.status, { type: 'reset' }) ?? 'pending',
                progress: 0,
                progressMessage: '',
            }));
            if (get().activeJobId === id) {
                set({ activeJobId: null });
            }

            console.log(`[BatchStore] Cancelled ${job.fileName}`);
            notify('info', 'Task cancelled', job.fileName);
            return true;
        };

        const isJobRunning = (id: string) => {
            const job = findJob(id);
            return runs.has(id) || (job !== undefined && isRunningStatus(job.status));
        };

        return {
            jobs: [],
            schedulerState: 'idle',
            activeJobId: null,
            completionPolicy: getConfig().completionPolicy,

            addJob: async (filePath, kind) => {
                if (!isAcceptedFile(filePath, kind)) {
                    const reason = `Unsupported file format: .${getExtension(filePath) || '(none)'}`;
                    notify('error', 'Format error', reason);
                    return rejected('UnsupportedFormat', reason);
                }

                const isDuplicate = () => get().jobs.some((job) => isSameFile(job.filePath, filePath));
                if (isDuplicate()) {
                    notify('warning', 'Add failed', 'This file is already in the task list');
                    return rejected('DuplicateJob', `${filePath} is already in the task list`);
                }

                let job: Job;
                try {
                    job = await jobFactory.create(filePath, kind, toJobParameters(getConfig()));
                } catch (error) {
                    const reason = toErrorMessage(error);
                    console.error('[BatchStore] Failed to create task:', error);
                    notify('error', 'Add failed', reason);
                    return rejected('WorkerError', reason);
                }

                // The list may have changed while the file was probed.
                if (isDuplicate()) {
                    notify('warning', 'Add failed', 'This file is already in the task list');
                    return rejected('DuplicateJob', `${filePath} is already in the task list`);
                }

                const added: Job = { ...job, status: 'pending', progress: 0, progressMessage: '' };
                set((state) => ({ jobs: [...state.jobs, added] }));
                notify('success', 'Task added', added.fileName);
                return ACCEPTED;
            },

            addJobs: async (filePaths, kind) => {
                const results: CommandResult[] = [];
                for (const filePath of filePaths) {
                    results.push(await get().addJob(filePath, kind));
                }
                return results;
            },

            startBatch: () => {
                const state = get();
                if (state.schedulerState === 'active') {
                    notify('warning', 'Busy', 'A batch is already being processed');
                    return rejected('BusyBatch', 'A batch is already being processed');
                }
                if (state.jobs.length === 0) {
                    notify('warning', 'Warning', 'There are no tasks to process');
                    return rejected('EmptyBatch', 'There are no tasks to process');
                }
                const running = findRunningJob(state.jobs);
                if (running || runs.size > 0) {
                    const reason = `${running?.fileName ?? 'A task'} is still running`;
                    notify('warning', 'Busy', reason);
                    return rejected('BusyBatch', reason);
                }

                set({ schedulerState: 'active' });
                console.log(`[BatchStore] Starting batch of ${state.jobs.length} tasks`);
                notify('info', 'Processing started', 'Batch processing has started');
                advance();
                return ACCEPTED;
            },

            cancelBatch: () => {
                const wasActive = get().schedulerState === 'active';
                set({ schedulerState: 'idle' });

                let cancelled = 0;
                for (const job of get().jobs) {
                    if (cancelRun(job.id)) cancelled++;
                }

                if (wasActive || cancelled > 0) {
                    console.log(`[BatchStore] Batch cancelled (${cancelled} running tasks stopped)`);
                    notify('warning', 'Cancelled', 'Batch processing has been cancelled');
                }
            },

            startJob: (id) => {
                const job = findJob(id);
                if (!job) {
                    return rejected('JobNotFound', `No task with id ${id}`);
                }
                if (job.status === 'completed') {
                    console.warn(`[BatchStore] ${job.fileName} is already completed`);
                    notify('warning', 'Warning', 'This task has already been completed');
                    return rejected('JobCompleted', `${job.fileName} has already been completed`);
                }
                const running = findRunningJob(get().jobs);
                if (running || runs.size > 0) {
                    const reason = `${running?.fileName ?? 'Another task'} is still running`;
                    notify('warning', 'Busy', reason);
                    return rejected('BusyBatch', reason);
                }

                const firstStage = transitionJobStatus(job.status, { type: 'start', kind: job.kind });
                if (!firstStage) {
                    return rejected('BusyBatch', `${job.fileName} cannot be started from status ${job.status}`);
                }

                const controller = new AbortController();
                runs.set(id, controller);
                patchJob(id, (current) => ({
                    ...current,
                    status: firstStage,
                    progress: 0,
                    progressMessage: '',
                    errorMessage: undefined,
                }));
                set({ activeJobId: id });

                const started = findJob(id) ?? job;
                console.log(`[BatchStore] Started ${started.fileName} (${firstStage})`);
                events.emit('job_started', { job: started });

                let run: Promise<void>;
                try {
                    run = executor.run(
                        started,
                        {
                            onStage: (stage) => {
                                if (isStale(id, controller)) return;
                                const current = findJob(id);
                                if (!current) return;
                                const next = transitionJobStatus(current.status, { type: 'stage', kind: current.kind, stage });
                                if (!next) {
                                    console.warn(`[BatchStore] Ignoring stage ${stage} for ${current.fileName} in ${current.status}`);
                                    return;
                                }
                                patchJob(id, (j) => ({ ...j, status: next, progress: 0 }));
                            },
                            onProgress: (percent, message) => {
                                if (isStale(id, controller)) return;
                                patchJob(id, (j) => ({
                                    ...j,
                                    progress: Math.min(100, Math.max(0, percent)),
                                    progressMessage: message,
                                }));
                            },
                        },
                        controller.signal
                    );
                } catch (error) {
                    run = Promise.reject(error);
                }

                run.then(
                    () => handleSuccess(id, controller),
                    (error: unknown) => handleFailure(id, controller, error)
                ).catch((error) => {
                    console.error('[BatchStore] Listener failed after run:', error);
                });
                return ACCEPTED;
            },

            cancelJob: (id) => {
                const state = get();
                if (state.schedulerState === 'active' && state.activeJobId === id) {
                    // Re-scanning would pick the same job again, so the batch stops with it.
                    get().cancelBatch();
                    return;
                }
                cancelRun(id);
            },

            resetJob: (id) => {
                const job = findJob(id);
                if (!job) {
                    return rejected('JobNotFound', `No task with id ${id}`);
                }
                if (isJobRunning(id)) {
                    notify('warning', 'Busy', 'A running task cannot be reprocessed');
                    return rejected('BusyBatch', `${job.fileName} is running`);
                }

                patchJob(id, (current) => ({
                    ...current,
                    status: transitionJobStatus(current.status, { type: 'reset' }) ?? 'pending',
                    progress: 0,
                    progressMessage: '',
                    errorMessage: undefined,
                }));
                return ACCEPTED;
            },

            removeJob: (id) => {
                if (get().schedulerState === 'active') {
                    notify('warning', 'Cannot remove', 'Tasks cannot be removed while processing');
                    return rejected('BusyBatch', 'Tasks cannot be removed while processing');
                }
                const job = findJob(id);
                if (!job) {
                    return rejected('JobNotFound', `No task with id ${id}`);
                }
                if (isJobRunning(id)) {
                    notify('warning', 'Cannot remove', 'A running task cannot be removed');
                    return rejected('BusyBatch', `${job.fileName} is running`);
                }

                set((state) => ({ jobs: state.jobs.filter((j) => j.id !== id) }));
                notify('success', 'Task removed', job.fileName);
                return ACCEPTED;
            },

            clearAll: () => {
                if (get().schedulerState === 'active' || runs.size > 0) {
                    notify('warning', 'Cannot clear', 'Tasks cannot be cleared while processing');
                    return rejected('BusyBatch', 'Tasks cannot be cleared while processing');
                }

                set({ jobs: [], activeJobId: null });
                notify('success', 'Cleared', 'All tasks have been cleared');
                return ACCEPTED;
            },

            setCompletionPolicy: (policy) => set({ completionPolicy: policy }),
        };
    });

    return Object.assign(store, { events });
}

/** Store instance returned by createBatchStore. */
export type BatchStore = ReturnType<typeof createBatchStore>;
