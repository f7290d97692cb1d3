import type { AppConfig } from './types/config';
import type { DocumentCodec, JobExecutor, JobFactory, Optimizer, SubtitleGenerator, Transcriber } from './types/workers';
import { createBatchStore } from './stores/batchStore';
import { createConfigStore } from './stores/configStore';
import { createDialogStore } from './stores/dialogStore';
import { createNotificationStore, toNotifier } from './stores/notificationStore';
import { createOptimizationStore } from './stores/optimizationStore';
import { createCompletionDispatcher, type CompletionDeps } from './services/completionService';
import { fileJobFactory } from './services/jobFactory';
import { createJobRunner } from './services/jobRunner';
import { createSidecarGenerator, createSidecarOptimizer, createSidecarTranscriber } from './services/sidecarService';
import { subtitleCodec } from './services/subtitleCodec';

export type * from './types/job';
export type * from './types/subtitle';
export type * from './types/completion';
export type * from './types/config';
export type * from './types/workers';
export { ACCEPTED, rejected, type CommandResult, type ErrorCode } from './types/result';

export { createBatchStore, type BatchEvents, type BatchState, type BatchStore } from './stores/batchStore';
export { createConfigStore, DEFAULT_CONFIG, toJobParameters, type ConfigStore } from './stores/configStore';
export { createDialogStore, type DialogStore } from './stores/dialogStore';
export { createNotificationStore, toNotifier, type Notifier, type NotificationStore } from './stores/notificationStore';
export { createOptimizationStore, type OptimizationStore } from './stores/optimizationStore';
export { createSubtitleStore, mergeEntries, reindexEntries, type SubtitleEvents, type SubtitleStore } from './stores/subtitleStore';

export { configService, parseConfig } from './services/configService';
export { createCompletionDispatcher, type CompletionDispatcher } from './services/completionService';
export { fileJobFactory } from './services/jobFactory';
export { createJobRunner } from './services/jobRunner';
export { getPowerCommand, runPowerAction } from './services/powerService';
export { createSidecarGenerator, createSidecarOptimizer, createSidecarTranscriber, runSidecar } from './services/sidecarService';
export { subtitleCodec } from './services/subtitleCodec';

export { EventBus } from './utils/eventBus';
export { FileIntakeQueue } from './utils/fileIntakeQueue';
export { getStages, transitionJobStatus } from './utils/jobStateMachine';
export { SubtitleFormatError, parseEntries, serializeEntries } from './utils/subtitleFormats';
export { formatTimestamp, parseTimestamp } from './utils/timeUtils';

/** Collaborators that replace the default adapters. */
export interface CoreOverrides {
    transcriber?: Transcriber;
    optimizer?: Optimizer;
    generator?: SubtitleGenerator;
    executor?: JobExecutor;
    jobFactory?: JobFactory;
    codec?: DocumentCodec;
    power?: CompletionDeps['power'];
    exit?: CompletionDeps['exit'];
}

/**
 * Wires the stores and the default adapters together.
 *
 * Workers are external commands taken from the configuration; the
 * completion countdown goes through the dialog store, which the host
 * answers with `close(true | false)`.
 *
 * @param config Overrides applied on top of the defaults.
 * @param overrides Collaborators to use instead of the default adapters.
 */
export function createSubtitleBatchCore(config: Partial<AppConfig> = {}, overrides: CoreOverrides = {}) {
    const configStore = createConfigStore(config);
    const getConfig = () => configStore.getState().config;

    const notifications = createNotificationStore();
    const notify = toNotifier(notifications);
    const dialogs = createDialogStore();

    // Commands are read per run so that configuration changes apply to the next job.
    const transcriber: Transcriber = overrides.transcriber ?? {
        run: (job, handlers, signal) => createSidecarTranscriber(getConfig().transcriberCommand).run(job, handlers, signal),
    };
    const optimizer: Optimizer = overrides.optimizer ?? {
        run: (job, prompt, handlers, signal) => createSidecarOptimizer(getConfig().optimizerCommand).run(job, prompt, handlers, signal),
    };
    const generator: SubtitleGenerator = overrides.generator ?? {
        run: (job, handlers, signal) => createSidecarGenerator(getConfig().generatorCommand).run(job, handlers, signal),
    };

    const codec = overrides.codec ?? subtitleCodec;
    const jobFactory = overrides.jobFactory ?? fileJobFactory;

    const completion = createCompletionDispatcher({
        countdown: (message, seconds) => dialogs.getState().countdown(message, seconds, { title: 'Batch finished' }),
        power: overrides.power,
        exit: overrides.exit,
        notify,
        countdownSeconds: () => getConfig().countdownSeconds,
    });

    const batch = createBatchStore({
        executor: overrides.executor ?? createJobRunner({ transcriber, optimizer, generator }),
        jobFactory,
        getConfig,
        completion,
        notify,
    });

    const optimization = createOptimizationStore({
        optimizer,
        jobFactory,
        getConfig,
        codec,
        notify,
    });

    return { config: configStore, notifications, dialogs, batch, optimization };
}

/** Handles returned by createSubtitleBatchCore. */
export type SubtitleBatchCore = ReturnType<typeof createSubtitleBatchCore>;
