import type { Job } from '../types/job';
import type { JobExecutor, JobRunHandlers, Optimizer, SubtitleGenerator, Transcriber } from '../types/workers';
import { createAbortError } from '../utils/errorUtils';
import { getStages } from '../utils/jobStateMachine';

/** Workers the runner delegates each stage to. */
export interface JobRunnerDeps {
    transcriber: Transcriber;
    optimizer: Optimizer;
    generator: SubtitleGenerator;
}

function throwIfAborted(signal: AbortSignal): void {
    if (signal.aborted) {
        throw createAbortError('Job was cancelled');
    }
}

/**
 * Creates the executor that runs a job through the stages of its kind.
 *
 * Each stage is announced through `onStage` before its worker starts. The
 * run stops between stages once the signal aborts; stopping inside a stage
 * is up to the worker.
 */
export function createJobRunner({ transcriber, optimizer, generator }: JobRunnerDeps): JobExecutor {
    return {
        async run(job: Job, handlers: JobRunHandlers, signal: AbortSignal): Promise<void> {
            const stages = getStages(job.kind, job.parameters);
            console.log(`[JobRunner] Running ${job.fileName} (${job.kind}): ${stages.join(' -> ')}`);

            for (const stage of stages) {
                throwIfAborted(signal);
                handlers.onStage(stage);

                switch (stage) {
                    case 'transcribing':
                        await transcriber.run(job, { onProgress: handlers.onProgress }, signal);
                        break;
                    case 'optimizing':
                        await optimizer.run(
                            job,
                            job.parameters.customPrompt,
                            {
                                onProgress: handlers.onProgress,
                                // Batch jobs write their own output files; streamed document updates are not tracked here.
                                onPartialUpdate: () => {},
                                onFullUpdate: () => {},
                            },
                            signal
                        );
                        break;
                    case 'generating':
                        await generator.run(job, { onProgress: handlers.onProgress }, signal);
                        break;
                }
            }

            throwIfAborted(signal);
        },
    };
}
