import type { JobKind, JobParameters, JobStatus, RunningJobStatus, TerminalJobStatus } from '../types/job';

/**
 * Events that move a job between statuses.
 */
export type JobEvent =
    | { type: 'start'; kind: JobKind }
    | { type: 'stage'; kind: JobKind; stage: RunningJobStatus }
    | { type: 'succeed' }
    | { type: 'fail' }
    | { type: 'reset' };

const RUNNING_STATUSES: ReadonlySet<JobStatus> = new Set<JobStatus>(['transcribing', 'optimizing', 'generating']);
const TERMINAL_STATUSES: ReadonlySet<JobStatus> = new Set<JobStatus>(['completed', 'failed']);

/** True while a worker is active for the job. */
export function isRunningStatus(status: JobStatus): status is RunningJobStatus {
    return RUNNING_STATUSES.has(status);
}

/** True for 'completed' and 'failed'. */
export function isTerminalStatus(status: JobStatus): status is TerminalJobStatus {
    return TERMINAL_STATUSES.has(status);
}

/**
 * Returns the stages a job of the given kind passes through, in order.
 * The optimizing stage of the subtitle pipeline only runs when the
 * parameters ask for optimization or translation.
 */
export function getStages(kind: JobKind, parameters?: Pick<JobParameters, 'needOptimize' | 'needTranslate'>): RunningJobStatus[] {
    switch (kind) {
        case 'transcription':
            return ['transcribing'];
        case 'optimization':
            return ['optimizing'];
        case 'subtitle':
            if (parameters && !parameters.needOptimize && !parameters.needTranslate) {
                return ['transcribing', 'generating'];
            }
            return ['transcribing', 'optimizing', 'generating'];
    }
}

/**
 * Computes the next status of a job.
 *
 * @param status The current status.
 * @param event The event to apply.
 * @return The next status, or null if the transition is not allowed.
 */
export function transitionJobStatus(status: JobStatus, event: JobEvent): JobStatus | null {
    switch (event.type) {
        case 'start':
            if (status === 'pending' || status === 'failed') {
                return getStages(event.kind)[0];
            }
            return null;
        case 'stage': {
            if (!isRunningStatus(status)) return null;
            const stages = getStages(event.kind);
            const from = stages.indexOf(status);
            const to = stages.indexOf(event.stage);
            return to > from ? event.stage : null;
        }
        case 'succeed':
            return isRunningStatus(status) ? 'completed' : null;
        case 'fail':
            return isRunningStatus(status) ? 'failed' : null;
        case 'reset':
            return 'pending';
    }
}
