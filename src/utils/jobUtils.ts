import path from 'node:path';
import type { Job } from '../types/job';
import { isRunningStatus, isTerminalStatus } from './jobStateMachine';

/**
 * Finds the job a batch should run next: the first job, by list order,
 * that is neither completed nor failed.
 *
 * @param jobs The batch in list order.
 * @return The next job, or undefined if every job is terminal.
 */
export function findNextRunnableJob(jobs: readonly Job[]): Job | undefined {
    return jobs.find((job) => !isTerminalStatus(job.status));
}

/** Returns the job whose worker is active, if any. */
export function findRunningJob(jobs: readonly Job[]): Job | undefined {
    return jobs.find((job) => isRunningStatus(job.status));
}

/**
 * Compares two file paths after resolving them.
 */
export function isSameFile(a: string, b: string): boolean {
    return path.resolve(a) === path.resolve(b);
}

/** Extracts the display name from a path (handles both separators). */
export function getFileName(filePath: string): string {
    return filePath.split(/[/\\]/).pop() || filePath;
}

/**
 * Replaces the job with the given id using an updater.
 * Returns the original array if no job matches.
 */
export function updateJob(jobs: Job[], id: string, updater: (job: Job) => Job): Job[] {
    const index = jobs.findIndex((job) => job.id === id);
    if (index === -1) return jobs;
    const next = [...jobs];
    next[index] = updater(jobs[index]);
    return next;
}
