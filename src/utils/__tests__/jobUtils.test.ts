import { describe, it, expect } from 'vitest';
import type { Job, JobStatus } from '../../types/job';
import { DEFAULT_CONFIG, toJobParameters } from '../../stores/configStore';
import { findNextRunnableJob, findRunningJob, getFileName, isSameFile, updateJob } from '../jobUtils';

function makeJob(id: string, status: JobStatus): Job {
    return {
        id,
        filePath: `/videos/${id}.mp4`,
        fileName: `${id}.mp4`,
        kind: 'subtitle',
        status,
        progress: 0,
        progressMessage: '',
        parameters: toJobParameters(DEFAULT_CONFIG),
    };
}

describe('jobUtils', () => {
    it('should find the first job that is neither completed nor failed', () => {
        const jobs = [makeJob('a', 'completed'), makeJob('b', 'failed'), makeJob('c', 'pending'), makeJob('d', 'pending')];
        expect(findNextRunnableJob(jobs)?.id).toBe('c');
        expect(findNextRunnableJob([makeJob('a', 'completed')])).toBeUndefined();
    });

    it('should find the running job', () => {
        expect(findRunningJob([makeJob('a', 'pending'), makeJob('b', 'optimizing')])?.id).toBe('b');
        expect(findRunningJob([makeJob('a', 'pending')])).toBeUndefined();
    });

    it('should compare resolved paths', () => {
        expect(isSameFile('/videos/a.mp4', '/videos/../videos/a.mp4')).toBe(true);
        expect(isSameFile('/videos/a.mp4', '/videos/b.mp4')).toBe(false);
    });

    it('should extract file names from either separator', () => {
        expect(getFileName('/videos/talk.mp4')).toBe('talk.mp4');
        expect(getFileName('C:\\videos\\talk.mp4')).toBe('talk.mp4');
    });

    it('should update a single job and keep the array when nothing matches', () => {
        const jobs = [makeJob('a', 'pending'), makeJob('b', 'pending')];
        const updated = updateJob(jobs, 'b', (job) => ({ ...job, progress: 40 }));
        expect(updated[1].progress).toBe(40);
        expect(updated[0]).toBe(jobs[0]);
        expect(jobs[1].progress).toBe(0);
        expect(updateJob(jobs, 'missing', (job) => job)).toBe(jobs);
    });
});
