import { describe, it, expect, vi } from 'vitest';
import type { JobFactory } from '../types/workers';
import { createSubtitleBatchCore } from '../index';

const flushPromises = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

const jobFactory: JobFactory = {
    create: async (filePath, kind, parameters) => ({
        id: filePath,
        filePath,
        fileName: filePath.split('/').pop() ?? filePath,
        kind,
        status: 'pending',
        progress: 0,
        progressMessage: '',
        parameters,
    }),
};

describe('createSubtitleBatchCore', () => {
    it('should ask before shutting down once the batch is done', async () => {
        const power = vi.fn(async () => {});
        const executor = { run: vi.fn(async () => {}) };
        const core = createSubtitleBatchCore({ completionPolicy: { type: 'shutdown' } }, { executor, jobFactory, power });

        await core.batch.getState().addJobs(['/videos/a.mp4', '/videos/b.mp4'], 'subtitle');
        core.batch.getState().startBatch();
        await flushPromises();

        expect(core.batch.getState().jobs.map((job) => job.status)).toEqual(['completed', 'completed']);
        expect(core.dialogs.getState().options).toMatchObject({ type: 'countdown', seconds: 60, title: 'Batch finished' });
        expect(power).not.toHaveBeenCalled();

        core.dialogs.getState().close(true);
        await flushPromises();

        expect(power).toHaveBeenCalledWith('shutdown');
    });

    it('should use the countdown length configured after creation', async () => {
        const power = vi.fn(async () => {});
        const core = createSubtitleBatchCore({ completionPolicy: { type: 'suspend' } }, { executor: { run: async () => {} }, jobFactory, power });
        core.config.getState().setConfig({ countdownSeconds: 15 });

        await core.batch.getState().addJob('/videos/a.mp4', 'subtitle');
        core.batch.getState().startBatch();
        await flushPromises();

        expect(core.dialogs.getState().options).toMatchObject({ type: 'countdown', seconds: 15 });
        core.dialogs.getState().close(false);
        await flushPromises();
    });

    it('should leave the host running when the countdown is cancelled', async () => {
        const power = vi.fn(async () => {});
        const core = createSubtitleBatchCore({ completionPolicy: { type: 'suspend' } }, { executor: { run: async () => {} }, jobFactory, power });

        await core.batch.getState().addJob('/videos/a.mp4', 'subtitle');
        core.batch.getState().startBatch();
        await flushPromises();
        core.dialogs.getState().close(false);
        await flushPromises();

        expect(power).not.toHaveBeenCalled();
        expect(core.notifications.getState().notifications.map((n) => n.title)).toContain('Cancelled');
    });

    it('should report batch rejections through the notification store', () => {
        const core = createSubtitleBatchCore({}, { jobFactory });

        core.batch.getState().startBatch();

        expect(core.notifications.getState().notifications).toEqual([
            expect.objectContaining({ variant: 'warning', message: 'There are no tasks to process' }),
        ]);
    });

    it('should run the default worker adapters with the configured commands', async () => {
        const core = createSubtitleBatchCore({ transcriberCommand: '' }, { jobFactory });

        await core.batch.getState().addJob('/videos/a.mp4', 'transcription');
        core.batch.getState().startBatch();
        await flushPromises();

        expect(core.batch.getState().jobs[0]).toMatchObject({ status: 'failed', errorMessage: 'No worker command configured' });
    });
});
