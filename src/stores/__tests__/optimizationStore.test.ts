import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import type { Job } from '../../types/job';
import type { SubtitleEntryData } from '../../types/subtitle';
import type { DocumentCodec, JobFactory, Optimizer, OptimizerHandlers } from '../../types/workers';
import { DEFAULT_CONFIG } from '../configStore';
import type { Notifier } from '../notificationStore';
import { createOptimizationStore, type OptimizationStore } from '../optimizationStore';

interface PendingRun {
    job: Job;
    prompt: string;
    handlers: OptimizerHandlers;
    signal: AbortSignal;
    resolve: () => void;
    reject: (error: unknown) => void;
}

const entries: SubtitleEntryData[] = [
    { startTime: 0, endTime: 1000, originalText: 'hello', translatedText: '' },
    { startTime: 1000, endTime: 2000, originalText: 'world', translatedText: '' },
];

const flushPromises = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

describe('optimizationStore', () => {
    let runs: PendingRun[];
    let optimizer: { run: Mock<Optimizer['run']> };
    let jobFactory: { create: Mock<JobFactory['create']> };
    let codec: { load: Mock<DocumentCodec['load']>; save: Mock<DocumentCodec['save']> };
    let notify: Mock<Notifier>;
    let store: OptimizationStore;

    beforeEach(() => {
        runs = [];
        optimizer = {
            run: vi.fn<Optimizer['run']>((job, prompt, handlers, signal) => {
                return new Promise<void>((resolve, reject) => {
                    runs.push({ job, prompt, handlers, signal, resolve, reject });
                });
            }),
        };
        jobFactory = {
            create: vi.fn<JobFactory['create']>(async (filePath, kind, parameters) => ({
                id: filePath,
                filePath,
                fileName: filePath.split('/').pop() ?? filePath,
                kind,
                status: 'pending',
                progress: 0,
                progressMessage: '',
                parameters,
            })),
        };
        codec = {
            load: vi.fn<DocumentCodec['load']>().mockResolvedValue(entries),
            save: vi.fn<DocumentCodec['save']>().mockResolvedValue(undefined),
        };
        notify = vi.fn<Notifier>();
        store = createOptimizationStore({ optimizer, jobFactory, getConfig: () => DEFAULT_CONFIG, codec, notify });
    });

    describe('enqueueFiles', () => {
        it('should queue subtitle files and load the first one', async () => {
            const queued = await store.getState().enqueueFiles(['/subs/a.srt', '/subs/b.srt', '/subs/notes.txt']);

            expect(queued).toBe(2);
            expect(notify).toHaveBeenCalledWith('warning', 'Format error', 'notes.txt is not a supported subtitle file');
            expect(codec.load).toHaveBeenCalledWith('/subs/a.srt');
            expect(store.getState().currentJob).toMatchObject({ fileName: 'a.srt', kind: 'optimization', status: 'pending' });
            expect(store.getState().pendingFiles).toEqual(['/subs/b.srt']);
            expect(store.subtitles.getState().entries).toHaveLength(2);
            expect(optimizer.run).not.toHaveBeenCalled();
        });

        it('should keep a file dropped while the first one is still loading', async () => {
            let finishFirstLoad = () => {};
            codec.load.mockImplementationOnce(
                () =>
                    new Promise<SubtitleEntryData[]>((resolve) => {
                        finishFirstLoad = () => resolve(entries);
                    })
            );

            const first = store.getState().enqueueFiles(['/subs/a.srt']);
            expect(store.getState().isLoading).toBe(true);
            expect(await store.getState().enqueueFiles(['/subs/b.srt'])).toBe(1);
            await flushPromises();

            const busy = await store.getState().loadFile('/subs/c.srt');
            expect(!busy.accepted && busy.code).toBe('BusyBatch');

            finishFirstLoad();
            await first;

            expect(codec.load.mock.calls).toEqual([['/subs/a.srt']]);
            expect(store.getState().currentJob?.fileName).toBe('a.srt');
            expect(store.getState().isLoading).toBe(false);
            expect(store.getState().pendingFiles).toEqual(['/subs/b.srt']);

            store.getState().process();
            runs[0].resolve();
            await flushPromises();

            expect(codec.load).toHaveBeenLastCalledWith('/subs/b.srt');
            expect(store.getState().currentJob).toMatchObject({ fileName: 'b.srt', status: 'optimizing' });
            expect(runs.map((run) => run.job.fileName)).toEqual(['a.srt', 'b.srt']);
        });

        it('should not replace the loaded file while it is being processed', async () => {
            await store.getState().enqueueFiles(['/subs/a.srt']);
            store.getState().process();

            await store.getState().enqueueFiles(['/subs/b.srt']);

            expect(store.getState().currentJob?.fileName).toBe('a.srt');
            expect(store.queue.toArray()).toEqual(['/subs/b.srt']);
        });
    });

    describe('processNextFile', () => {
        it('should skip files that fail to load', async () => {
            codec.load.mockRejectedValueOnce(new Error('Invalid cue timing'));
            store.queue.enqueue('/subs/broken.srt', '/subs/good.srt');

            expect(await store.getState().processNextFile()).toBe(true);

            expect(store.getState().currentJob?.fileName).toBe('good.srt');
            expect(notify).toHaveBeenCalledWith('error', 'Failed to load file', 'broken.srt: Invalid cue timing');
            expect(store.getState().pendingFiles).toEqual([]);
        });

        it('should do nothing when the queue is empty', async () => {
            expect(await store.getState().processNextFile()).toBe(false);
            expect(store.getState().currentJob).toBeNull();
        });
    });

    describe('process', () => {
        it('should reject when nothing is loaded', () => {
            const result = store.getState().process();
            expect(!result.accepted && result.code).toBe('NothingLoaded');
        });

        it('should stream updates into the document and move on to the next file', async () => {
            await store.getState().enqueueFiles(['/subs/a.srt', '/subs/b.srt']);
            store.getState().setCustomPrompt('Keep product names');

            expect(store.getState().process()).toEqual({ accepted: true });
            expect(store.getState().isProcessing).toBe(true);
            expect(runs[0].job.status).toBe('optimizing');
            expect(runs[0].prompt).toBe('Keep product names');

            runs[0].handlers.onPartialUpdate({ '1': 'Hello.\nBonjour.', '2': 'Monde' });
            expect(store.subtitles.getState().entries.map((e) => [e.originalText, e.translatedText])).toEqual([
                ['Hello.', 'Bonjour.'],
                ['world', 'Monde'],
            ]);

            runs[0].resolve();
            await flushPromises();

            expect(notify).toHaveBeenCalledWith('success', 'Optimization completed', 'a.srt');
            expect(codec.load).toHaveBeenLastCalledWith('/subs/b.srt');
            expect(store.getState().currentJob).toMatchObject({ fileName: 'b.srt', status: 'optimizing' });
            expect(runs).toHaveLength(2);
        });

        it('should move on to the next file after a failure', async () => {
            await store.getState().enqueueFiles(['/subs/a.srt', '/subs/b.srt']);
            store.getState().process();

            runs[0].reject(new Error('rate limited'));
            await flushPromises();

            expect(notify).toHaveBeenCalledWith('error', 'Optimization failed', 'rate limited');
            expect(store.getState().currentJob?.fileName).toBe('b.srt');
            expect(runs).toHaveLength(2);
        });

        it('should mark the job failed when the queue is empty', async () => {
            await store.getState().enqueueFiles(['/subs/a.srt']);
            store.getState().process();

            runs[0].reject(new Error('rate limited'));
            await flushPromises();

            expect(store.getState().currentJob).toMatchObject({ status: 'failed', errorMessage: 'rate limited' });
            expect(store.getState().isProcessing).toBe(false);
        });

        it('should replace the document on a full update', async () => {
            await store.getState().enqueueFiles(['/subs/a.srt']);
            store.getState().process();

            runs[0].handlers.onFullUpdate([{ startTime: 0, endTime: 2000, originalText: 'hello world', translatedText: '' }]);

            expect(store.subtitles.getState().entries).toEqual([
                { key: 1, startTime: 0, endTime: 2000, originalText: 'hello world', translatedText: '' },
            ]);
        });

        it('should reject a second run while processing', async () => {
            await store.getState().enqueueFiles(['/subs/a.srt']);
            store.getState().process();

            const result = store.getState().process();

            expect(!result.accepted && result.code).toBe('BusyBatch');
            expect(optimizer.run).toHaveBeenCalledTimes(1);
        });

        it('should not rerun a completed file', async () => {
            await store.getState().enqueueFiles(['/subs/a.srt']);
            store.getState().process();
            runs[0].resolve();
            await flushPromises();

            const result = store.getState().process();

            expect(!result.accepted && result.code).toBe('JobCompleted');
        });
    });

    describe('cancel', () => {
        it('should abort the run and ignore its late results', async () => {
            await store.getState().enqueueFiles(['/subs/a.srt']);
            store.getState().process();

            store.getState().cancel();
            expect(runs[0].signal.aborted).toBe(true);
            expect(store.getState().currentJob?.status).toBe('pending');
            expect(store.getState().isProcessing).toBe(false);

            runs[0].handlers.onPartialUpdate({ '1': 'late' });
            runs[0].resolve();
            await flushPromises();

            expect(store.getState().currentJob?.status).toBe('pending');
            expect(store.subtitles.getState().entries[0].translatedText).toBe('');
            expect(notify).not.toHaveBeenCalledWith('success', 'Optimization completed', 'a.srt');
        });
    });

    describe('saveDocument', () => {
        it('should write the document to the loaded file with the configured layout', async () => {
            await store.getState().enqueueFiles(['/subs/a.srt']);

            expect(await store.getState().saveDocument()).toEqual({ accepted: true });

            expect(codec.save).toHaveBeenCalledWith(store.subtitles.getState().entries, '/subs/a.srt', { layout: 'original-above' });
        });

        it('should add the configured style to ASS targets only', async () => {
            const assStyle = '[V4+ Styles]\nStyle: Default,Noto Sans,48';
            const styled = createOptimizationStore({
                optimizer,
                jobFactory,
                getConfig: () => ({ ...DEFAULT_CONFIG, assStyle }),
                codec,
                notify,
            });
            await styled.getState().enqueueFiles(['/subs/a.srt']);

            await styled.getState().saveDocument('/subs/a.ass');
            await styled.getState().saveDocument();

            expect(codec.save.mock.calls.map(([, filePath, options]) => [filePath, options])).toEqual([
                ['/subs/a.ass', { layout: 'original-above', style: assStyle }],
                ['/subs/a.srt', { layout: 'original-above' }],
            ]);
        });

        it('should reject when nothing is loaded', async () => {
            const result = await store.getState().saveDocument();
            expect(!result.accepted && result.code).toBe('NothingLoaded');
        });
    });
});
