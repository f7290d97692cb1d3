import { stat } from 'node:fs/promises';
import { v4 as uuidv4 } from 'uuid';
import type { Job, JobKind, JobParameters } from '../types/job';
import type { JobFactory } from '../types/workers';
import { getFileName } from '../utils/jobUtils';
import { getExtension, getMediaType } from '../utils/mediaFormats';

/**
 * Creates pending jobs for files on disk.
 */
export const fileJobFactory: JobFactory = {
    /**
     * @throws {Error} If the path is missing or not a regular file.
     */
    async create(filePath: string, kind: JobKind, parameters: JobParameters): Promise<Job> {
        const info = await stat(filePath);
        if (!info.isFile()) {
            throw new Error(`${filePath} is not a file`);
        }

        return {
            id: uuidv4(),
            filePath,
            fileName: getFileName(filePath),
            kind,
            status: 'pending',
            progress: 0,
            progressMessage: '',
            parameters: { ...parameters },
            media: {
                sizeBytes: info.size,
                extension: getExtension(filePath),
                mediaType: getMediaType(filePath),
            },
        };
    },
};
