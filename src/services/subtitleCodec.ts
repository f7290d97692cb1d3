import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { SaveOptions, SubtitleEntryData } from '../types/subtitle';
import type { DocumentCodec } from '../types/workers';
import { getSubtitleFormat } from '../utils/mediaFormats';
import { SubtitleFormatError, parseEntries, serializeEntries } from '../utils/subtitleFormats';

function resolveFormat(filePath: string) {
    const format = getSubtitleFormat(filePath);
    if (!format) {
        throw new SubtitleFormatError(`Unsupported subtitle format: ${path.basename(filePath)}`, 'UnsupportedFormat');
    }
    return format;
}

/**
 * File-backed subtitle codec. The file extension selects the format.
 */
export const subtitleCodec: DocumentCodec = {
    /**
     * Reads a subtitle file.
     *
     * @throws {SubtitleFormatError} If the extension is unknown or the content is malformed.
     */
    async load(filePath: string): Promise<SubtitleEntryData[]> {
        const format = resolveFormat(filePath);
        const content = await readFile(filePath, 'utf-8');
        const entries = parseEntries(content, format);
        console.log(`[SubtitleCodec] Read ${entries.length} entries (${format}) from`, filePath);
        return entries;
    },

    async save(entries: SubtitleEntryData[], filePath: string, options: SaveOptions): Promise<void> {
        const format = resolveFormat(filePath);
        const content = serializeEntries(entries, format, options.layout, options.style);
        await mkdir(path.dirname(filePath), { recursive: true });
        await writeFile(filePath, content, 'utf-8');
        console.log(`[SubtitleCodec] Wrote ${entries.length} entries (${format}) to`, filePath);
    },
};
