import type { JobKind, MediaInfo } from '../types/job';
import type { SubtitleFormat } from '../types/subtitle';

export const VIDEO_FORMATS: readonly string[] = ['mp4', 'mkv', 'avi', 'mov', 'webm', 'flv', 'wmv', 'm4v', 'ts', 'mpeg'];
export const AUDIO_FORMATS: readonly string[] = ['mp3', 'wav', 'm4a', 'flac', 'aac', 'ogg', 'opus', 'wma'];
export const SUBTITLE_FORMATS: readonly SubtitleFormat[] = ['srt', 'vtt', 'ass', 'json'];

/**
 * Gets the lower-case extension of a path, without the dot.
 */
export function getExtension(filePath: string): string {
    const name = filePath.split(/[/\\]/).pop() || '';
    const dot = name.lastIndexOf('.');
    return dot > 0 ? name.slice(dot + 1).toLowerCase() : '';
}

/**
 * Extensions a job of the given kind accepts.
 * Subtitle jobs need a video to render onto; transcription accepts audio too.
 */
export function getAcceptedExtensions(kind: JobKind): readonly string[] {
    switch (kind) {
        case 'subtitle':
            return VIDEO_FORMATS;
        case 'transcription':
            return [...VIDEO_FORMATS, ...AUDIO_FORMATS];
        case 'optimization':
            return SUBTITLE_FORMATS;
    }
}

/** True if the file can be processed by a job of the given kind. */
export function isAcceptedFile(filePath: string, kind: JobKind): boolean {
    return getAcceptedExtensions(kind).includes(getExtension(filePath));
}

/** True if the path names a readable subtitle document. */
export function isSubtitleFile(filePath: string): boolean {
    return SUBTITLE_FORMATS.some((format) => format === getExtension(filePath));
}

/**
 * Resolves the subtitle format of a path from its extension.
 *
 * @return The format, or null for unknown extensions.
 */
export function getSubtitleFormat(filePath: string): SubtitleFormat | null {
    const extension = getExtension(filePath);
    switch (extension) {
        case 'srt':
        case 'vtt':
        case 'ass':
        case 'json':
        case 'txt':
            return extension;
        default:
            return null;
    }
}

/** Infers the media category of a path. */
export function getMediaType(filePath: string): MediaInfo['mediaType'] {
    const extension = getExtension(filePath);
    if (AUDIO_FORMATS.includes(extension)) return 'audio';
    if (isSubtitleFile(filePath)) return 'subtitle';
    return 'video';
}
