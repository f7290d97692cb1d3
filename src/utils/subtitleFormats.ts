import type { SubtitleEntryData, SubtitleFormat, SubtitleLayout } from '../types/subtitle';
import { formatAssTimestamp, formatTimestamp, parseCueTimestamp } from './timeUtils';

/**
 * Error raised when a document cannot be read or written.
 */
export class SubtitleFormatError extends Error {
    constructor(message: string, readonly code: 'UnsupportedFormat' | 'MalformedDocument') {
        super(message);
        this.name = 'SubtitleFormatError';
    }
}

const ASS_HEADER = `[Script Info]
ScriptType: v4.00+
PlayResX: 1280
PlayResY: 720
WrapStyle: 0`;

const DEFAULT_ASS_STYLE = `[V4+ Styles]
Format: Name, Fontname, Fontsize, PrimaryColour, SecondaryColour, OutlineColour, BackColour, Bold, Italic, Underline, StrikeOut, ScaleX, ScaleY, Spacing, Angle, BorderStyle, Outline, Shadow, Alignment, MarginL, MarginR, MarginV, Encoding
Style: Default,Arial,40,&H00FFFFFF,&H000000FF,&H00000000,&H00000000,0,0,0,0,100,100,0,0,1,2,0,2,10,10,20,1`;

const ASS_EVENTS_FORMAT = 'Format: Layer, Start, End, Style, Name, MarginL, MarginR, MarginV, Effect, Text';

/**
 * Combines original and translated text according to the layout.
 * A missing translation falls back to the original line, and a missing
 * original to the translation, so a cue never holds a blank line.
 */
export function composeText(entry: SubtitleEntryData, layout: SubtitleLayout): string {
    const original = entry.originalText.trim();
    const translated = entry.translatedText.trim();

    switch (layout) {
        case 'original-only':
            return original;
        case 'translation-only':
            return translated || original;
        case 'original-above':
            return original && translated ? `${original}\n${translated}` : original || translated;
        case 'translation-above':
            return original && translated ? `${translated}\n${original}` : translated || original;
    }
}

/**
 * Splits cue text back into original and translated text:
 * the first line is the original, the rest is the translation.
 */
export function splitText(text: string): Pick<SubtitleEntryData, 'originalText' | 'translatedText'> {
    const newline = text.indexOf('\n');
    if (newline === -1) {
        return { originalText: text.trim(), translatedText: '' };
    }
    return {
        originalText: text.slice(0, newline).trim(),
        translatedText: text.slice(newline + 1).trim(),
    };
}

/**
 * Composes every entry. Cues without text are kept so that entry count and
 * timing survive a save.
 */
function formatCues(
    entries: SubtitleEntryData[],
    layout: SubtitleLayout,
    formatter: (index: number, entry: SubtitleEntryData, text: string) => string
): string[] {
    return entries.map((entry, index) => formatter(index, entry, composeText(entry, layout)));
}

/**
 * Converts entries to SRT (SubRip Subtitle) format.
 */
export function toSRT(entries: SubtitleEntryData[], layout: SubtitleLayout): string {
    return formatCues(entries, layout, (index, entry, text) => {
        return `${index + 1}\n${formatTimestamp(entry.startTime, ',')} --> ${formatTimestamp(entry.endTime, ',')}\n${text}\n`;
    }).join('\n');
}

/**
 * Converts entries to WebVTT format.
 */
export function toVTT(entries: SubtitleEntryData[], layout: SubtitleLayout): string {
    const content = formatCues(entries, layout, (_, entry, text) => {
        return `${formatTimestamp(entry.startTime)} --> ${formatTimestamp(entry.endTime)}\n${text}\n`;
    }).join('\n');

    return 'WEBVTT\n\n' + content;
}

/**
 * Converts entries to ASS (Advanced SubStation Alpha).
 *
 * @param entries The entries to write.
 * @param layout Bilingual layout.
 * @param style A complete `[V4+ Styles]` section; the built-in style is used when omitted.
 */
export function toASS(entries: SubtitleEntryData[], layout: SubtitleLayout, style?: string): string {
    const styleSection = style && style.trim().length > 0 ? style.trim() : DEFAULT_ASS_STYLE;
    const dialogues = formatCues(entries, layout, (_, entry, text) => {
        const assText = text.replace(/\n/g, '\\N');
        return `Dialogue: 0,${formatAssTimestamp(entry.startTime)},${formatAssTimestamp(entry.endTime)},Default,,0,0,0,,${assText}`;
    });

    return [ASS_HEADER, '', styleSection, '', '[Events]', ASS_EVENTS_FORMAT, ...dialogues, ''].join('\n');
}

/**
 * Converts entries to the keyed JSON document format. Both texts are kept,
 * so the layout does not apply.
 */
export function toJSON(entries: SubtitleEntryData[]): string {
    const document: Record<string, unknown> = {};
    entries.forEach((entry, index) => {
        document[String(index + 1)] = {
            start_time: entry.startTime,
            end_time: entry.endTime,
            original_subtitle: entry.originalText,
            translated_subtitle: entry.translatedText,
        };
    });
    return JSON.stringify(document, null, 2);
}

/**
 * Converts entries to plain text, one cue per paragraph. Empty cues are left out.
 */
export function toTXT(entries: SubtitleEntryData[], layout: SubtitleLayout): string {
    return entries
        .map((entry) => composeText(entry, layout))
        .filter((text) => text.length > 0)
        .join('\n\n');
}

/**
 * Parses SRT or WebVTT cues. Blocks without a `-->` line (headers, notes,
 * styles) are skipped.
 */
export function parseCues(content: string): SubtitleEntryData[] {
    const blocks = content.replace(/^\uFEFF/, '').replace(/\r\n?/g, '\n').split(/\n\s*\n/);
    const entries: SubtitleEntryData[] = [];

    for (const block of blocks) {
        const lines = block.split('\n');
        const timingIndex = lines.findIndex((line) => line.includes('-->'));
        if (timingIndex === -1) continue;

        const [startPart, endPart] = lines[timingIndex].split('-->');
        const startTime = parseCueTimestamp(startPart);
        const endTime = parseCueTimestamp(endPart.trim().split(/\s+/)[0] ?? '');
        if (startTime === null || endTime === null) {
            throw new SubtitleFormatError(`Invalid cue timing: ${lines[timingIndex]}`, 'MalformedDocument');
        }

        const text = lines.slice(timingIndex + 1).join('\n');
        entries.push({ startTime, endTime, ...splitText(text) });
    }

    return entries;
}

/**
 * Parses the `Dialogue:` lines of an ASS document. Override tags are stripped.
 */
export function parseASS(content: string): SubtitleEntryData[] {
    const entries: SubtitleEntryData[] = [];

    for (const line of content.replace(/\r\n?/g, '\n').split('\n')) {
        if (!line.startsWith('Dialogue:')) continue;

        const fields = line.slice('Dialogue:'.length).split(',');
        if (fields.length < 10) {
            throw new SubtitleFormatError(`Invalid dialogue line: ${line}`, 'MalformedDocument');
        }
        const startTime = parseCueTimestamp(fields[1]);
        const endTime = parseCueTimestamp(fields[2]);
        if (startTime === null || endTime === null) {
            throw new SubtitleFormatError(`Invalid dialogue timing: ${line}`, 'MalformedDocument');
        }

        const text = fields.slice(9).join(',').replace(/\{[^}]*\}/g, '').replace(/\\[Nn]/g, '\n');
        entries.push({ startTime, endTime, ...splitText(text) });
    }

    return entries;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parses the keyed JSON document format.
 * Entries are read in ascending key order.
 */
export function parseJSON(content: string): SubtitleEntryData[] {
    let parsed: unknown;
    try {
        parsed = JSON.parse(content);
    } catch (e) {
        throw new SubtitleFormatError(`Invalid JSON document: ${e instanceof Error ? e.message : String(e)}`, 'MalformedDocument');
    }
    if (!isRecord(parsed)) {
        throw new SubtitleFormatError('JSON document must be an object keyed by sequence number', 'MalformedDocument');
    }
    const document = parsed;

    return Object.keys(document)
        .sort((a, b) => Number(a) - Number(b))
        .map((key) => {
            const item = document[key];
            if (!isRecord(item) || typeof item.start_time !== 'number' || typeof item.end_time !== 'number') {
                throw new SubtitleFormatError(`Invalid entry "${key}" in JSON document`, 'MalformedDocument');
            }
            return {
                startTime: item.start_time,
                endTime: item.end_time,
                originalText: typeof item.original_subtitle === 'string' ? item.original_subtitle : '',
                translatedText: typeof item.translated_subtitle === 'string' ? item.translated_subtitle : '',
            };
        });
}

/**
 * Serializes entries in the given format.
 */
export function serializeEntries(entries: SubtitleEntryData[], format: SubtitleFormat, layout: SubtitleLayout, style?: string): string {
    switch (format) {
        case 'srt':
            return toSRT(entries, layout);
        case 'vtt':
            return toVTT(entries, layout);
        case 'ass':
            return toASS(entries, layout, style);
        case 'json':
            return toJSON(entries);
        case 'txt':
            return toTXT(entries, layout);
    }
}

/**
 * Parses a document of the given format.
 *
 * @throws {SubtitleFormatError} If the format cannot be read or the content is malformed.
 */
export function parseEntries(content: string, format: SubtitleFormat): SubtitleEntryData[] {
    switch (format) {
        case 'srt':
        case 'vtt':
            return parseCues(content);
        case 'ass':
            return parseASS(content);
        case 'json':
            return parseJSON(content);
        case 'txt':
            throw new SubtitleFormatError('Plain text has no timing and cannot be loaded', 'UnsupportedFormat');
    }
}
