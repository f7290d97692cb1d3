/**
 * A timed line of the subtitle document.
 */
export interface SubtitleEntry {
    /** Sequence key (1..N, in document order). */
    key: number;
    /** Start time in milliseconds. */
    startTime: number;
    /** End time in milliseconds. */
    endTime: number;
    /** Source-language text. */
    originalText: string;
    /** Optimized or translated text. */
    translatedText: string;
}

/** Entry content without its sequence key. */
export type SubtitleEntryData = Omit<SubtitleEntry, 'key'>;

/** Editable cells of an entry. */
export type SubtitleColumn = 'startTime' | 'endTime' | 'originalText' | 'translatedText';

/**
 * How original and translated lines are combined in an exported file.
 */
export type SubtitleLayout = 'translation-above' | 'original-above' | 'translation-only' | 'original-only';

/** File formats understood by the subtitle codec. */
export type SubtitleFormat = 'srt' | 'vtt' | 'ass' | 'json' | 'txt';

/** Options for writing a document. */
export interface SaveOptions {
    layout: SubtitleLayout;
    /** `[V4+ Styles]` block for styled (ASS) output. */
    style?: string;
}
