import { createStore } from 'zustand/vanilla';
import type { SaveOptions, SubtitleColumn, SubtitleEntry, SubtitleEntryData } from '../types/subtitle';
import type { DocumentCodec } from '../types/workers';
import { ACCEPTED, type CommandResult, rejected } from '../types/result';
import { EventBus } from '../utils/eventBus';
import { parseTimestamp } from '../utils/timeUtils';

/** Events emitted by the subtitle document. */
export interface SubtitleEvents {
    /** Entries were edited in place; keys are unchanged. */
    entries_changed: { changedKeys: number[] };
    /** The document changed shape; every key was re-issued. */
    entries_replaced: { count: number };
}

/** State interface for the subtitle document store. */
export interface SubtitleState {
    /** Entries in presentation order; keys are 1..N after every structural change. */
    entries: SubtitleEntry[];
    /** Path of the loaded document. */
    filePath: string | null;

    /**
     * Replaces the whole document and re-issues keys.
     * @param entries - The new entries, in presentation order.
     */
    setEntries: (entries: SubtitleEntryData[]) => void;

    /**
     * Loads a document through the codec.
     * @param filePath - The file to read.
     */
    loadDocument: (filePath: string) => Promise<void>;

    /**
     * Writes the document through the codec.
     * @param filePath - Target path; its extension selects the format.
     * @param options - Layout and optional style.
     */
    saveDocument: (filePath: string, options: SaveOptions) => Promise<void>;

    /**
     * Edits one cell. Time columns take `hh:mm:ss.zzz`.
     * @param key - Sequence key of the entry.
     * @param column - The column to edit.
     * @param value - The new cell text.
     */
    setCell: (key: number, column: SubtitleColumn, value: string) => CommandResult;

    /**
     * Merges the selected rows into one entry.
     * @param rows - Zero-based row positions.
     * @return True if the document changed.
     */
    mergeRows: (rows: number[]) => boolean;

    /**
     * Applies streamed optimizer text, keyed by sequence key. A value with a
     * newline carries both texts (original first); otherwise it is the translation.
     * @param updates - Text per key.
     */
    applyPartialUpdate: (updates: Record<string, string>) => void;

    /** Empties the document. */
    clearEntries: () => void;
}

/** Dependencies of the subtitle store. */
export interface SubtitleStoreDeps {
    codec: DocumentCodec;
    events?: EventBus<SubtitleEvents>;
}

/**
 * Issues dense 1..N keys in array order.
 */
export function reindexEntries(entries: SubtitleEntryData[]): SubtitleEntry[] {
    return entries.map((entry, index) => ({
        key: index + 1,
        startTime: entry.startTime,
        endTime: entry.endTime,
        originalText: entry.originalText,
        translatedText: entry.translatedText,
    }));
}

/**
 * Computes the document after merging the given rows.
 *
 * The merged entry spans from the first selected row's start to the last
 * selected row's end and joins the selected texts with spaces. It takes the
 * position of the first selected row. Unselected rows inside the selected
 * span are kept, in order, right after the merged entry.
 *
 * @return The new entries, or null if fewer than two valid rows are selected.
 */
export function mergeEntries(entries: SubtitleEntry[], rows: number[]): SubtitleEntry[] | null {
    const selected = [...new Set(rows)]
        .filter((row) => Number.isInteger(row) && row >= 0 && row < entries.length)
        .sort((a, b) => a - b);
    if (selected.length < 2) return null;

    const first = selected[0];
    const last = selected[selected.length - 1];
    const picked = selected.map((row) => entries[row]);
    const selectedSet = new Set(selected);

    const merged: SubtitleEntryData = {
        startTime: entries[first].startTime,
        endTime: entries[last].endTime,
        originalText: picked.map((entry) => entry.originalText).join(' '),
        translatedText: picked.map((entry) => entry.translatedText).join(' '),
    };
    const skipped = entries.slice(first, last + 1).filter((_, offset) => !selectedSet.has(first + offset));

    return reindexEntries([
        ...entries.slice(0, first),
        merged,
        ...skipped,
        ...entries.slice(last + 1),
    ]);
}

/**
 * Creates the editable subtitle document.
 */
export function createSubtitleStore({ codec, events = new EventBus<SubtitleEvents>() }: SubtitleStoreDeps) {
    const store = createStore<SubtitleState>((set, get) => ({
        entries: [],
        filePath: null,

        setEntries: (entries) => {
            const reindexed = reindexEntries(entries);
            set({ entries: reindexed });
            events.emit('entries_replaced', { count: reindexed.length });
        },

        loadDocument: async (filePath) => {
            const entries = await codec.load(filePath);
            set({ filePath });
            get().setEntries(entries);
            console.log(`[Subtitle] Loaded ${entries.length} entries from`, filePath);
        },

        saveDocument: async (filePath, options) => {
            await codec.save(get().entries, filePath, options);
            console.log('[Subtitle] Saved document to', filePath);
        },

        setCell: (key, column, value) => {
            const entry = get().entries.find((e) => e.key === key);
            if (!entry) {
                return rejected('EntryNotFound', `No subtitle entry with key ${key}`);
            }

            let updated: SubtitleEntry;
            if (column === 'startTime' || column === 'endTime') {
                const time = parseTimestamp(value);
                if (time === null) {
                    return rejected('MalformedTimestamp', `"${value}" is not a valid hh:mm:ss.zzz timestamp`);
                }
                updated = column === 'startTime' ? { ...entry, startTime: time } : { ...entry, endTime: time };
                if (updated.endTime <= updated.startTime) {
                    return rejected('InvalidTimeRange', 'End time must be later than start time');
                }
            } else {
                updated = column === 'originalText' ? { ...entry, originalText: value } : { ...entry, translatedText: value };
            }

            set((state) => ({
                entries: state.entries.map((e) => (e.key === key ? updated : e)),
            }));
            events.emit('entries_changed', { changedKeys: [key] });
            return ACCEPTED;
        },

        mergeRows: (rows) => {
            const merged = mergeEntries(get().entries, rows);
            if (!merged) return false;

            set({ entries: merged });
            events.emit('entries_replaced', { count: merged.length });
            return true;
        },

        applyPartialUpdate: (updates) => {
            const changedKeys: number[] = [];
            const entries = get().entries.map((entry) => {
                const value = updates[String(entry.key)];
                if (value === undefined) return entry;

                changedKeys.push(entry.key);
                const newline = value.indexOf('\n');
                if (newline === -1) {
                    return { ...entry, translatedText: value };
                }
                return {
                    ...entry,
                    originalText: value.slice(0, newline),
                    translatedText: value.slice(newline + 1),
                };
            });

            if (changedKeys.length === 0) return;
            set({ entries });
            events.emit('entries_changed', { changedKeys });
        },

        clearEntries: () => {
            set({ entries: [], filePath: null });
            events.emit('entries_replaced', { count: 0 });
        },
    }));

    return Object.assign(store, { events });
}

/** Store instance returned by createSubtitleStore. */
export type SubtitleStore = ReturnType<typeof createSubtitleStore>;
