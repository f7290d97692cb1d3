const TIMESTAMP_REGEX = /^(\d{2}):(\d{2}):(\d{2})\.(\d{3})$/;

/**
 * Formats milliseconds as `HH:MM:SS<separator>mmm`.
 *
 * @param ms The time in milliseconds.
 * @param separator The decimal separator (comma for SRT, dot elsewhere).
 */
export function formatTimestamp(ms: number, separator: string = '.'): string {
    const total = Math.max(0, Math.round(ms));
    const hours = Math.floor(total / 3_600_000);
    const minutes = Math.floor((total % 3_600_000) / 60_000);
    const secs = Math.floor((total % 60_000) / 1000);
    const millis = total % 1000;

    return `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}:${String(secs).padStart(2, '0')}${separator}${String(millis).padStart(3, '0')}`;
}

/**
 * Parses the fixed-precision `hh:mm:ss.zzz` format used by cell edits.
 *
 * @param value The text to parse.
 * @return Milliseconds, or null if the text is not a valid timestamp.
 */
export function parseTimestamp(value: string): number | null {
    const match = TIMESTAMP_REGEX.exec(value.trim());
    if (!match) return null;

    const [, hh, mm, ss, zzz] = match;
    const minutes = Number(mm);
    const seconds = Number(ss);
    if (minutes > 59 || seconds > 59) return null;

    return Number(hh) * 3_600_000 + minutes * 60_000 + seconds * 1000 + Number(zzz);
}

/**
 * Formats milliseconds as an ASS timestamp (`H:MM:SS.cc`).
 */
export function formatAssTimestamp(ms: number): string {
    const centis = Math.max(0, Math.round(ms / 10));
    const hours = Math.floor(centis / 360_000);
    const minutes = Math.floor((centis % 360_000) / 6000);
    const secs = Math.floor((centis % 6000) / 100);
    const cs = centis % 100;

    return `${hours}:${String(minutes).padStart(2, '0')}:${String(secs).padStart(2, '0')}.${String(cs).padStart(2, '0')}`;
}

/**
 * Parses a subtitle file timestamp. Accepts `HH:MM:SS,mmm`, `HH:MM:SS.mmm`,
 * `MM:SS.mmm` (WebVTT short form) and `H:MM:SS.cc` (ASS).
 *
 * @return Milliseconds, or null if the text is not a timestamp.
 */
export function parseCueTimestamp(value: string): number | null {
    const match = /^(?:(\d+):)?(\d{1,2}):(\d{2})[.,](\d{2,3})$/.exec(value.trim());
    if (!match) return null;

    const [, hh, mm, ss, fraction] = match;
    const millis = fraction.length === 2 ? Number(fraction) * 10 : Number(fraction);
    return Number(hh ?? 0) * 3_600_000 + Number(mm) * 60_000 + Number(ss) * 1000 + millis;
}
