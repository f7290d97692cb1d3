/**
 * Reasons a command can be rejected.
 */
export type ErrorCode =
    | 'EmptyBatch'
    | 'BusyBatch'
    | 'DuplicateJob'
    | 'MalformedTimestamp'
    | 'WorkerError'
    | 'JobCompleted'
    | 'JobNotFound'
    | 'UnsupportedFormat'
    | 'InvalidTimeRange'
    | 'EntryNotFound'
    | 'NothingLoaded';

/**
 * Result of a command. A rejected command leaves state untouched.
 */
export type CommandResult =
    | { accepted: true }
    | { accepted: false; code: ErrorCode; reason: string };

/** Shared accepted result. */
export const ACCEPTED: CommandResult = { accepted: true };

/**
 * Builds a rejected result.
 *
 * @param code The rejection code.
 * @param reason Human-readable explanation.
 */
export function rejected(code: ErrorCode, reason: string): CommandResult {
    return { accepted: false, code, reason };
}
