/**
 * What to do once every job of a batch has finished.
 */
export type CompletionPolicy =
    | { type: 'none' }
    | { type: 'exit'; exitCode: number }
    | { type: 'suspend' }
    | { type: 'shutdown' };

/** Host power actions. */
export type PowerAction = 'suspend' | 'shutdown';

/** Outcome of dispatching a completion policy. */
export interface CompletionOutcome {
    policy: CompletionPolicy['type'];
    /** True if the side effect was carried out. */
    performed: boolean;
}
