/**
 * Turns whatever a worker rejected with into a message for the user.
 */
export function toErrorMessage(error: unknown): string {
    if (error instanceof Error) return error.message || error.name;
    if (typeof error === 'string') return error;
    return String(error);
}

/** True if the error comes from an aborted signal. */
export function isAbortError(error: unknown): boolean {
    return error instanceof Error && error.name === 'AbortError';
}

/** Creates the error thrown when a run is cancelled between stages. */
export function createAbortError(message: string = 'The operation was aborted'): Error {
    const error = new Error(message);
    error.name = 'AbortError';
    return error;
}
