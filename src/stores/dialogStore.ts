import { createStore } from 'zustand/vanilla';

/** Supported dialog types. */
export type DialogType = 'alert' | 'confirm' | 'countdown';

/** Visual variants for dialogs. */
export type DialogVariant = 'info' | 'success' | 'warning' | 'error';

/** Options for configuring a dialog. */
export interface DialogOptions {
    /** The dialog title. */
    title?: string;
    /** The content message. */
    message: string;
    /** The type of dialog. */
    type?: DialogType;
    /** The visual style variant. */
    variant?: DialogVariant;
    /** Label for the confirm button. */
    confirmLabel?: string;
    /** Label for the cancel button. */
    cancelLabel?: string;
    /** Seconds before a countdown dialog confirms by itself. */
    seconds?: number;
}

/** State interface for the dialog store. */
export interface DialogState {
    /** Whether the dialog is currently open. */
    isOpen: boolean;
    /** Current dialog options. */
    options: DialogOptions | null;
    /** Resolver function for the current dialog promise. */
    resolveRef: ((value: boolean) => void) | null;
    /** Timer of an open countdown dialog. */
    timerRef: ReturnType<typeof setTimeout> | null;

    /**
     * Shows an alert dialog.
     *
     * @param message The message to display.
     * @param options Additional options.
     * @return A promise that resolves when the alert is closed.
     */
    alert: (message: string, options?: Omit<DialogOptions, 'message' | 'type'>) => Promise<void>;

    /**
     * Shows a confirmation dialog.
     *
     * @param message The question/message to display.
     * @param options Additional options.
     * @return A promise that resolves to true if confirmed, false otherwise.
     */
    confirm: (message: string, options?: Omit<DialogOptions, 'message' | 'type'>) => Promise<boolean>;

    /**
     * Shows a confirmation that accepts itself once the countdown runs out.
     *
     * @param message The message to display.
     * @param seconds Length of the grace window.
     * @param options Additional options.
     * @return A promise that resolves to false if cancelled in time, true otherwise.
     */
    countdown: (message: string, seconds: number, options?: Omit<DialogOptions, 'message' | 'type' | 'seconds'>) => Promise<boolean>;

    /**
     * Closes the dialog with a result.
     *
     * @param result The result value (true for confirm, false for cancel).
     */
    close: (result: boolean) => void;
}

/**
 * Creates a store for modal dialogs. A new dialog replaces an open one,
 * which is closed as cancelled.
 */
export function createDialogStore() {
    return createStore<DialogState>((set, get) => {
        const open = (options: DialogOptions, resolve: (value: boolean) => void) => {
            if (get().isOpen) {
                get().close(false);
            }
            set({ isOpen: true, options, resolveRef: resolve, timerRef: null });
        };

        return {
            isOpen: false,
            options: null,
            resolveRef: null,
            timerRef: null,

            alert: (message, options) => {
                return new Promise<void>((resolve) => {
                    open({ message, type: 'alert', variant: 'info', ...options }, () => resolve());
                });
            },

            confirm: (message, options) => {
                return new Promise<boolean>((resolve) => {
                    open({ message, type: 'confirm', variant: 'warning', ...options }, resolve);
                });
            },

            countdown: (message, seconds, options) => {
                return new Promise<boolean>((resolve) => {
                    open({ message, type: 'countdown', variant: 'warning', ...options, seconds }, resolve);
                    const resolveRef = get().resolveRef;
                    const timer = setTimeout(() => {
                        if (get().resolveRef === resolveRef) {
                            get().close(true);
                        }
                    }, seconds * 1000);
                    set({ timerRef: timer });
                });
            },

            close: (result) => {
                const { resolveRef, timerRef } = get();
                if (timerRef) {
                    clearTimeout(timerRef);
                }
                set({
                    isOpen: false,
                    options: null,
                    resolveRef: null,
                    timerRef: null,
                });
                if (resolveRef) {
                    resolveRef(result);
                }
            },
        };
    });
}

/** Store instance returned by createDialogStore. */
export type DialogStore = ReturnType<typeof createDialogStore>;
