import { createStore } from 'zustand/vanilla';
import { v4 as uuidv4 } from 'uuid';

/** Visual variants for notifications. */
export type NotificationVariant = 'info' | 'success' | 'warning' | 'error';

/** A user-visible message. */
export interface Notification {
    id: string;
    variant: NotificationVariant;
    title: string;
    message: string;
    timestamp: number;
}

/** Function the stores use to report to the user. */
export type Notifier = (variant: NotificationVariant, title: string, message: string) => void;

/** Most notifications kept in memory. */
const MAX_NOTIFICATIONS = 100;

/** State interface for the notification store. */
export interface NotificationState {
    /** Notifications, oldest first. */
    notifications: Notification[];

    /**
     * Adds a notification and mirrors it to the console.
     *
     * @param variant The severity.
     * @param title Short title.
     * @param message Details.
     * @return The notification ID.
     */
    notify: (variant: NotificationVariant, title: string, message: string) => string;

    /** Removes a notification. */
    dismiss: (id: string) => void;

    /** Removes every notification. */
    clear: () => void;
}

function logNotification(variant: NotificationVariant, title: string, message: string): void {
    const line = `[Notify] ${title}: ${message}`;
    if (variant === 'error') {
        console.error(line);
    } else if (variant === 'warning') {
        console.warn(line);
    } else {
        console.log(line);
    }
}

/**
 * Creates a store of user-visible notifications.
 */
export function createNotificationStore() {
    return createStore<NotificationState>((set) => ({
        notifications: [],

        notify: (variant, title, message) => {
            const id = uuidv4();
            logNotification(variant, title, message);
            set((state) => ({
                notifications: [...state.notifications, { id, variant, title, message, timestamp: Date.now() }].slice(-MAX_NOTIFICATIONS),
            }));
            return id;
        },

        dismiss: (id) => {
            set((state) => ({
                notifications: state.notifications.filter((n) => n.id !== id),
            }));
        },

        clear: () => {
            set({ notifications: [] });
        },
    }));
}

/** Store instance returned by createNotificationStore. */
export type NotificationStore = ReturnType<typeof createNotificationStore>;

/**
 * Adapts a notification store to the Notifier signature.
 */
export function toNotifier(store: NotificationStore): Notifier {
    return (variant, title, message) => {
        store.getState().notify(variant, title, message);
    };
}
