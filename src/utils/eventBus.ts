import { EventEmitter } from 'node:events';

/**
 * Typed wrapper around EventEmitter. Each event carries a single payload.
 *
 * A listener that throws is logged and does not stop the other listeners
 * or the code that emitted the event.
 */
export class EventBus<Events extends object> {
    private readonly emitter = new EventEmitter();

    /**
     * Registers a listener and returns an unsubscribe callback.
     */
    on<K extends keyof Events & string>(event: K, listener: (payload: Events[K]) => void): () => void {
        const guarded = this.guard(event, listener);
        this.emitter.on(event, guarded);
        return () => {
            this.emitter.off(event, guarded);
        };
    }

    /**
     * Registers a listener that is removed after its first call.
     */
    once<K extends keyof Events & string>(event: K, listener: (payload: Events[K]) => void): void {
        this.emitter.once(event, this.guard(event, listener));
    }

    emit<K extends keyof Events & string>(event: K, payload: Events[K]): void {
        this.emitter.emit(event, payload);
    }

    /** Removes every listener. */
    clear(): void {
        this.emitter.removeAllListeners();
    }

    private guard<K extends keyof Events & string>(event: K, listener: (payload: Events[K]) => void) {
        return (payload: Events[K]) => {
            try {
                listener(payload);
            } catch (error) {
                console.error(`[EventBus] Listener for ${event} failed:`, error);
            }
        };
    }
}
