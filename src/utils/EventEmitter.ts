import { logger } from './Logger';

/**
 * A small type-safe event emitter.
 *
 * A throwing handler is logged and does not stop the remaining handlers.
 *
 * @example
 * ```typescript
 * interface MyEvents { [key: string]: unknown[]; status: [string] }
 * const emitter = new EventEmitter<MyEvents>();
 * const unsub = emitter.on('status', (s) => console.log(s));
 * emitter.emit('status', 'READY');
 * unsub();
 * ```
 */
export class EventEmitter<T extends Record<string, unknown[]>> {
    private readonly listeners: { [K in keyof T]?: Set<(...args: T[K]) => void> } = {};

    /**
     * Subscribe to an event.
     * @returns Unsubscribe function
     */
    on<K extends keyof T>(event: K, handler: (...args: T[K]) => void): () => void {
        let handlers = this.listeners[event];
        if (!handlers) {
            handlers = new Set();
            this.listeners[event] = handlers;
        }
        handlers.add(handler);
        return () => this.off(event, handler);
    }

    off<K extends keyof T>(event: K, handler: (...args: T[K]) => void): void {
        this.listeners[event]?.delete(handler);
    }

    emit<K extends keyof T>(event: K, ...args: T[K]): void {
        const handlers = this.listeners[event];
        if (!handlers) return;

        for (const handler of Array.from(handlers)) {
            try {
                handler(...args);
            } catch (err) {
                logger.error(`Error in listener for ${String(event)}:`, err);
            }
        }
    }
}
