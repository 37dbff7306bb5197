/**
 * @fileoverview Shared utility contracts: disposables, event emitters, logging, key-value storage.
 * @module utils/interfaces
 * @version 1.0.0
 */

/**
 * Disposable interface for cleanup.
 * Used to unsubscribe from event handlers.
 */
export interface IDisposable {
    dispose(): void;
}

/**
 * Type-safe event emitter with handler error isolation.
 *
 * @template TEventMap - A record type mapping event names to payload types
 */
export interface IEventEmitter<TEventMap extends Record<string, unknown>> {
    /**
     * Register an event handler.
     * @returns A disposable that removes the handler
     */
    on<K extends keyof TEventMap>(event: K, handler: (payload: TEventMap[K]) => void): IDisposable;

    off<K extends keyof TEventMap>(event: K, handler: (payload: TEventMap[K]) => void): void;

    /**
     * Emit an event to all registered handlers.
     * Errors thrown by handlers are logged, not propagated.
     */
    emit<K extends keyof TEventMap>(event: K, payload: TEventMap[K]): void;

    removeAllListeners(event?: keyof TEventMap): void;

    listenerCount(event: keyof TEventMap): number;
}

/**
 * Logger contract injected into engine components.
 * Defaults to console methods when not provided.
 */
export interface ILogger {
    debug?: (message: string, ...args: unknown[]) => void;
    info: (message: string, ...args: unknown[]) => void;
    warn: (message: string, ...args: unknown[]) => void;
    error: (message: string, ...args: unknown[]) => void;
}

/**
 * Minimal string key-value store (the `Storage` shape).
 * Backed by whatever the host provides: a JSON file, QSettings-like registry, memory.
 */
export interface IKeyValueStore {
    getItem(key: string): string | null;
    setItem(key: string, value: string): void;
    removeItem(key: string): void;
}
