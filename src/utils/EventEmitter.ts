/**
 * @fileoverview Type-safe event emitter with error isolation.
 * One handler's error does not prevent other handlers from executing.
 * @module utils/EventEmitter
 * @version 1.0.0
 */

import type { IEventEmitter, IDisposable, ILogger } from './interfaces';
import { consoleLogger } from './logger';

/**
 * Type-safe event emitter with error isolation.
 *
 * @template TEventMap - A record type mapping event names to payload types
 *
 * @example
 * ```typescript
 * interface CacheEvents {
 *   timelineBuilt: { channelId: string };
 *   scheduleInvalidated: { epoch: number };
 * }
 *
 * const emitter = new EventEmitter<CacheEvents>();
 * emitter.on('timelineBuilt', (payload) => console.log(payload.channelId));
 * emitter.emit('timelineBuilt', { channelId: 'Channels/Retro' });
 * ```
 */
export class EventEmitter<TEventMap extends Record<string, unknown>>
    implements IEventEmitter<TEventMap> {
    private readonly _handlers: Map<keyof TEventMap, Set<(payload: never) => void>> = new Map();
    private readonly _logger: ILogger;

    /**
     * @param logger - Receives handler failures (defaults to console)
     */
    constructor(logger: ILogger = consoleLogger) {
        this._logger = logger;
    }

    public on<K extends keyof TEventMap>(
        event: K,
        handler: (payload: TEventMap[K]) => void
    ): IDisposable {
        let handlerSet = this._handlers.get(event);
        if (!handlerSet) {
            handlerSet = new Set();
            this._handlers.set(event, handlerSet);
        }
        handlerSet.add(handler);

        return {
            dispose: (): void => this.off(event, handler),
        };
    }

    public off<K extends keyof TEventMap>(
        event: K,
        handler: (payload: TEventMap[K]) => void
    ): void {
        this._handlers.get(event)?.delete(handler);
    }

    /**
     * Emit an event to all registered handlers.
     * Errors in handlers are caught and logged, NOT propagated.
     */
    public emit<K extends keyof TEventMap>(event: K, payload: TEventMap[K]): void {
        const eventHandlers = this._handlers.get(event);
        if (!eventHandlers) {
            return;
        }

        // Snapshot so handlers may unsubscribe while we iterate
        for (const handler of [...eventHandlers]) {
            try {
                (handler as (payload: TEventMap[K]) => void)(payload);
            } catch (error) {
                this._logger.error(
                    '[EventEmitter] Handler error for event \'' + String(event) + '\':',
                    error
                );
            }
        }
    }

    public removeAllListeners(event?: keyof TEventMap): void {
        if (event !== undefined) {
            this._handlers.delete(event);
        } else {
            this._handlers.clear();
        }
    }

    public listenerCount(event: keyof TEventMap): number {
        return this._handlers.get(event)?.size ?? 0;
    }
}
