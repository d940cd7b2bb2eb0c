/**
 * @fileoverview In-Memory EventBus Implementation
 *
 * Synchronous, in-memory event bus for pipeline observability.
 *
 * @module @triage/engine/events/InMemoryEventBus
 */

import type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    Subscription,
} from "../contracts/EventBus.js";
import { defaultLogger, type EngineLogger } from "../engine/logger.js";

/**
 * In-memory EventBus implementation.
 *
 * Features:
 * - Synchronous event dispatch, in subscription order
 * - Wildcard subscription ("*" for all events)
 * - One-time subscriptions via once()
 * - A throwing handler is logged and never reaches the emitter
 *
 * @example
 * ```typescript
 * const bus = new InMemoryEventBus();
 *
 * bus.subscribe("message:categorized", (event) => {
 *     console.log("Categorized:", event.data);
 * });
 *
 * bus.emit(createEvent("message:categorized", { category: "urgent" }));
 * ```
 */
export class InMemoryEventBus implements EventBus {
    private handlers: Map<string, Set<EventHandler>> = new Map();
    private readonly logger: Pick<EngineLogger, "error">;

    /**
     * @param logger - Receives handler failures (default: console)
     */
    constructor(logger: Pick<EngineLogger, "error"> = defaultLogger) {
        this.logger = logger;
    }

    /**
     * Emit an event to all subscribers.
     *
     * Handlers for the event type run first, then "*" handlers.
     */
    emit(event: EventPayload): void {
        this.dispatch(this.handlers.get(event.type), event);
        this.dispatch(this.handlers.get("*"), event);
    }

    /**
     * Subscribe to events of a specific type.
     *
     * @param eventType - The event type to subscribe to (or "*" for all events)
     * @param handler - Handler function called when event is emitted
     * @returns Subscription handle for unsubscribing
     */
    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription {
        let handlers = this.handlers.get(eventType);
        if (!handlers) {
            handlers = new Set();
            this.handlers.set(eventType, handlers);
        }
        handlers.add(handler);

        return {
            unsubscribe: () => {
                const current = this.handlers.get(eventType);
                if (current) {
                    current.delete(handler);
                    if (current.size === 0) {
                        this.handlers.delete(eventType);
                    }
                }
            },
        };
    }

    /**
     * Subscribe to events of a specific type, auto-unsubscribe after first event.
     */
    once(eventType: EventType, handler: EventHandler): Subscription {
        const wrappedHandler: EventHandler = (event) => {
            subscription.unsubscribe();
            handler(event);
        };

        const subscription = this.subscribe(eventType, wrappedHandler);
        return subscription;
    }

    /**
     * Remove all subscriptions for a specific event type.
     *
     * @param eventType - The event type to clear (or "*" for all, undefined clears everything)
     */
    clear(eventType?: EventType | "*"): void {
        if (eventType === undefined || eventType === "*") {
            this.handlers.clear();
        }
        else {
            this.handlers.delete(eventType);
        }
    }

    /**
     * Get the number of handlers for a specific event type.
     */
    handlerCount(eventType: EventType | "*"): number {
        return this.handlers.get(eventType)?.size ?? 0;
    }

    private dispatch(handlers: Set<EventHandler> | undefined, event: EventPayload): void {
        if (!handlers) {
            return;
        }

        // Copy so once() handlers can unsubscribe mid-dispatch
        for (const handler of [...handlers]) {
            try {
                handler(event);
            }
            catch (error) {
                this.logger.error("EventBus handler error", {
                    eventType: event.type,
                    error    : error instanceof Error ? error.message : String(error),
                });
            }
        }
    }
}
