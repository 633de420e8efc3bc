/**
 * @fileoverview EventBus Contract
 *
 * Internal event flow of a validation run. Events are for observability
 * only: they never feed back into mapping or aggregation, and report
 * content does not depend on them.
 *
 * Design decisions:
 * - Synchronous dispatch
 * - In-memory implementation (no external queue dependency)
 * - Ordering is preserved within a single event type
 *
 * @module @ontocheck/engine/contracts/EventBus
 */

/**
 * Event payload base interface.
 */
export interface EventPayload {
    /** Event type identifier */
    readonly type: string;

    /** ISO timestamp when event was emitted */
    readonly timestamp: string;

    /** Run trace ID for correlation */
    readonly traceId?: string;

    /** Additional event-specific data */
    readonly data?: Record<string, unknown>;
}

/**
 * Run lifecycle events.
 */
export type RunEventType =
    | "run:starting"
    | "run:mapped"
    | "run:completed"
    | "run:cancelled"
    | "run:failed";

/**
 * Events emitted while records are evaluated.
 */
export type RecordEventType =
    | "record:evaluated"
    | "rule:error";

/**
 * All known event types.
 */
export type EventType = RunEventType | RecordEventType;

/**
 * Event handler function signature.
 */
export type EventHandler<T extends EventPayload = EventPayload> = (event: T) => void;

/**
 * Subscription handle returned when subscribing to events.
 */
export interface Subscription {
    unsubscribe(): void;
}

/**
 * EventBus interface.
 *
 * @example
 * ```typescript
 * const bus: EventBus = new InMemoryEventBus();
 *
 * const sub = bus.subscribe("rule:error", (event) => {
 *     console.log("Rule fault:", event.data);
 * });
 *
 * bus.emit(createEvent("rule:error", { ruleId: "valid-date", cause: "boom" }, "run_1"));
 *
 * sub.unsubscribe();
 * ```
 */
export interface EventBus {
    /**
     * Emit an event to all subscribers.
     */
    emit(event: EventPayload): void;

    /**
     * Subscribe to events of a specific type, or "*" for all events.
     *
     * @returns Subscription handle for unsubscribing
     */
    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription;

    /**
     * Subscribe and auto-unsubscribe after the first matching event.
     */
    once(eventType: EventType, handler: EventHandler): Subscription;

    /**
     * Remove all subscriptions for a type, or every subscription when omitted.
     */
    clear(eventType?: EventType | "*"): void;
}

/**
 * Create an event payload stamped with the current time.
 *
 * @param type - Event type
 * @param data - Optional event data
 * @param traceId - Optional run trace ID
 */
export function createEvent(
    type: EventType,
    data?: Record<string, unknown>,
    traceId?: string
): EventPayload {
    return {
        type,
        timestamp: new Date().toISOString(),
        traceId,
        data,
    };
}
