/**
 * @fileoverview Unit tests for InMemoryEventBus
 *
 * Tests cover:
 * - Subscription by event type and wildcard
 * - One-time subscriptions (once)
 * - Unsubscribe and clear
 * - Failing handlers are logged and skipped
 *
 * @module @ontocheck/engine/__tests__/InMemoryEventBus
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import type { EventPayload } from "../contracts/EventBus.js";
import { createEvent } from "../contracts/EventBus.js";
import type { EngineLogger } from "../contracts/Logger.js";

function createMockLogger(): EngineLogger {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    };
}

const evaluated: EventPayload = {
    type     : "record:evaluated",
    timestamp: "2026-03-02T10:00:00.000Z",
    traceId  : "run_test",
    data     : { index: 0, passed: true },
};

const completed: EventPayload = {
    type     : "run:completed",
    timestamp: "2026-03-02T10:00:01.000Z",
    data     : { records: 1, failed: 0 },
};

describe("InMemoryEventBus", () => {
    let logger: EngineLogger;
    let eventBus: InMemoryEventBus;

    beforeEach(() => {
        logger = createMockLogger();
        eventBus = new InMemoryEventBus(logger);
    });

    describe("subscribe and emit", () => {
        // Scenario: Handler receives matching events only
        it("should call handler for matching event types only", () => {
            const handler = vi.fn();

            eventBus.subscribe("record:evaluated", handler);
            eventBus.emit(evaluated);
            eventBus.emit(completed);

            expect(handler).toHaveBeenCalledTimes(1);
            expect(handler).toHaveBeenCalledWith(evaluated);
        });

        // Scenario: Specific handlers run before wildcard handlers
        it("should call specific handlers before wildcard handlers", () => {
            const calls: string[] = [];

            eventBus.subscribe("*", () => calls.push("wildcard"));
            eventBus.subscribe("record:evaluated", () => calls.push("specific"));
            eventBus.emit(evaluated);

            expect(calls).toEqual(["specific", "wildcard"]);
        });

        // Scenario: Wildcard sees every event
        it("should deliver every event to a wildcard handler", () => {
            const handler = vi.fn();

            eventBus.subscribe("*", handler);
            eventBus.emit(evaluated);
            eventBus.emit(completed);

            expect(handler).toHaveBeenNthCalledWith(1, evaluated);
            expect(handler).toHaveBeenNthCalledWith(2, completed);
        });
    });

    describe("once", () => {
        // Scenario: once() handler only called for the first event
        it("should call handler once then auto-unsubscribe", () => {
            const handler = vi.fn();

            eventBus.once("record:evaluated", handler);
            eventBus.emit(evaluated);
            eventBus.emit(evaluated);

            expect(handler).toHaveBeenCalledTimes(1);
            expect(eventBus.handlerCount("record:evaluated")).toBe(0);
        });

        // Scenario: A once() handler unsubscribing mid-dispatch does not skip its neighbours
        it("should still call later handlers when a once handler removes itself", () => {
            const later = vi.fn();

            eventBus.once("record:evaluated", vi.fn());
            eventBus.subscribe("record:evaluated", later);
            eventBus.emit(evaluated);

            expect(later).toHaveBeenCalledTimes(1);
        });
    });

    describe("unsubscribe and clear", () => {
        // Scenario: Unsubscribed handler is not called, double unsubscribe is safe
        it("should stop delivery after unsubscribe", () => {
            const handler = vi.fn();

            const subscription = eventBus.subscribe("run:completed", handler);
            eventBus.emit(completed);
            subscription.unsubscribe();
            eventBus.emit(completed);

            expect(handler).toHaveBeenCalledTimes(1);
            expect(() => subscription.unsubscribe()).not.toThrow();
        });

        // Scenario: clear() with a type leaves other types alone
        it("should clear handlers of one type", () => {
            const cleared = vi.fn();
            const kept = vi.fn();

            eventBus.subscribe("record:evaluated", cleared);
            eventBus.subscribe("run:completed", kept);
            eventBus.clear("record:evaluated");
            eventBus.emit(evaluated);
            eventBus.emit(completed);

            expect(cleared).not.toHaveBeenCalled();
            expect(kept).toHaveBeenCalledTimes(1);
        });

        // Scenario: clear() without a type removes everything
        it("should clear all handlers", () => {
            eventBus.subscribe("record:evaluated", vi.fn());
            eventBus.subscribe("*", vi.fn());
            eventBus.clear();

            expect(eventBus.handlerCount("record:evaluated")).toBe(0);
            expect(eventBus.handlerCount("*")).toBe(0);
        });
    });

    describe("error handling", () => {
        // Scenario: A throwing handler is logged and the others still run
        it("should log a failing handler and continue", () => {
            const success = vi.fn();

            eventBus.subscribe("rule:error", () => {
                throw new Error("handler exploded");
            });
            eventBus.subscribe("rule:error", success);
            eventBus.emit(createEvent("rule:error", { ruleId: "r1" }, "run_test"));

            expect(success).toHaveBeenCalledTimes(1);
            expect(logger.error).toHaveBeenCalledWith("Event handler failed", {
                eventType: "rule:error",
                error    : "handler exploded",
            });
        });
    });

    describe("createEvent", () => {
        // Scenario: createEvent stamps type, data and trace id
        it("should build a payload with a timestamp", () => {
            const event = createEvent("run:starting", { fields: 2 }, "run_abc");

            expect(event.type).toBe("run:starting");
            expect(event.traceId).toBe("run_abc");
            expect(event.data).toEqual({ fields: 2 });
            expect(Number.isNaN(Date.parse(event.timestamp))).toBe(false);
        });
    });
});
