import { describe, expect, it, vi } from "vitest";
import type { Logger } from "../utils/logger";
import { createEventEmitter } from "./event-emitter";

type TestEvents = {
	status: string;
	reading: number;
	data: { id: number; name: string };
};

describe("createEventEmitter", () => {
	describe("on/emit", () => {
		it("emits events to subscribers", () => {
			const emitter = createEventEmitter<TestEvents>();
			const callback = vi.fn();

			emitter.on("status", callback);
			emitter.emit("status", "hello");

			expect(callback).toHaveBeenCalledWith("hello");
		});

		it("supports multiple subscribers", () => {
			const emitter = createEventEmitter<TestEvents>();
			const callback1 = vi.fn();
			const callback2 = vi.fn();

			emitter.on("status", callback1);
			emitter.on("status", callback2);
			emitter.emit("status", "hello");

			expect(callback1).toHaveBeenCalledWith("hello");
			expect(callback2).toHaveBeenCalledWith("hello");
		});

		it("supports different event types", () => {
			const emitter = createEventEmitter<TestEvents>();
			const statusCallback = vi.fn();
			const readingCallback = vi.fn();

			emitter.on("status", statusCallback);
			emitter.on("reading", readingCallback);

			emitter.emit("status", "hello");
			emitter.emit("reading", 42);

			expect(statusCallback).toHaveBeenCalledWith("hello");
			expect(readingCallback).toHaveBeenCalledWith(42);
		});

		it("returns unsubscribe function", () => {
			const emitter = createEventEmitter<TestEvents>();
			const callback = vi.fn();

			const unsubscribe = emitter.on("status", callback);
			emitter.emit("status", "first");
			expect(callback).toHaveBeenCalledTimes(1);

			unsubscribe();
			emitter.emit("status", "second");
			expect(callback).toHaveBeenCalledTimes(1);
		});

		it("handles complex data types", () => {
			const emitter = createEventEmitter<TestEvents>();
			const callback = vi.fn();

			emitter.on("data", callback);
			emitter.emit("data", { id: 1, name: "test" });

			expect(callback).toHaveBeenCalledWith({ id: 1, name: "test" });
		});
	});

	describe("once", () => {
		it("fires callback only once", () => {
			const emitter = createEventEmitter<TestEvents>();
			const callback = vi.fn();

			emitter.once("status", callback);
			emitter.emit("status", "first");
			emitter.emit("status", "second");

			expect(callback).toHaveBeenCalledTimes(1);
			expect(callback).toHaveBeenCalledWith("first");
		});

		it("returns unsubscribe function", () => {
			const emitter = createEventEmitter<TestEvents>();
			const callback = vi.fn();

			const unsubscribe = emitter.once("status", callback);
			unsubscribe();
			emitter.emit("status", "hello");

			expect(callback).not.toHaveBeenCalled();
		});
	});

	describe("off", () => {
		it("removes specific callback", () => {
			const emitter = createEventEmitter<TestEvents>();
			const callback1 = vi.fn();
			const callback2 = vi.fn();

			emitter.on("status", callback1);
			emitter.on("status", callback2);
			emitter.off("status", callback1);
			emitter.emit("status", "hello");

			expect(callback1).not.toHaveBeenCalled();
			expect(callback2).toHaveBeenCalledWith("hello");
		});

		it("handles removing non-existent callback", () => {
			const emitter = createEventEmitter<TestEvents>();
			const callback = vi.fn();

			// Should not throw
			expect(() => emitter.off("status", callback)).not.toThrow();
		});
	});

	describe("removeAllListeners", () => {
		it("removes all listeners for specific event", () => {
			const emitter = createEventEmitter<TestEvents>();
			const statusCallback1 = vi.fn();
			const statusCallback2 = vi.fn();
			const readingCallback = vi.fn();

			emitter.on("status", statusCallback1);
			emitter.on("status", statusCallback2);
			emitter.on("reading", readingCallback);

			emitter.removeAllListeners("status");
			emitter.emit("status", "hello");
			emitter.emit("reading", 42);

			expect(statusCallback1).not.toHaveBeenCalled();
			expect(statusCallback2).not.toHaveBeenCalled();
			expect(readingCallback).toHaveBeenCalledWith(42);
		});

		it("removes all listeners when no event specified", () => {
			const emitter = createEventEmitter<TestEvents>();
			const statusCallback = vi.fn();
			const readingCallback = vi.fn();

			emitter.on("status", statusCallback);
			emitter.on("reading", readingCallback);

			emitter.removeAllListeners();
			emitter.emit("status", "hello");
			emitter.emit("reading", 42);

			expect(statusCallback).not.toHaveBeenCalled();
			expect(readingCallback).not.toHaveBeenCalled();
		});
	});

	describe("listenerCount", () => {
		it("returns 0 for no listeners", () => {
			const emitter = createEventEmitter<TestEvents>();
			expect(emitter.listenerCount("status")).toBe(0);
		});

		it("returns correct count", () => {
			const emitter = createEventEmitter<TestEvents>();

			emitter.on("status", () => {});
			expect(emitter.listenerCount("status")).toBe(1);

			emitter.on("status", () => {});
			expect(emitter.listenerCount("status")).toBe(2);
		});

		it("updates after removal", () => {
			const emitter = createEventEmitter<TestEvents>();
			const callback = vi.fn();

			emitter.on("status", callback);
			expect(emitter.listenerCount("status")).toBe(1);

			emitter.off("status", callback);
			expect(emitter.listenerCount("status")).toBe(0);
		});
	});

	describe("error handling", () => {
		function createMockLogger(): Logger & { error: ReturnType<typeof vi.fn> } {
			return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
		}

		it("isolates listener errors and continues", () => {
			const logger = createMockLogger();
			const emitter = createEventEmitter<TestEvents>({ logger });
			const testError = new Error("Callback error");
			const normalCallback = vi.fn();

			emitter.on("status", () => {
				throw testError;
			});
			emitter.on("status", normalCallback);

			expect(() => emitter.emit("status", "hello")).not.toThrow();
			expect(normalCallback).toHaveBeenCalledWith("hello");
			expect(logger.error).toHaveBeenCalledWith(
				'Listener for "status" threw an error:',
				testError,
			);
		});

		it("drops listener errors when no logger is given", () => {
			const emitter = createEventEmitter<TestEvents>();
			emitter.on("status", () => {
				throw new Error("ignored");
			});
			expect(() => emitter.emit("status", "hello")).not.toThrow();
		});
	});

	describe("once with off", () => {
		it("off removes a once listener by its original callback", () => {
			const emitter = createEventEmitter<TestEvents>();
			const callback = vi.fn();

			emitter.once("reading", callback);
			emitter.off("reading", callback);
			emitter.emit("reading", 1);

			expect(callback).not.toHaveBeenCalled();
			expect(emitter.listenerCount("reading")).toBe(0);
		});

		it("lets a listener unsubscribe another during emit", () => {
			const emitter = createEventEmitter<TestEvents>();
			const second = vi.fn();
			emitter.on("reading", () => {
				emitter.off("reading", second);
			});
			emitter.on("reading", second);

			emitter.emit("reading", 1);
			emitter.emit("reading", 2);

			expect(second).toHaveBeenCalledTimes(1);
			expect(second).toHaveBeenCalledWith(1);
		});
	});

	describe("no-op for unsubscribed events", () => {
		it("emit does nothing for events with no listeners", () => {
			const emitter = createEventEmitter<TestEvents>();

			// Should not throw
			expect(() => emitter.emit("status", "hello")).not.toThrow();
		});
	});
});
