import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
	AbortError,
	ConnectionError,
	classifyConnectError,
	DecodeError,
	DeviceNotFoundError,
	FastFailError,
	isTransientBLEError,
	NotConnectedError,
	normalizeError,
	SubscriptionError,
	TimeoutError,
	TransportConnectError,
	throwIfAborted,
	withTimeout,
} from "./errors";

describe("normalizeError", () => {
	it("passes Error instances through", () => {
		const err = new TimeoutError("BLE write", 5000);
		expect(normalizeError(err)).toBe(err);
	});

	it.each([
		["Device disconnected", "Device disconnected"],
		[42, "42"],
		[null, "null"],
		[undefined, "undefined"],
		[{ code: 19, reason: "gatt" }, '{"code":19,"reason":"gatt"}'],
	])("wraps %j", (thrown, message) => {
		const result = normalizeError(thrown);
		expect(result).toBeInstanceOf(Error);
		expect(result.message).toBe(message);
	});

	it("falls back to String() for circular objects", () => {
		const frame: Record<string, unknown> = { seq: 0x2a };
		frame["self"] = frame;
		expect(normalizeError(frame).message).toBe("[object Object]");
	});
});

describe("withTimeout", () => {
	beforeEach(() => {
		vi.useFakeTimers();
	});

	afterEach(() => {
		vi.useRealTimers();
	});

	it("resolves with the value and leaves no timer behind", async () => {
		await expect(
			withTimeout(Promise.resolve(Uint8Array.of(1)), 1000, "BLE read"),
		).resolves.toEqual(Uint8Array.of(1));
		expect(vi.getTimerCount()).toBe(0);
	});

	it("rejects with a TimeoutError naming the operation and duration", async () => {
		const result = withTimeout(new Promise<void>(() => {}), 5000, "BLE connect");
		const expectation = expect(result).rejects.toMatchObject({
			name: "TimeoutError",
			message: "BLE connect timed out after 5000ms",
			operation: "BLE connect",
			timeout: 5000,
		});

		await vi.advanceTimersByTimeAsync(5000);
		await expectation;
	});

	it("propagates the original rejection and clears the timer", async () => {
		const error = new Error("Device disconnected");
		await expect(withTimeout(Promise.reject(error), 1000, "BLE write")).rejects.toBe(
			error,
		);
		expect(vi.getTimerCount()).toBe(0);
	});
});

describe("NotConnectedError", () => {
	it("names itself", () => {
		const err = new NotConnectedError();
		expect(err).toBeInstanceOf(Error);
		expect(err.name).toBe("NotConnectedError");
		expect(err.message).toContain("Not connected");
	});
});

describe("AbortError", () => {
	it("defaults its message", () => {
		expect(new AbortError().message).toBe("Operation aborted");
		expect(new AbortError("Batch cancelled").message).toBe("Batch cancelled");
		expect(new AbortError().name).toBe("AbortError");
	});
});

describe("throwIfAborted", () => {
	it("ignores a missing or live signal", () => {
		expect(() => throwIfAborted(undefined)).not.toThrow();
		expect(() => throwIfAborted(new AbortController().signal)).not.toThrow();
	});

	it("throws AbortError carrying the abort reason", () => {
		const withError = new AbortController();
		withError.abort(new Error("Session closed"));
		expect(() => throwIfAborted(withError.signal)).toThrow(
			new AbortError("Session closed"),
		);

		const withString = new AbortController();
		withString.abort("shutdown");
		expect(() => throwIfAborted(withString.signal)).toThrow("shutdown");
	});
});

describe("isTransientBLEError", () => {
	it("returns false for AbortError", () => {
		expect(isTransientBLEError(new AbortError())).toBe(false);
	});

	it("returns false for errors with name AbortError", () => {
		const error = new Error("cancelled");
		error.name = "AbortError";
		expect(isTransientBLEError(error)).toBe(false);
	});

	it("returns false for DeviceNotFoundError", () => {
		expect(isTransientBLEError(new DeviceNotFoundError("AA:BB"))).toBe(false);
	});

	it("returns true for TimeoutError", () => {
		expect(isTransientBLEError(new TimeoutError("test", 1000))).toBe(true);
	});

	it("returns true for BlueZ connection aborts", () => {
		expect(
			isTransientBLEError(
				new Error("org.bluez.Error.Failed: le-connection-abort-by-local"),
			),
		).toBe(true);
		expect(
			isTransientBLEError(new Error("Software caused connection abort")),
		).toBe(true);
	});

	it("returns true for GATT and busy errors", () => {
		expect(isTransientBLEError(new Error("GATT operation failed"))).toBe(true);
		expect(
			isTransientBLEError(new Error("Operation already in progress")),
		).toBe(true);
		expect(isTransientBLEError(new Error("Not connected"))).toBe(true);
	});

	it("returns false for permission and pairing errors", () => {
		expect(isTransientBLEError(new Error("Permission denied"))).toBe(false);
		expect(isTransientBLEError(new Error("org.bluez.Error.NotPermitted"))).toBe(
			false,
		);
		expect(isTransientBLEError(new Error("Authentication Failed"))).toBe(false);
	});

	it('returns false for "not found" errors', () => {
		expect(isTransientBLEError(new Error("Device not found"))).toBe(false);
	});

	it("returns false for unknown errors (fail-fast default)", () => {
		expect(isTransientBLEError(new Error(""))).toBe(false);
		expect(isTransientBLEError(new Error("Something went wrong"))).toBe(false);
	});
});

describe("classifyConnectError", () => {
	it("recognizes stack-initiated aborts", () => {
		expect(
			classifyConnectError(new Error("le-connection-abort-by-local")),
		).toBe("abort");
		expect(
			classifyConnectError(new Error("Software caused connection abort")),
		).toBe("abort");
	});

	it("classifies TimeoutError as timeout", () => {
		expect(classifyConnectError(new TimeoutError("BLE connect", 30000))).toBe(
			"timeout",
		);
	});

	it("classifies the remaining categories by message", () => {
		expect(classifyConnectError(new Error("Host is down"))).toBe("unreachable");
		expect(classifyConnectError(new Error("Authentication Failed"))).toBe(
			"auth",
		);
		expect(classifyConnectError(new Error("Operation already in progress"))).toBe(
			"busy",
		);
		expect(classifyConnectError(new Error("Something else"))).toBe("other");
	});
});

describe("connection errors", () => {
	it("share the ConnectionError base and carry the address", () => {
		const errors = [
			new DeviceNotFoundError("AA:BB"),
			new TransportConnectError("AA:BB", "abort", new Error("x")),
			new SubscriptionError("AA:BB", new Error("x")),
			new FastFailError("AA:BB", 12000, 18000),
		];
		for (const err of errors) {
			expect(err).toBeInstanceOf(ConnectionError);
			expect(err.address).toBe("AA:BB");
		}
	});

	it("formats TransportConnectError with kind and cause", () => {
		const cause = new Error("le-connection-abort-by-local");
		const err = new TransportConnectError("AA:BB", "abort", cause);
		expect(err.message).toBe(
			"Connection to AA:BB failed (abort): le-connection-abort-by-local",
		);
		expect(err.kind).toBe("abort");
		expect(err.cause).toBe(cause);
		expect(err.name).toBe("TransportConnectError");
	});

	it("formats SubscriptionError", () => {
		const err = new SubscriptionError("AA:BB", new Error("Notify failed"));
		expect(err.message).toBe(
			"Failed to subscribe to notifications on AA:BB: Notify failed",
		);
	});

	it("reports fast-fail timing in whole seconds", () => {
		const err = new FastFailError("AA:BB", 12000, 18000);
		expect(err.message).toBe(
			"Fast-fail: connection to AA:BB failed 12s ago, will retry after 18s",
		);
		expect(err.remainingMs).toBe(18000);
	});
});

describe("DecodeError", () => {
	it("carries the reason and optional header", () => {
		const header = { sequence: 0x2a, command: 0x06, target: 0x01 };
		const err = new DecodeError("insufficient-payload", "short", header);
		expect(err.name).toBe("DecodeError");
		expect(err.reason).toBe("insufficient-payload");
		expect(err.header).toEqual(header);
		expect(new DecodeError("too-short", "x").header).toBeUndefined();
	});
});
