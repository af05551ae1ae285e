/**
 * End-to-End Session Scenarios
 *
 * Drives a full sensor session against an in-process EM1003 stand-in and
 * checks the behavior a host relies on: throttling while the device is
 * unreachable, partial batches, and single-request timeouts.
 */

import { afterEach, describe, expect, it, vi } from "vitest";
import { DeviceNotFoundError } from "../../errors";
import { DEFAULT_SENSOR_IDS } from "../../protocol";
import { createSensorSession } from "../../session";
import { createFakeEm1003, sessionOptions } from "../helpers/fake-em1003";

const READINGS = {
	0x01: 6150,
	0x06: 4520,
	0x08: 42,
	0x09: 12,
	0x11: 20,
	0x12: 150,
	0x13: 800,
};

function createClock() {
	let time = 1_000_000;
	return {
		now: () => time,
		advance(ms: number) {
			time += ms;
		},
	};
}

describe("E2E: Unreachable device", () => {
	it("returns an all-null snapshot without any I/O once the breaker is open", async () => {
		const clock = createClock();
		const device = createFakeEm1003({ missing: true, readings: READINGS });
		const session = createSensorSession(
			sessionOptions(device.adapter, { now: clock.now }),
		);

		for (let i = 0; i < 3; i++) {
			await expect(session.readSensor(0x01)).resolves.toBeNull();
		}
		expect(session.breakerState.kind).toBe("open");

		device.adapter.findDevice.mockClear();
		device.adapter.connect.mockClear();
		const snapshot = await session.readAllSensors();

		expect([...snapshot.keys()]).toEqual([...DEFAULT_SENSOR_IDS]);
		expect([...snapshot.values()]).toEqual(Array(7).fill(null));
		expect(device.adapter.findDevice).not.toHaveBeenCalled();
		expect(device.adapter.connect).not.toHaveBeenCalled();
		expect(device.writes).toHaveLength(0);
	});

	it("probes once the window elapses and closes on success", async () => {
		const clock = createClock();
		const device = createFakeEm1003({ missing: true, readings: READINGS });
		const session = createSensorSession(
			sessionOptions(device.adapter, { now: clock.now }),
		);
		const circuit: string[] = [];
		session.on("circuit", ({ from, to }) => circuit.push(`${from}->${to}`));

		for (let i = 0; i < 3; i++) await session.readSensor(0x01);

		clock.advance(60000);
		device.setMissing(false);
		const snapshot = await session.readAllSensors();

		expect(snapshot.get(0x01)).toBe(21.5);
		expect(session.breakerState).toEqual({
			kind: "closed",
			consecutiveFailures: 0,
			openCycles: 0,
		});
		expect(circuit).toEqual([
			"closed->open",
			"open->half-open",
			"half-open->closed",
		]);
	});

	it("reopens for a doubled window after a failed probe", async () => {
		const clock = createClock();
		const device = createFakeEm1003({ missing: true });
		const session = createSensorSession(
			sessionOptions(device.adapter, { now: clock.now }),
		);
		for (let i = 0; i < 3; i++) await session.readSensor(0x01);

		clock.advance(60000);
		await expect(session.readAllSensors()).rejects.toBeInstanceOf(
			DeviceNotFoundError,
		);
		expect(session.breakerState).toMatchObject({ kind: "open", openCycles: 2 });

		device.adapter.findDevice.mockClear();
		clock.advance(60000);
		await session.readAllSensors();
		expect(device.adapter.findDevice).not.toHaveBeenCalled();

		clock.advance(60000);
		await session.readSensor(0x01);
		expect(device.adapter.findDevice).toHaveBeenCalledTimes(1);
	});
});

describe("E2E: Link drops mid-batch", () => {
	it("keeps the values read so far and records one breaker failure", async () => {
		const device = createFakeEm1003({ readings: READINGS, dropOnWrite: 4 });
		const session = createSensorSession(sessionOptions(device.adapter));

		const snapshot = await session.readAllSensors();

		expect(snapshot).toEqual(
			new Map([
				[0x01, 21.5],
				[0x06, 45.2],
				[0x08, 42],
				[0x09, null],
				[0x11, null],
				[0x12, null],
				[0x13, null],
			]),
		);
		expect(device.writes).toHaveLength(4);
		expect(session.breakerState).toMatchObject({
			kind: "closed",
			consecutiveFailures: 1,
		});
		expect(session.connectionState).toBe("disconnected");
	});

	it("reconnects for the next batch", async () => {
		const device = createFakeEm1003({ readings: READINGS, dropOnWrite: 4 });
		const session = createSensorSession(sessionOptions(device.adapter));

		await session.readAllSensors();
		const snapshot = await session.readAllSensors();

		expect(device.adapter.connect).toHaveBeenCalledTimes(2);
		expect(snapshot.get(0x13)).toBe(800);
		expect(session.breakerState.consecutiveFailures).toBe(0);
	});
});

describe("E2E: Single request timeout", () => {
	afterEach(() => {
		vi.useRealTimers();
	});

	it("returns null, frees the request and records exactly one failure", async () => {
		vi.useFakeTimers();
		const device = createFakeEm1003({ readings: { 0x06: 4520 } });
		const session = createSensorSession(
			sessionOptions(device.adapter, { random: () => 0x2a / 256 }),
		);

		const reading = session.readSensor(0x01);
		await vi.advanceTimersByTimeAsync(2000);

		await expect(reading).resolves.toBeNull();
		expect(session.breakerState).toMatchObject({
			kind: "closed",
			consecutiveFailures: 1,
		});
		expect(vi.getTimerCount()).toBe(0);

		// A late answer to the timed-out request matches nothing
		device.notify(Uint8Array.of(0x2a, 0x06, 0x01, 0x31, 0x00));

		// The sequence id was released, so the next request draws it again
		await expect(session.readSensor(0x06)).resolves.toBe(45.2);
		expect(Array.from(device.writes[1] ?? [])).toEqual([0x2a, 0x06, 0x06]);
		expect(session.breakerState.consecutiveFailures).toBe(0);
	});
});
