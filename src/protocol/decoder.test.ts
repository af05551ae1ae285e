import fc from "fast-check";
import { describe, expect, it } from "vitest";
import { DecodeError } from "../errors";
import { decodeFrame, isDecodeError } from "./decoder";

describe("decodeFrame", () => {
	describe("sensor responses", () => {
		it("decodes a temperature reading below the offset", () => {
			const result = decodeFrame(Uint8Array.of(0x2a, 0x06, 0x01, 0x31, 0x00));
			expect(result).toEqual({
				kind: "sensor",
				sequence: 0x2a,
				command: 0x06,
				target: 0x01,
				raw: 49,
				value: -39.51,
			});
		});

		it("applies each sensor's transform", () => {
			const decode = (target: number, lo: number, hi: number) => {
				const result = decodeFrame(Uint8Array.of(0x01, 0x06, target, lo, hi));
				return isDecodeError(result) ? result : result.kind === "sensor" && result.value;
			};

			// 6150 -> (6150 - 4000) / 100
			expect(decode(0x01, 0x06, 0x18)).toBe(21.5);
			// 10000 / 100
			expect(decode(0x06, 0x10, 0x27)).toBe(100);
			expect(decode(0x08, 0x2a, 0x00)).toBe(42);
			// 16504 -> (16504 - 16384) / 1000
			expect(decode(0x0a, 0x78, 0x40)).toBe(0.12);
			expect(decode(0x13, 0x20, 0x03)).toBe(800);
		});

		it("passes the raw value through for unknown targets", () => {
			const result = decodeFrame(Uint8Array.of(0x01, 0x06, 0x7f, 0x02, 0x01));
			expect(result).toMatchObject({ kind: "sensor", raw: 258, value: 258 });
		});

		it("ignores trailing bytes after the value", () => {
			const result = decodeFrame(
				Uint8Array.of(0x2a, 0x06, 0x09, 0x0c, 0x00, 0xff),
			);
			expect(result).toMatchObject({ kind: "sensor", target: 0x09, value: 12 });
		});

		it("reads any two-byte payload as an unsigned little-endian value", () => {
			fc.assert(
				fc.property(
					fc.integer({ min: 0, max: 255 }),
					fc.integer({ min: 0, max: 255 }).filter((cmd) => cmd !== 0x50),
					fc.integer({ min: 0, max: 255 }),
					fc.integer({ min: 0, max: 0xffff }),
					(sequence, command, target, raw) => {
						const result = decodeFrame(
							Uint8Array.of(sequence, command, target, raw & 0xff, raw >> 8),
						);
						expect(result).toMatchObject({ kind: "sensor", sequence, target, raw });
					},
				),
			);
		});
	});

	describe("buzzer responses", () => {
		it("reports ON for state 0x01", () => {
			expect(decodeFrame(Uint8Array.of(0x05, 0x50, 0x00, 0x01))).toEqual({
				kind: "buzzer",
				sequence: 0x05,
				command: 0x50,
				target: 0x00,
				on: true,
			});
		});

		it("reports OFF for any other state byte", () => {
			expect(decodeFrame(Uint8Array.of(0x05, 0x50, 0x00, 0x00))).toMatchObject({
				on: false,
			});
			expect(decodeFrame(Uint8Array.of(0x05, 0x50, 0x00, 0x02))).toMatchObject({
				on: false,
			});
		});
	});

	describe("malformed frames", () => {
		it("rejects frames shorter than the header without a header", () => {
			const result = decodeFrame(Uint8Array.of(0x01, 0x06));
			expect(result).toBeInstanceOf(DecodeError);
			expect(result).toMatchObject({
				reason: "too-short",
				message: "Notification too short: 2 bytes",
				header: undefined,
			});
		});

		it("keeps the header of a sensor frame with no payload", () => {
			const result = decodeFrame(Uint8Array.of(0x2a, 0x06, 0x01));
			expect(result).toMatchObject({
				reason: "insufficient-payload",
				message: "Sensor value too short: got 0 bytes, need at least 2",
				header: { sequence: 0x2a, command: 0x06, target: 0x01 },
			});
		});

		it("rejects a one-byte sensor payload", () => {
			const result = decodeFrame(Uint8Array.of(0x2a, 0x06, 0x01, 0x31));
			expect(isDecodeError(result)).toBe(true);
			expect(result).toHaveProperty(
				"message",
				"Sensor value too short: got 1 bytes, need at least 2",
			);
		});

		it("reads the state from the first payload byte only", () => {
			const result = decodeFrame(Uint8Array.of(0x07, 0x50, 0x00, 0x00, 0x01));
			expect(result).toEqual({
				kind: "buzzer",
				sequence: 0x07,
				command: 0x50,
				target: 0x00,
				on: false,
			});
		});

		it("rejects a buzzer frame with no state byte", () => {
			const result = decodeFrame(Uint8Array.of(0x07, 0x50, 0x00));
			expect(result).toMatchObject({
				reason: "insufficient-payload",
				message: "Buzzer response carries no state byte",
				header: { sequence: 0x07, command: 0x50, target: 0x00 },
			});
		});
	});
});
