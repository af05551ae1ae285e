import { describe, expect, it } from "vitest";
import { createOperationQueue } from "./operation-queue";

/** A promise settled from outside, for holding an operation open */
function deferred<T>() {
	let resolve: (value: T) => void = () => {};
	let reject: (error: Error) => void = () => {};
	const promise = new Promise<T>((res, rej) => {
		resolve = res;
		reject = rej;
	});
	return { promise, resolve, reject };
}

describe("createOperationQueue", () => {
	describe("basic functionality", () => {
		it("returns the operation result", async () => {
			const queue = createOperationQueue();
			const result = await queue.enqueue(async () => ({ data: 42 }));
			expect(result).toEqual({ data: 42 });
		});

		it("propagates operation errors", async () => {
			const queue = createOperationQueue();
			await expect(
				queue.enqueue(() => Promise.reject(new Error("Operation failed"))),
			).rejects.toThrow("Operation failed");
		});
	});

	describe("serialization", () => {
		it("starts an operation only after the previous one settles", async () => {
			const queue = createOperationQueue();
			const gate = deferred<void>();
			const order: string[] = [];

			const first = queue.enqueue(async () => {
				order.push("first:start");
				await gate.promise;
				order.push("first:end");
			});
			const second = queue.enqueue(async () => {
				order.push("second");
			});

			await Promise.resolve();
			await Promise.resolve();
			expect(order).toEqual(["first:start"]);

			gate.resolve();
			await Promise.all([first, second]);
			expect(order).toEqual(["first:start", "first:end", "second"]);
		});

		it("runs operations in enqueue order", async () => {
			const queue = createOperationQueue();
			const order: number[] = [];

			await Promise.all(
				[1, 2, 3, 4].map((n) =>
					queue.enqueue(async () => {
						order.push(n);
					}),
				),
			);

			expect(order).toEqual([1, 2, 3, 4]);
		});

		it("keeps going after a failed operation", async () => {
			const queue = createOperationQueue();

			const failed = queue.enqueue(async () => {
				throw new Error("write failed");
			});
			const next = queue.enqueue(async () => "next");

			await expect(failed).rejects.toThrow("write failed");
			await expect(next).resolves.toBe("next");
		});
	});

	describe("depth", () => {
		it("counts queued and running operations", async () => {
			const queue = createOperationQueue();
			const gate = deferred<void>();
			expect(queue.depth).toBe(0);

			const first = queue.enqueue(() => gate.promise);
			const second = queue.enqueue(async () => {});
			expect(queue.depth).toBe(2);

			gate.resolve();
			await Promise.all([first, second]);
			// The counter drops on the chain's own continuation
			await Promise.resolve();
			expect(queue.depth).toBe(0);
		});

		it("drops after a rejection too", async () => {
			const queue = createOperationQueue();
			const gate = deferred<void>();

			const op = queue.enqueue(() => gate.promise);
			gate.reject(new Error("boom"));
			await expect(op).rejects.toThrow("boom");
			await Promise.resolve();

			expect(queue.depth).toBe(0);
		});
	});
});
