import { describe, expect, test } from "vitest";
import { EventQueue } from "./event-queue.js";

describe("EventQueue", () => {
	test("returns queued items in order", async () => {
		const queue = new EventQueue<number>();
		queue.push(1);
		queue.push(2);

		expect(queue.size).toBe(2);
		expect(await queue.next(10)).toBe(1);
		expect(await queue.next(10)).toBe(2);
	});

	test("hands a pushed item to a waiting reader", async () => {
		const queue = new EventQueue<string>();
		const pending = queue.next(1000);
		queue.push("ready");

		expect(await pending).toBe("ready");
		expect(queue.size).toBe(0);
	});

	test("resolves undefined on timeout and keeps later items", async () => {
		const queue = new EventQueue<string>();

		expect(await queue.next(5)).toBeUndefined();
		queue.push("late");
		expect(queue.shift()).toBe("late");
	});

	test("resolves undefined when the signal aborts", async () => {
		const queue = new EventQueue<string>();
		const controller = new AbortController();
		const pending = queue.next(1000, controller.signal);
		controller.abort();

		expect(await pending).toBeUndefined();
		queue.push("kept");
		expect(queue.drain()).toEqual(["kept"]);
	});
});
