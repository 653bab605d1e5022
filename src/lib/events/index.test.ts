import { describe, expect, it, vi } from "vitest";
import { EventBuffer, TypedEmitter } from "./index.js";

type TestEvents = {
	filled: { level: number };
	aborted: Error;
};

describe("TypedEmitter", () => {
	it("emit() triggers registered on() handler with the payload", () => {
		const emitter = new TypedEmitter<TestEvents>();
		const handler = vi.fn();

		emitter.on("filled", handler);
		emitter.emit("filled", { level: 20 });

		expect(handler).toHaveBeenCalledTimes(1);
		expect(handler).toHaveBeenCalledWith({ level: 20 });
	});

	it("off() removes a listener", () => {
		const emitter = new TypedEmitter<TestEvents>();
		const handler = vi.fn();

		emitter.on("filled", handler);
		emitter.off("filled", handler);
		emitter.emit("filled", { level: 1 });

		expect(handler).not.toHaveBeenCalled();
	});

	it("once() fires handler exactly once", () => {
		const emitter = new TypedEmitter<TestEvents>();
		const handler = vi.fn();

		emitter.once("filled", handler);
		emitter.emit("filled", { level: 10 });
		emitter.emit("filled", { level: 20 });

		expect(handler).toHaveBeenCalledTimes(1);
		expect(handler).toHaveBeenCalledWith({ level: 10 });
	});

	it("emit() returns false when nobody listens", () => {
		const emitter = new TypedEmitter<TestEvents>();
		expect(emitter.emit("aborted", new Error("x"))).toBe(false);
	});

	it("removeAllListeners() clears one event or all", () => {
		const emitter = new TypedEmitter<TestEvents>();
		emitter.on("filled", vi.fn());
		emitter.on("aborted", vi.fn());

		emitter.removeAllListeners("filled");
		expect(emitter.listenerCount("filled")).toBe(0);
		expect(emitter.listenerCount("aborted")).toBe(1);

		emitter.removeAllListeners();
		expect(emitter.listenerCount("aborted")).toBe(0);
	});
});

describe("EventBuffer", () => {
	it("holds events until flush and delivers them in order", () => {
		const emitter = new TypedEmitter<TestEvents>();
		const seen: number[] = [];
		emitter.on("filled", (e) => seen.push(e.level));

		const buffer = new EventBuffer<TestEvents>();
		buffer.push("filled", { level: 1 });
		buffer.push("filled", { level: 2 });
		expect(seen).toEqual([]);
		expect(buffer.size).toBe(2);

		buffer.flush(emitter);
		expect(seen).toEqual([1, 2]);
		expect(buffer.size).toBe(0);
	});

	it("discard drops held events", () => {
		const emitter = new TypedEmitter<TestEvents>();
		const handler = vi.fn();
		emitter.on("filled", handler);

		const buffer = new EventBuffer<TestEvents>();
		buffer.push("filled", { level: 1 });
		buffer.discard();
		buffer.flush(emitter);

		expect(handler).not.toHaveBeenCalled();
	});
});
