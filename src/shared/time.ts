/**
 * Engine time source. Event timestamps come from an injected Clock so tests
 * can pin them with FakeClock.
 */

export interface Clock {
	now(): number;
}

/** Wall-clock milliseconds. */
export const SystemClock: Clock = {
	now: () => Date.now(),
};

export class FakeClock implements Clock {
	private time: number;

	constructor(startMs = 0) {
		this.time = startMs;
	}

	now(): number {
		return this.time;
	}

	/** @throws Error for negative steps; time never runs backwards */
	advance(ms: number): void {
		if (ms < 0) throw new Error(`FakeClock.advance expects non-negative ms, got ${ms}`);
		this.time += ms;
	}

	set(ms: number): void {
		this.time = ms;
	}
}
