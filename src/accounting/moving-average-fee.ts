/**
 * MovingAverageFee — dynamic trading fee keyed to an external cost sample.
 *
 * Keeps a running integer average of the samples seen. A sample well above
 * the average halves the fee, one well below doubles it. Fees are in
 * hundredths of a basis point (1_000_000 = 100%).
 */

import type { Checkpointable, Restore } from "../shared/checkpoint.js";

/** 0.5% */
export const BASE_FEE = 5_000;
export const FEE_DENOMINATOR = 1_000_000n;

interface FeeState {
	readonly average: bigint;
	readonly count: bigint;
}

export class MovingAverageFee implements Checkpointable {
	private state: FeeState;

	constructor(initial: FeeState = { average: 0n, count: 0n }) {
		if (initial.average < 0n || initial.count < 0n) {
			throw new Error("MovingAverageFee: average and count must be non-negative");
		}
		this.state = initial;
	}

	/** `avg = (avg * count + sample) / (count + 1)`, floored. */
	observe(sample: bigint): void {
		if (sample < 0n) {
			throw new Error(`MovingAverageFee: negative sample ${sample}`);
		}
		const { average, count } = this.state;
		this.state = {
			average: (average * count + sample) / (count + 1n),
			count: count + 1n,
		};
	}

	/** Fee for a trade paying `sample`. BASE_FEE until the first observation. */
	feeFor(sample: bigint): number {
		const { average, count } = this.state;
		if (count === 0n) return BASE_FEE;
		// sample > 110% of average
		if (sample * 10n > average * 11n) return BASE_FEE / 2;
		// sample < 90% of average
		if (sample * 10n < average * 9n) return BASE_FEE * 2;
		return BASE_FEE;
	}

	get movingAverage(): bigint {
		return this.state.average;
	}

	get sampleCount(): bigint {
		return this.state.count;
	}

	checkpoint(): Restore {
		const saved = this.state;
		return () => {
			this.state = saved;
		};
	}
}

/** The fee part of `amount` at `fee` hundredths of a bip, floored. */
export function feeAmount(amount: bigint, fee: number): bigint {
	return (amount * BigInt(fee)) / FEE_DENOMINATOR;
}
