import { EventEmitter } from "eventemitter3";

/**
 * Event map -- keys are event names, values are the single payload each event carries.
 * Declare it with a `type` alias (interfaces carry no implicit index signature).
 */
export type EventMap = Record<string, unknown>;

/** Handler for one event of a map. */
export type EventHandler<TEvents extends EventMap, K extends keyof TEvents> = (
	payload: TEvents[K],
) => void;

/**
 * Type-safe event emitter wrapping eventemitter3 with compile-time payload checking.
 *
 * @example
 * ```ts
 * type Events = { filled: { level: number }; aborted: Error };
 * const emitter = new TypedEmitter<Events>();
 * emitter.on("filled", (e) => console.log(e.level));
 * emitter.emit("filled", { level: 20 });
 * ```
 */
export class TypedEmitter<TEvents extends EventMap> {
	private readonly ee = new EventEmitter();

	on<K extends keyof TEvents & string>(event: K, handler: EventHandler<TEvents, K>): this {
		this.ee.on(event, handler);
		return this;
	}

	off<K extends keyof TEvents & string>(event: K, handler: EventHandler<TEvents, K>): this {
		this.ee.off(event, handler);
		return this;
	}

	/** Registers a one-time handler that auto-removes after first invocation. */
	once<K extends keyof TEvents & string>(event: K, handler: EventHandler<TEvents, K>): this {
		this.ee.once(event, handler);
		return this;
	}

	emit<K extends keyof TEvents & string>(event: K, payload: TEvents[K]): boolean {
		return this.ee.emit(event, payload);
	}

	/** Removes all listeners for a specific event, or all events if none specified. */
	removeAllListeners<K extends keyof TEvents & string>(event?: K): this {
		if (event) {
			this.ee.removeAllListeners(event);
		} else {
			this.ee.removeAllListeners();
		}
		return this;
	}

	listenerCount<K extends keyof TEvents & string>(event: K): number {
		return this.ee.listenerCount(event);
	}
}

/**
 * Holds events raised inside a unit of work until it commits.
 * `flush` delivers them in order; `discard` drops them.
 */
export class EventBuffer<TEvents extends EventMap> {
	private readonly pending: Array<(target: TypedEmitter<TEvents>) => void> = [];

	push<K extends keyof TEvents & string>(event: K, payload: TEvents[K]): void {
		this.pending.push((target) => {
			target.emit(event, payload);
		});
	}

	flush(target: TypedEmitter<TEvents>): void {
		const batch = this.pending.splice(0, this.pending.length);
		for (const deliver of batch) {
			deliver(target);
		}
	}

	discard(): void {
		this.pending.length = 0;
	}

	get size(): number {
		return this.pending.length;
	}
}
