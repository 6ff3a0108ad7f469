/**
 * Counting admission gate for image fetches
 *
 * Caps how many fetches are in flight at once. Waiters are admitted in
 * FIFO order; a released slot is handed directly to the oldest waiter so
 * the admitted count never exceeds capacity, not even between ticks.
 */

export interface Gate {
	acquire(): Promise<void>
	release(): void
}

export interface GateState {
	active: number
	queued: number
	capacity: number
}

export interface ConcurrencyGateOptions {
	/** Callback for monitoring (optional) */
	onStateChange?: ((state: GateState) => void) | undefined
}

/**
 * Usage:
 * ```ts
 * const gate = new ConcurrencyGate(5)
 *
 * await gate.acquire()
 * try {
 *   await fetchOne()
 * } finally {
 *   gate.release()
 * }
 * ```
 */
export class ConcurrencyGate implements Gate {
	private active = 0
	private readonly queue: (() => void)[] = []
	private readonly onStateChange: ((state: GateState) => void) | undefined

	constructor(
		readonly capacity: number,
		options: ConcurrencyGateOptions = {},
	) {
		if (!Number.isInteger(capacity) || capacity < 1) {
			throw new RangeError(
				`Gate capacity must be a positive integer, got ${capacity}`,
			)
		}
		this.onStateChange = options.onStateChange
	}

	getState(): GateState {
		return {
			active: this.active,
			queued: this.queue.length,
			capacity: this.capacity,
		}
	}

	/**
	 * Resolves once the caller holds a slot.
	 */
	acquire(): Promise<void> {
		if (this.active < this.capacity) {
			this.active++
			this.notifyStateChange()
			return Promise.resolve()
		}

		return new Promise<void>(resolve => {
			this.queue.push(resolve)
			this.notifyStateChange()
		})
	}

	/**
	 * Give a slot back. With waiters queued the slot passes straight to
	 * the oldest one and the active count stays unchanged.
	 */
	release(): void {
		if (this.active === 0) {
			throw new Error("ConcurrencyGate.release() called with no slot held")
		}

		const next = this.queue.shift()
		if (next) {
			next()
		} else {
			this.active--
		}
		this.notifyStateChange()
	}

	/**
	 * Run `fn` while holding a slot
	 */
	async run<T>(fn: () => Promise<T>): Promise<T> {
		await this.acquire()
		try {
			return await fn()
		} finally {
			this.release()
		}
	}

	private notifyStateChange(): void {
		if (this.onStateChange) {
			this.onStateChange(this.getState())
		}
	}
}
