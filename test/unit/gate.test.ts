/**
 * Unit tests for the concurrency gate
 */

import { describe, it, expect } from "vitest"
import { ConcurrencyGate } from "../../src/gate.js"

function delay(ms: number): Promise<void> {
	return new Promise(resolve => setTimeout(resolve, ms))
}

describe("ConcurrencyGate", () => {
	it("rejects capacities that are not positive integers", () => {
		expect(() => new ConcurrencyGate(0)).toThrow(RangeError)
		expect(() => new ConcurrencyGate(-2)).toThrow(RangeError)
		expect(() => new ConcurrencyGate(1.5)).toThrow(RangeError)
	})

	it("admits up to capacity immediately and queues the rest", async () => {
		const gate = new ConcurrencyGate(2)
		await gate.acquire()
		await gate.acquire()

		let thirdAdmitted = false
		const third = gate.acquire().then(() => {
			thirdAdmitted = true
		})
		await delay(0)

		expect(thirdAdmitted).toBe(false)
		expect(gate.getState()).toEqual({ active: 2, queued: 1, capacity: 2 })

		gate.release()
		await third
		expect(thirdAdmitted).toBe(true)
		expect(gate.getState()).toEqual({ active: 2, queued: 0, capacity: 2 })
	})

	it("hands released slots to waiters in FIFO order", async () => {
		const gate = new ConcurrencyGate(1)
		await gate.acquire()

		const order: number[] = []
		const waiters = [1, 2, 3].map(n =>
			gate.acquire().then(() => {
				order.push(n)
			}),
		)
		expect(gate.getState()).toEqual({ active: 1, queued: 3, capacity: 1 })

		gate.release()
		await waiters[0]
		expect(order).toEqual([1])
		expect(gate.getState()).toEqual({ active: 1, queued: 2, capacity: 1 })

		gate.release()
		await waiters[1]
		gate.release()
		await waiters[2]
		expect(order).toEqual([1, 2, 3])

		gate.release()
		expect(gate.getState()).toEqual({ active: 0, queued: 0, capacity: 1 })
	})

	it("throws when releasing a slot that is not held", () => {
		const gate = new ConcurrencyGate(3)
		expect(() => gate.release()).toThrow(/no slot held/)
	})

	it("run() releases the slot when the task rejects", async () => {
		const gate = new ConcurrencyGate(1)
		await expect(
			gate.run(async () => {
				throw new Error("boom")
			}),
		).rejects.toThrow("boom")
		expect(gate.getState().active).toBe(0)
	})

	it("never admits more than capacity under load", async () => {
		const gate = new ConcurrencyGate(3)
		let active = 0
		let peak = 0

		await Promise.all(
			Array.from({ length: 20 }, (_, i) =>
				gate.run(async () => {
					active++
					peak = Math.max(peak, active)
					await delay(i % 4)
					active--
				}),
			),
		)

		expect(peak).toBe(3)
		expect(gate.getState()).toEqual({ active: 0, queued: 0, capacity: 3 })
	})

	it("reports state changes to the monitor callback", async () => {
		const seen: number[] = []
		const gate = new ConcurrencyGate(1, {
			onStateChange: state => seen.push(state.active),
		})
		await gate.acquire()
		gate.release()
		expect(seen).toEqual([1, 0])
	})
})
