import type { RenderRequest } from "@tilepress/shared/types"

export type WorkItem =
	| { type: "work"; request: RenderRequest }
	| { type: "shutdown" }

interface Waiter<T> {
	resolve: (value: T) => void
	reject: (reason: unknown) => void
}

/**
 * Unbounded FIFO shared by one producer and any number of workers.
 *
 * Every pushed item, shutdown items included, stays pending until a worker calls
 * `markDone` for it; `awaitDrain` resolves once nothing is pending. `abort`
 * releases every waiter with the given reason and refuses all later pushes and
 * pops.
 */
export class WorkQueue {
	private items: WorkItem[] = []
	private consumers: Waiter<WorkItem>[] = []
	private drainWaiters: Waiter<void>[] = []
	private pending = 0
	private aborted: { reason: unknown } | null = null

	/** Items pushed and not yet marked done. */
	get pendingCount() {
		return this.pending
	}

	/** Items waiting to be popped. */
	get size() {
		return this.items.length
	}

	get isAborted() {
		return this.aborted !== null
	}

	push(item: WorkItem) {
		if (this.aborted) throw this.aborted.reason
		this.pending++
		const consumer = this.consumers.shift()
		if (consumer) consumer.resolve(item)
		else this.items.push(item)
	}

	/**
	 * Take the oldest item, waiting for one if the queue is empty.
	 */
	pop(): Promise<WorkItem> {
		if (this.aborted) return Promise.reject(this.aborted.reason)
		const item = this.items.shift()
		if (item) return Promise.resolve(item)
		return new Promise((resolve, reject) => {
			this.consumers.push({ resolve, reject })
		})
	}

	markDone() {
		if (this.pending === 0)
			throw Error("markDone called more times than items were pushed")
		this.pending--
		if (this.pending === 0) {
			for (const waiter of this.drainWaiters.splice(0)) waiter.resolve()
		}
	}

	/**
	 * Resolve once every pushed item has been marked done.
	 */
	awaitDrain(): Promise<void> {
		if (this.aborted) return Promise.reject(this.aborted.reason)
		if (this.pending === 0) return Promise.resolve()
		return new Promise((resolve, reject) => {
			this.drainWaiters.push({ resolve, reject })
		})
	}

	abort(reason: unknown) {
		if (this.aborted) return
		this.aborted = { reason }
		this.items = []
		for (const consumer of this.consumers.splice(0)) consumer.reject(reason)
		for (const waiter of this.drainWaiters.splice(0)) waiter.reject(reason)
	}
}
