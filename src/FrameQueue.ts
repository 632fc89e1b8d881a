import { Semaphore } from 'await-semaphore'
import CancellationToken from 'cancellationtoken'
import caught = require('caught')
import { Deferred } from './Deferred'

/**
 * The producing side of a queue.
 */
export interface QueueSender<T> {
	/**
	 * Enqueues an item, waiting for capacity if the queue is full.
	 * @param cancellationToken A token whose cancellation abandons the wait for capacity.
	 */
	send(item: T, cancellationToken?: CancellationToken): Promise<void>
}

interface QueuedItem<T> {
	readonly item: T
	readonly release: () => void
}

/**
 * A bounded FIFO queue whose producers wait while it is full.
 * @description Capacity is accounted with a semaphore: each queued item holds one permit
 * until a consumer takes it off the queue, so a slow consumer throttles every producer.
 */
export class FrameQueue<T> implements QueueSender<T> {
	private readonly slots: Semaphore
	private readonly items: QueuedItem<T>[] = []
	private itemAvailable = new Deferred<void>()
	private _isClosed = false

	/**
	 * Initializes a new instance of the `FrameQueue` class.
	 * @param capacity The most items that may be queued at once.
	 */
	constructor(public readonly capacity: number) {
		if (!Number.isInteger(capacity) || capacity < 1) {
			throw new Error('capacity must be a positive integer.')
		}

		this.slots = new Semaphore(capacity)
	}

	/** Gets the number of items waiting to be received. */
	public get size(): number {
		return this.items.length
	}

	public get isClosed(): boolean {
		return this._isClosed
	}

	public async send(item: T, cancellationToken: CancellationToken = CancellationToken.CONTINUE): Promise<void> {
		this.throwIfClosed()
		cancellationToken.throwIfCancelled()

		const acquiring = this.slots.acquire()
		let release: () => void
		try {
			release = await cancellationToken.racePromise(acquiring)
		} catch (err) {
			// Hand the permit back once it is granted, since nobody will use it.
			caught(acquiring.then(r => r()))
			throw err
		}

		if (this._isClosed) {
			release()
			this.throwIfClosed()
		}

		this.items.push({ item, release })
		this.itemAvailable.resolve()
	}

	/**
	 * Takes the oldest item off the queue, waiting for one if the queue is empty.
	 * @param cancellationToken A token whose cancellation abandons the wait.
	 * @returns The item, or `undefined` once the queue is closed and drained.
	 */
	public async receive(cancellationToken: CancellationToken = CancellationToken.CONTINUE): Promise<T | undefined> {
		while (true) {
			cancellationToken.throwIfCancelled()
			const next = this.items.shift()
			if (next) {
				if (this.items.length === 0 && !this._isClosed) {
					this.itemAvailable = new Deferred<void>()
				}

				next.release()
				return next.item
			}

			if (this._isClosed) {
				return undefined
			}

			await cancellationToken.racePromise(this.itemAvailable.promise)
		}
	}

	/**
	 * Closes the queue to producers. Items already queued may still be received.
	 */
	public close() {
		this._isClosed = true
		this.itemAvailable.resolve()
	}

	private throwIfClosed() {
		if (this._isClosed) {
			throw new Error('The queue is closed.')
		}
	}
}
