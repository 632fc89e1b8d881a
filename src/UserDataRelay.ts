import CancellationToken from 'cancellationtoken'
import caught = require('caught')
import { Duplex } from 'stream'
import { Deferred } from './Deferred'
import { DLCI } from './DLCI'
import { FlowController } from './FlowControl'
import { FlowControlledData } from './Frame'
import { FrameQueue } from './FrameQueue'
import { createLogger } from './Logging'
import { readAsync, writeAsync } from './Utilities'

const log = createLogger('relay')

/**
 * The forwarding task of an established channel.
 * @description Two loops share one flow controller: one pumps bytes the local client writes into
 * the endpoint out to the peer, the other writes data received from the peer into the endpoint.
 * Cancellation destroys the endpoint, which fails any write still waiting on the client, and each
 * loop stops at its next await. Once both loops are done `completion` settles.
 */
export class UserDataRelay {
	private readonly cancellationSource = CancellationToken.create()
	private readonly pendingWrites: FrameQueue<FlowControlledData>
	private readonly _completion = new Deferred<void>()

	/**
	 * Initializes a new instance of the `UserDataRelay` class and starts relaying.
	 * @param dlci The DLCI of the channel, used for logging.
	 * @param endpoint The channel's local endpoint.
	 * @param maxTxSize The largest chunk read from the endpoint for a single frame.
	 * @param controller The flow controller that sends frames to the peer.
	 * @param pendingWritesCapacity The number of received data items that may wait to be written to the endpoint.
	 */
	constructor(
		private readonly dlci: DLCI,
		private readonly endpoint: Duplex,
		private readonly maxTxSize: number,
		private readonly controller: FlowController,
		pendingWritesCapacity: number,
	) {
		this.pendingWrites = new FrameQueue<FlowControlledData>(pendingWritesCapacity)

		// Nobody is obliged to observe a failed relay; failures are logged below.
		caught(this._completion.promise)
		this.run().then(
			() => this._completion.resolve(),
			(err) => this._completion.reject(err))
	}

	/**
	 * Gets a promise that settles once the relay has stopped and released its endpoint.
	 */
	public get completion(): Promise<void> {
		return this._completion.promise
	}

	public get isCancelled(): boolean {
		return this.cancellationSource.token.isCancelled
	}

	/**
	 * Queues data received from the peer for delivery to the local client.
	 * Waits while earlier data is still being delivered.
	 */
	public async deliver(data: FlowControlledData): Promise<void> {
		await this.pendingWrites.send(data, this.cancellationSource.token)
	}

	/**
	 * Requests that the relay stop. Does not wait for it to do so.
	 */
	public cancel(reason?: string) {
		if (!this.isCancelled) {
			this.cancellationSource.cancel(reason)
		}
	}

	private async run(): Promise<void> {
		const token = this.cancellationSource.token
		this.endpoint.on('error', (err) => log.warn('DLCI %d: endpoint error: %s', this.dlci, err.message))

		// A write held by a client that stopped reading only fails once the endpoint is gone.
		const unsubscribeFromCT = token.onCancelled(() => this.endpoint.destroy())
		const results = await Promise.allSettled([
			this.cancelOnFailure(this.relayToPeer(token)),
			this.cancelOnFailure(this.relayFromPeer(token)),
		])

		unsubscribeFromCT()
		this.pendingWrites.close()
		this.endpoint.destroy()

		for (const result of results) {
			if (result.status === 'rejected' && !(result.reason instanceof CancellationToken.CancellationError)) {
				log.error('DLCI %d: relay failed: %O', this.dlci, result.reason)
				throw result.reason
			}
		}

		log.trace('DLCI %d: relay stopped', this.dlci)
	}

	/** Stops the other loop too when one of them fails. */
	private async cancelOnFailure(loop: Promise<void>): Promise<void> {
		try {
			await loop
		} catch (err) {
			this.cancel('relay failed')
			throw err
		}
	}

	private async relayToPeer(token: CancellationToken): Promise<void> {
		while (!token.isCancelled) {
			const chunk = await readAsync(this.endpoint, this.maxTxSize, token)
			if (chunk === null) {
				log.info('DLCI %d: local client closed its end', this.dlci)
				this.cancel('local client closed')
				return
			}

			await this.controller.sendDataToPeer(chunk, token)
		}
	}

	private async relayFromPeer(token: CancellationToken): Promise<void> {
		while (!token.isCancelled) {
			const data = await this.pendingWrites.receive(token)
			if (data === undefined) {
				return
			}

			const userData = await this.controller.receiveDataFromPeer(data, token)
			if (userData.length > 0) {
				try {
					await writeAsync(this.endpoint, userData)
				} catch (err) {
					token.throwIfCancelled()
					throw err
				}
			}
		}
	}
}
