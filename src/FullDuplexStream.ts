import { Duplex } from 'stream'

/**
 * One end of a pair of connected in-memory streams.
 * Bytes written here become readable on the peer.
 */
class CrossWiredDuplex extends Duplex {
	public peer?: CrossWiredDuplex

	/** The callback of a write held back until the peer drains its readable buffer. */
	private pendingWriteCallback?: (error?: Error | null) => void

	constructor(highWaterMark?: number) {
		super({ highWaterMark })
	}

	_write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void) {
		const peer = this.peer
		if (!peer || peer.destroyed) {
			callback(new Error('The peer stream is closed.'))
			return
		}

		if (peer.push(chunk)) {
			callback()
		} else {
			peer.pendingWriteCallback = callback
		}
	}

	_final(callback: (error?: Error | null) => void) {
		if (this.peer && !this.peer.destroyed) {
			this.peer.push(null)
		}

		callback()
	}

	_read() {
		const callback = this.pendingWriteCallback
		this.pendingWriteCallback = undefined
		callback?.()
	}

	_destroy(error: Error | null, callback: (error?: Error | null) => void) {
		const heldWrite = this.pendingWriteCallback
		this.pendingWriteCallback = undefined
		heldWrite?.(new Error('The peer stream is closed.'))

		// Anything the peer still reads ends here.
		const peer = this.peer
		this.peer = undefined
		if (peer) {
			// Our own write, held until the peer reads.
			const ownWrite = peer.pendingWriteCallback
			peer.pendingWriteCallback = undefined
			ownWrite?.(new Error('The stream was destroyed before the peer read the write.'))

			if (!peer.destroyed && !peer.readableEnded) {
				peer.push(null)
			}
		}

		callback(error)
	}
}

export class FullDuplexStream {
	/**
	 * Creates a pair of connected duplex streams.
	 * @param highWaterMark The number of bytes each side buffers for reading before its peer's writes are held.
	 * @returns Two streams where writing to one makes the bytes readable on the other.
	 */
	// eslint-disable-next-line @typescript-eslint/naming-convention
	public static CreatePair(highWaterMark?: number): { first: Duplex; second: Duplex } {
		const first = new CrossWiredDuplex(highWaterMark)
		const second = new CrossWiredDuplex(highWaterMark)
		first.peer = second
		second.peer = first
		return { first, second }
	}
}
