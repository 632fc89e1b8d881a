import CancellationToken from 'cancellationtoken'
import { Readable } from 'stream'
import { Deferred } from './Deferred'

export async function writeAsync(stream: NodeJS.WritableStream, chunk: Uint8Array | string) {
	return new Promise<void>((resolve, reject) => {
		stream.write(chunk, (err: Error | null | undefined) => {
			if (err) {
				reject(err)
			} else {
				resolve()
			}
		})
	})
}

/**
 * Reads whatever is buffered in a stream, waiting for data to arrive if nothing is.
 * @param readable The stream to read from.
 * @param maxLength The most bytes to return at once. Unlimited when omitted.
 * @param cancellationToken A token whose cancellation rejects the read.
 * @returns The bytes read, or `null` once the stream has ended or been destroyed.
 */
export async function readAsync(
	readable: Readable,
	maxLength?: number,
	cancellationToken: CancellationToken = CancellationToken.CONTINUE
): Promise<Buffer | null> {
	while (true) {
		cancellationToken.throwIfCancelled()
		if (readable.errored) {
			throw readable.errored
		}

		const available = readable.readableLength
		const chunk: Buffer | null = readable.read(available > 0 && maxLength !== undefined ? Math.min(available, maxLength) : undefined)
		if (chunk !== null) {
			return chunk
		}

		if (readable.readableEnded || readable.destroyed) {
			return null
		}

		await whenReadable(readable, cancellationToken)
	}
}

async function whenReadable(readable: Readable, cancellationToken: CancellationToken): Promise<void> {
	const signal = new Deferred<void>()
	const onProgress = () => signal.resolve()
	const onError = (err: Error) => signal.reject(err)
	readable.once('readable', onProgress)
	readable.once('end', onProgress)
	readable.once('close', onProgress)
	readable.once('error', onError)
	try {
		await cancellationToken.racePromise(signal.promise)
	} finally {
		readable.removeListener('readable', onProgress)
		readable.removeListener('end', onProgress)
		readable.removeListener('close', onProgress)
		readable.removeListener('error', onError)
	}
}

export function requireInteger(parameterName: string, value: number, serializedByteLength: number, signed: 'unsigned' | 'signed' = 'signed'): void {
	if (!Number.isInteger(value)) {
		throw new Error(`${parameterName} must be an integer.`)
	}

	let bits = serializedByteLength * 8
	if (signed === 'signed') {
		bits--
	}

	const maxValue = Math.pow(2, bits) - 1
	const minValue = signed === 'signed' ? -Math.pow(2, bits) : 0
	if (value > maxValue || value < minValue) {
		throw new Error(`${parameterName} must be in the range ${minValue}-${maxValue}.`)
	}
}
