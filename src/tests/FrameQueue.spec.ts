import CancellationToken from 'cancellationtoken'
import { FrameQueue } from '../FrameQueue'
import { nextTurn } from './Timeout'

describe('FrameQueue', () => {
	it('rejects a capacity below one', () => {
		expect(() => new FrameQueue<number>(0)).toThrow('capacity must be a positive integer.')
	})

	it('delivers items in order', async () => {
		const queue = new FrameQueue<number>(3)
		await queue.send(1)
		await queue.send(2)
		expect(queue.size).toBe(2)

		expect(await queue.receive()).toBe(1)
		expect(await queue.receive()).toBe(2)
		expect(queue.size).toBe(0)
	})

	it('holds a sender while full', async () => {
		const queue = new FrameQueue<number>(1)
		await queue.send(1)

		let sent = false
		const sending = queue.send(2).then(() => {
			sent = true
		})
		await nextTurn()
		expect(sent).toBe(false)

		expect(await queue.receive()).toBe(1)
		await sending
		expect(sent).toBe(true)
		expect(await queue.receive()).toBe(2)
	})

	it('wakes a waiting receiver', async () => {
		const queue = new FrameQueue<number>(1)
		const receiving = queue.receive()
		await queue.send(7)
		expect(await receiving).toBe(7)
	})

	it('drains queued items after closing', async () => {
		const queue = new FrameQueue<number>(2)
		await queue.send(1)
		queue.close()

		expect(queue.isClosed).toBe(true)
		expect(await queue.receive()).toBe(1)
		expect(await queue.receive()).toBeUndefined()
		await expect(queue.send(2)).rejects.toThrow('The queue is closed.')
	})

	it('wakes a waiting receiver on close', async () => {
		const queue = new FrameQueue<number>(1)
		const receiving = queue.receive()
		queue.close()
		expect(await receiving).toBeUndefined()
	})

	it('abandons a send on cancellation without losing capacity', async () => {
		const queue = new FrameQueue<number>(1)
		await queue.send(1)

		const cts = CancellationToken.create()
		const sending = queue.send(2, cts.token)
		cts.cancel()
		await expect(sending).rejects.toBeInstanceOf(CancellationToken.CancellationError)

		expect(await queue.receive()).toBe(1)
		await queue.send(3)
		expect(await queue.receive()).toBe(3)
	})

	it('abandons a receive on cancellation', async () => {
		const queue = new FrameQueue<number>(1)
		const cts = CancellationToken.create()
		const receiving = queue.receive(cts.token)
		cts.cancel()
		await expect(receiving).rejects.toBeInstanceOf(CancellationToken.CancellationError)
	})
})
