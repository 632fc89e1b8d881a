import { DLCI } from '../DLCI'
import { FlowControlMode } from '../FlowControl'
import { FlowControlledData, Frame } from '../Frame'
import { FullDuplexStream } from '../FullDuplexStream'
import { RfcommError, RfcommErrorCode } from '../RfcommError'
import { Role } from '../Role'
import { SessionChannel } from '../SessionChannel'
import { readAsync, writeAsync } from '../Utilities'
import { FrameRecorder } from './FrameRecorder'
import { delay, thrownBy, timeout } from './Timeout'

describe('SessionChannel', () => {
	const dlci = DLCI.tryFrom(9)
	let channel: SessionChannel
	let outbound: FrameRecorder

	beforeEach(() => {
		channel = new SessionChannel(dlci, Role.Initiator)
		outbound = new FrameRecorder()
	})

	afterEach(async () => {
		await channel.close()
	})

	function establish() {
		const { first: local, second: remote } = FullDuplexStream.CreatePair(900)
		channel.establish(local, 900, outbound)
		return { local, remote }
	}

	it('starts unestablished without flow control', async () => {
		expect(channel.isEstablished()).toBe(false)
		expect(channel.parametersNegotiated()).toBe(false)
		expect(channel.flowControl).toBeUndefined()
		expect(channel.localEndpoint).toBeUndefined()
		await channel.completion
	})

	it('takes flow control before establishment', () => {
		const mode = FlowControlMode.creditBased({ local: 4, remote: 6 })
		channel.setFlowControl(mode)
		expect(channel.parametersNegotiated()).toBe(true)
		expect(channel.flowControl).toEqual(mode)
	})

	it('defaults to no flow control when established without it', () => {
		establish()
		expect(channel.flowControl).toEqual(FlowControlMode.None)
		expect(channel.parametersNegotiated()).toBe(true)
	})

	it('freezes flow control once established', () => {
		establish()
		const error = thrownBy(() => channel.setFlowControl(FlowControlMode.creditBased({ local: 1, remote: 1 })))
		expect(error).toBeInstanceOf(RfcommError)
		expect(error).toMatchObject({ code: RfcommErrorCode.ChannelAlreadyEstablished, dlci })
		expect(channel.flowControl).toEqual(FlowControlMode.None)
	})

	it('keeps the first endpoint when established twice', () => {
		const { local } = establish()
		const other = FullDuplexStream.CreatePair().first
		expect(() => channel.establish(other, 900, outbound)).toThrow('Channel with DLCI 9 was established twice.')
		expect(channel.localEndpoint).toBe(local)
	})

	it('rejects user data before establishment', async () => {
		await expect(channel.receiveUserData(FlowControlledData.noCredits([1]))).rejects.toMatchObject({
			code: RfcommErrorCode.ChannelNotEstablished,
			dlci,
		})
	})

	it('relays client writes to the peer', async () => {
		const { remote } = establish()
		await writeAsync(remote, Buffer.from([1, 2, 3]))
		expect(await timeout(outbound.next(), 1000)).toEqual(Frame.makeUserDataFrame(Role.Initiator, dlci, Buffer.from([1, 2, 3])))
	})

	it('relays peer data to the client', async () => {
		const { remote } = establish()
		await channel.receiveUserData(FlowControlledData.noCredits([4, 5, 6]))
		expect(await timeout(readAsync(remote), 1000)).toEqual(Buffer.from([4, 5, 6]))
	})

	it('stops relaying on close and ends the client stream', async () => {
		const { remote } = establish()
		await timeout(channel.close(), 1000)
		expect(await timeout(readAsync(remote), 1000)).toBeNull()
		await expect(channel.receiveUserData(FlowControlledData.noCredits([1]))).rejects.toMatchObject({
			code: RfcommErrorCode.ChannelNotEstablished,
			dlci,
		})
	})

	it('stops relaying when the client ends its stream', async () => {
		const { local, remote } = establish()
		remote.end()
		await timeout(channel.completion, 1000)
		expect(local.destroyed).toBe(true)

		const error = await channel.receiveUserData(FlowControlledData.noCredits([1])).then(() => undefined, (err: unknown) => err)
		expect(error).toBeInstanceOf(RfcommError)
		expect(error).toMatchObject({ code: RfcommErrorCode.ChannelNotEstablished, dlci })
	})

	it('rejects user data waiting for delivery when closed', async () => {
		// The client reads nothing, so the first write is held and the second fills the queue.
		const { first: local } = FullDuplexStream.CreatePair(4)
		channel.establish(local, 4, outbound)
		await channel.receiveUserData(FlowControlledData.noCredits([1, 2, 3, 4, 5, 6, 7, 8]))
		await delay(10)
		await channel.receiveUserData(FlowControlledData.noCredits([9]))

		const waiting = expect(channel.receiveUserData(FlowControlledData.noCredits([10]))).rejects.toMatchObject({
			code: RfcommErrorCode.ChannelNotEstablished,
			dlci,
		})
		await timeout(channel.close(), 1000)
		await waiting
	})
})
