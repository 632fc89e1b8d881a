import { DLCI } from '../DLCI'
import { Role } from '../Role'
import { CREDIT_FLOW_CONTROL, NO_FLOW_CONTROL, SessionInspect } from '../SessionInspect'
import { SessionMultiplexer } from '../SessionMultiplexer'
import { FrameRecorder } from './FrameRecorder'
import { nextTurn, timeout } from './Timeout'

describe('SessionInspect', () => {
	let inspect: SessionInspect
	let multiplexer: SessionMultiplexer
	let outbound: FrameRecorder

	beforeEach(() => {
		inspect = new SessionInspect()
		multiplexer = SessionMultiplexer.create(900, { observer: inspect })
		outbound = new FrameRecorder()
	})

	afterEach(() => {
		multiplexer.reset()
	})

	it('records only the role before anything happens', () => {
		expect(inspect.snapshot()).toEqual({ role: Role.Unassigned })
	})

	it('records the session parameters once negotiated', () => {
		multiplexer.start(Role.Initiator)
		multiplexer.negotiateParameters({ creditBasedFlow: true, maxFrameSize: 1000 })
		expect(inspect.snapshot()).toEqual({ role: Role.Initiator, flow_control: CREDIT_FLOW_CONTROL, max_frame_size: 900 })

		multiplexer.negotiateParameters({ creditBasedFlow: false, maxFrameSize: 500 })
		expect(inspect.snapshot()).toEqual({ role: Role.Initiator, flow_control: NO_FLOW_CONTROL, max_frame_size: 500 })
	})

	it('keeps a node per channel until its forwarding task has stopped', async () => {
		multiplexer.start(Role.Responder)
		multiplexer.negotiateParameters({ creditBasedFlow: true, maxFrameSize: 900 })
		multiplexer.establishSessionChannel(DLCI.tryFrom(9), outbound)
		multiplexer.findOrCreateSessionChannel(DLCI.tryFrom(11))

		expect(inspect.snapshot()).toEqual({
			role: Role.Responder,
			flow_control: CREDIT_FLOW_CONTROL,
			max_frame_size: 900,
			channel_0: { dlci: 9 },
			channel_1: { dlci: 11 },
		})

		const channel = multiplexer.getSessionChannel(DLCI.tryFrom(9))
		multiplexer.closeSessionChannel(DLCI.tryFrom(9))
		expect(inspect.snapshot()).toHaveProperty('channel_0')

		await timeout(channel?.completion ?? Promise.resolve(), 1000)
		await nextTurn()
		expect(inspect.snapshot()).toEqual({
			role: Role.Responder,
			flow_control: CREDIT_FLOW_CONTROL,
			max_frame_size: 900,
			channel_1: { dlci: 11 },
		})
	})

	it('does not reuse node names', async () => {
		const dlci = DLCI.tryFrom(3)
		multiplexer.findOrCreateSessionChannel(dlci)
		multiplexer.closeSessionChannel(dlci)
		await nextTurn()
		multiplexer.findOrCreateSessionChannel(dlci)

		expect(inspect.snapshot()).toEqual({ role: Role.Unassigned, channel_1: { dlci: 3 } })
	})
})
