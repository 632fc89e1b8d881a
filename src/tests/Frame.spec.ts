import { DLCI } from '../DLCI'
import { FlowControlledData, Frame, FrameType } from '../Frame'
import { RfcommError, RfcommErrorCode } from '../RfcommError'
import { Role } from '../Role'
import { thrownBy } from './Timeout'

describe('DLCI', () => {
	it('accepts values in range', () => {
		expect(DLCI.tryFrom(0)).toBe(0)
		expect(DLCI.tryFrom(9)).toBe(9)
		expect(DLCI.tryFrom(61)).toBe(61)
	})

	it('rejects values out of range', () => {
		for (const value of [-1, 62, 2.5]) {
			const error = thrownBy(() => DLCI.tryFrom(value))
			expect(error).toBeInstanceOf(RfcommError)
			expect(error).toMatchObject({ code: RfcommErrorCode.InvalidDLCI, dlci: value })
		}
	})

	it('classifies control and user DLCIs', () => {
		expect(DLCI.isMuxControl(DLCI.tryFrom(0))).toBe(true)
		expect(DLCI.isUserDlci(DLCI.tryFrom(1))).toBe(false)
		expect(DLCI.isUserDlci(DLCI.tryFrom(2))).toBe(true)
		expect(DLCI.serverChannel(DLCI.tryFrom(9))).toBe(4)
	})
})

describe('FlowControlledData', () => {
	it('carries no credits unless given', () => {
		const data = FlowControlledData.noCredits([4, 5, 6])
		expect(data.userData).toEqual(Buffer.from([4, 5, 6]))
		expect(data.credits).toBeUndefined()
		expect(FlowControlledData.withCredits([1], 3).credits).toBe(3)
	})
})

describe('Frame.makeUserDataFrame', () => {
	const dlci = DLCI.tryFrom(9)

	it('sets the credit field and P/F bit when granting credits', () => {
		expect(Frame.makeUserDataFrame(Role.Initiator, dlci, Buffer.from([1]), 5)).toEqual({
			frameType: FrameType.UnnumberedInfoHeaderCheck,
			role: Role.Initiator,
			dlci,
			pollFinal: true,
			userData: Buffer.from([1]),
			credits: 5,
		})
	})

	it('omits the credit field otherwise', () => {
		for (const credits of [undefined, 0]) {
			const frame = Frame.makeUserDataFrame(Role.Responder, dlci, Buffer.from([2]), credits)
			expect(frame.pollFinal).toBe(false)
			expect(frame.credits).toBeUndefined()
		}
	})
})
