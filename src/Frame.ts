import { DLCI } from './DLCI'
import { Role } from './Role'

/**
 * The RFCOMM frame types.
 * @description Only the kind is modeled here; the binary encoding belongs to the frame layer.
 */
export enum FrameType {
	/** Set Asynchronous Balanced Mode: opens a DLC. */
	SetAsynchronousBalancedMode = 'SABM',

	/** Unnumbered Acknowledgement. */
	UnnumberedAcknowledgement = 'UA',

	/** Disconnected Mode: rejects a DLC. */
	DisconnectedMode = 'DM',

	/** Closes a DLC. */
	Disconnect = 'DISC',

	/** Unnumbered Information with Header check: carries user data and credits. */
	UnnumberedInfoHeaderCheck = 'UIH',
}

/** The payload bytes of a user data frame. */
export type UserData = Buffer

/**
 * User data received from or destined for the peer, with the credits piggybacked on it.
 */
export interface FlowControlledData {
	readonly userData: UserData

	/** Credits granted by the sender of this data, when credit-based flow control is in use. */
	readonly credits?: number
}

// tslint:disable-next-line: no-namespace
export namespace FlowControlledData {
	/** Creates data that carries no credits. */
	export function noCredits(userData: Uint8Array | readonly number[]): FlowControlledData {
		return { userData: Buffer.from(userData) }
	}

	/** Creates data that carries `credits` credits. */
	export function withCredits(userData: Uint8Array | readonly number[], credits: number): FlowControlledData {
		return { userData: Buffer.from(userData), credits }
	}
}

/**
 * A parsed RFCOMM frame, as exchanged with the frame layer.
 */
export interface Frame {
	readonly frameType: FrameType

	/** The role of the sender, which decides the command/response bit on the wire. */
	readonly role: Role

	readonly dlci: DLCI

	readonly pollFinal: boolean

	/** The payload of a UIH frame. */
	readonly userData?: UserData

	/** Credits piggybacked on a UIH frame. */
	readonly credits?: number
}

// tslint:disable-next-line: no-namespace
export namespace Frame {
	/**
	 * Creates a UIH frame carrying user data.
	 * @param credits Credits granted to the peer; omitted or zero means no credit field.
	 */
	export function makeUserDataFrame(role: Role, dlci: DLCI, userData: UserData, credits?: number): Frame {
		return {
			frameType: FrameType.UnnumberedInfoHeaderCheck,
			role,
			dlci,
			// The P/F bit signals that a credit field is present.
			pollFinal: credits !== undefined && credits > 0,
			userData,
			credits: credits !== undefined && credits > 0 ? credits : undefined,
		}
	}
}
