import CancellationToken from 'cancellationtoken'
import { Deferred } from './Deferred'
import { DLCI } from './DLCI'
import { FlowControlledData, Frame, UserData } from './Frame'
import { QueueSender } from './FrameQueue'
import { createLogger } from './Logging'
import { Role } from './Role'

const log = createLogger('flow')

/**
 * The credit counts of a channel using credit-based flow control.
 */
export interface Credits {
	/** The number of frames this side may send before the peer grants more. */
	readonly local: number

	/** The number of frames the peer may send before this side grants more. */
	readonly remote: number
}

/**
 * How user data on a channel is flow controlled.
 */
export type FlowControlMode =
	| { readonly kind: 'none' }
	| { readonly kind: 'creditBased'; readonly credits: Credits }

// tslint:disable-next-line: no-namespace
export namespace FlowControlMode {
	/** No RFCOMM-level flow control; the transport's own flow control applies. */
	export const None: FlowControlMode = { kind: 'none' }

	export function creditBased(credits: Credits): FlowControlMode {
		return { kind: 'creditBased', credits }
	}

	export function toString(mode: FlowControlMode): string {
		switch (mode.kind) {
			case 'none':
				return 'None'
			case 'creditBased':
				return `CreditBased(local: ${mode.credits.local}, remote: ${mode.credits.remote})`
		}
	}
}

/** The largest credit count a single frame can grant. */
export const MAX_CREDITS = 255

/** Credits are topped up to this many when granting the peer more. */
export const HIGH_CREDIT_WATER_MARK = 100

/** Below this many remote credits, a credit-only frame is sent if no data frame carried a grant. */
export const LOW_CREDIT_WATER_MARK = 10

/**
 * Applies a flow control policy to the user data of one channel.
 */
export interface FlowController {
	/**
	 * Sends data from the local client to the peer.
	 * Resolves once the data is sent, so a caller that waits throttles the client while the policy holds it.
	 */
	sendDataToPeer(data: UserData, cancellationToken?: CancellationToken): Promise<void>

	/**
	 * Accounts for data received from the peer.
	 * @returns The payload to hand to the local client.
	 */
	receiveDataFromPeer(data: FlowControlledData, cancellationToken?: CancellationToken): Promise<UserData>
}

/**
 * Relays user data without any RFCOMM-level flow control.
 */
export class SimpleController implements FlowController {
	constructor(
		private readonly role: Role,
		private readonly dlci: DLCI,
		private readonly outbound: QueueSender<Frame>,
	) {}

	public async sendDataToPeer(data: UserData, cancellationToken?: CancellationToken): Promise<void> {
		await this.outbound.send(Frame.makeUserDataFrame(this.role, this.dlci, data), cancellationToken)
	}

	public async receiveDataFromPeer(data: FlowControlledData): Promise<UserData> {
		if (data.credits !== undefined) {
			log.warn('DLCI %d: ignoring %d credits received without credit-based flow control', this.dlci, data.credits)
		}

		return data.userData
	}
}

/**
 * Relays user data under credit-based flow control.
 * @description Each data frame sent costs one local credit. Data written while no credits remain
 * is held, in order, until the peer grants more. Grants to the peer ride on outgoing data frames,
 * or on an empty frame when the peer runs low and nothing else is going out.
 */
export class CreditFlowController implements FlowController {
	private localCredits: number
	private remoteCredits: number
	private readonly outstanding: { readonly data: UserData; readonly sent: Deferred<void> }[] = []

	constructor(
		private readonly role: Role,
		private readonly dlci: DLCI,
		private readonly outbound: QueueSender<Frame>,
		initialCredits: Credits,
	) {
		this.localCredits = initialCredits.local
		this.remoteCredits = initialCredits.remote
	}

	/** Gets the current credit counts. */
	public get credits(): Credits {
		return { local: this.localCredits, remote: this.remoteCredits }
	}

	/** Gets the number of data chunks held for lack of credits. */
	public get outstandingFrames(): number {
		return this.outstanding.length
	}

	public async sendDataToPeer(data: UserData, cancellationToken: CancellationToken = CancellationToken.CONTINUE): Promise<void> {
		if (this.localCredits === 0 || this.outstanding.length > 0) {
			log.trace('DLCI %d: holding %d bytes until credits arrive', this.dlci, data.length)
			const sent = new Deferred<void>()
			this.outstanding.push({ data, sent })
			await cancellationToken.racePromise(sent.promise)
			return
		}

		await this.sendFrame(data, cancellationToken)
	}

	public async receiveDataFromPeer(data: FlowControlledData, cancellationToken?: CancellationToken): Promise<UserData> {
		if (data.credits !== undefined) {
			this.localCredits += data.credits
		}

		if (data.userData.length > 0) {
			if (this.remoteCredits === 0) {
				log.warn('DLCI %d: peer sent data without credits', this.dlci)
			}

			this.remoteCredits = Math.max(0, this.remoteCredits - 1)
		}

		let flushed = 0
		while (this.localCredits > 0 && this.outstanding.length > 0) {
			const next = this.outstanding.shift()
			if (next) {
				flushed++
				await this.sendFrame(next.data, cancellationToken)
				next.sent.resolve()
			}
		}

		if (flushed === 0 && this.remoteCredits < LOW_CREDIT_WATER_MARK) {
			const grant = this.takeReplenishment()
			log.trace('DLCI %d: granting %d credits', this.dlci, grant)
			await this.outbound.send(Frame.makeUserDataFrame(this.role, this.dlci, Buffer.alloc(0), grant), cancellationToken)
		}

		return data.userData
	}

	private async sendFrame(data: UserData, cancellationToken?: CancellationToken): Promise<void> {
		const grant = this.takeReplenishment()
		this.localCredits--
		await this.outbound.send(Frame.makeUserDataFrame(this.role, this.dlci, data, grant), cancellationToken)
	}

	/** Computes the credits to grant to the peer and counts them as granted. */
	private takeReplenishment(): number {
		const grant = Math.min(MAX_CREDITS, Math.max(0, HIGH_CREDIT_WATER_MARK - this.remoteCredits))
		this.remoteCredits += grant
		return grant
	}
}

/**
 * Creates the flow controller for a channel's flow control mode.
 */
export function createFlowController(mode: FlowControlMode, role: Role, dlci: DLCI, outbound: QueueSender<Frame>): FlowController {
	switch (mode.kind) {
		case 'none':
			return new SimpleController(role, dlci, outbound)
		case 'creditBased':
			return new CreditFlowController(role, dlci, outbound, mode.credits)
	}
}
