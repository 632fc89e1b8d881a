import caught = require('caught')
import { Duplex } from 'stream'
import { DLCI } from './DLCI'
import { FlowControlMode } from './FlowControl'
import { FlowControlledData, Frame } from './Frame'
import { QueueSender } from './FrameQueue'
import { FullDuplexStream } from './FullDuplexStream'
import { createLogger } from './Logging'
import { RfcommError } from './RfcommError'
import { Role } from './Role'
import { SessionChannel } from './SessionChannel'
import { SessionMultiplexerOptions } from './SessionMultiplexerOptions'
import { SessionObserver } from './SessionObserver'
import { ParameterNegotiationState, SessionParameters } from './SessionParameters'
import { requireInteger } from './Utilities'

const log = createLogger('multiplexer')

/**
 * Manages the channels of an RFCOMM session over the range of user DLCIs.
 * @description The multiplexer is "started" once its role is assigned. The session parameters
 * must be negotiated before the first DLC is established; renegotiation afterwards is optional in
 * RFCOMM, so a late request is answered with the current parameters rather than rejected.
 *
 * All calls are expected from a single session driver. The only work that runs on its own is
 * each established channel's forwarding task.
 */
export class SessionMultiplexer {
	private _role: Role = Role.Unassigned
	private parameterState: ParameterNegotiationState
	private readonly channels = new Map<DLCI, SessionChannel>()
	private readonly observer: SessionObserver

	/**
	 * Initializes a new instance of the `SessionMultiplexer` class.
	 * @param maxRfcommPacketSize The largest RFCOMM packet the underlying transport can carry.
	 * @param options Options to customize the behavior of the multiplexer.
	 */
	protected constructor(public readonly maxRfcommPacketSize: number, private readonly options: SessionMultiplexerOptions) {
		requireInteger('maxRfcommPacketSize', maxRfcommPacketSize, 2, 'unsigned')
		this.observer = options.observer ?? {}
		this.parameterState = ParameterNegotiationState.notNegotiated(SessionParameters.defaultPreferred(maxRfcommPacketSize))
	}

	public static create(maxRfcommPacketSize: number, options?: SessionMultiplexerOptions): SessionMultiplexer {
		return new SessionMultiplexer(maxRfcommPacketSize, options ?? {})
	}

	/**
	 * Returns the multiplexer to its initial state, closing every channel.
	 */
	public reset() {
		for (const dlci of [...this.channels.keys()]) {
			this.closeSessionChannel(dlci)
		}

		this.parameterState = ParameterNegotiationState.notNegotiated(SessionParameters.defaultPreferred(this.maxRfcommPacketSize))
		this.setRole(Role.Unassigned)
	}

	public get role(): Role {
		return this._role
	}

	public setRole(role: Role) {
		this._role = role
		this.observer.onRoleChanged?.(role)
	}

	/**
	 * Gets a value indicating whether the multiplexer has started.
	 */
	public get started(): boolean {
		return Role.isMultiplexerStarted(this._role)
	}

	/**
	 * Starts the multiplexer in the given role.
	 * @throws RfcommError with code `MultiplexerAlreadyStarted` if already started,
	 * or `InvalidRole` if `role` is not one a started multiplexer can hold.
	 */
	public start(role: Role) {
		// Restarting would invalidate every open channel.
		if (this.started) {
			throw RfcommError.multiplexerAlreadyStarted()
		}

		if (!Role.isMultiplexerStarted(role)) {
			throw RfcommError.invalidRole(role)
		}

		this.setRole(role)
		log.info('RFCOMM session multiplexer started as %s', role)
	}

	public get parameterNegotiationState(): ParameterNegotiationState {
		return this.parameterState
	}

	public get parametersNegotiated(): boolean {
		return this.parameterState.kind === 'negotiated'
	}

	/**
	 * Gets the session parameters, whether or not they have been negotiated.
	 */
	public get parameters(): SessionParameters {
		return ParameterNegotiationState.parameters(this.parameterState)
	}

	public get creditBasedFlow(): boolean {
		return this.parameters.creditBasedFlow
	}

	/**
	 * Negotiates the session parameters.
	 * @returns The parameters in effect afterwards. Once a DLC is established these are the
	 * current parameters, unchanged.
	 */
	public negotiateParameters(requested: SessionParameters): SessionParameters {
		if (this.dlcEstablished()) {
			log.warn('Received negotiation request %s when at least one DLC has already been established', SessionParameters.toString(requested))
			return this.parameters
		}

		this.parameterState = ParameterNegotiationState.negotiate(this.parameterState, requested)
		const updated = this.parameters
		log.trace('Updated session parameters: %s', SessionParameters.toString(updated))
		this.observer.onParametersChanged?.(updated)
		return updated
	}

	/**
	 * Returns true if a channel for `dlci` exists and is established.
	 */
	public dlciEstablished(dlci: DLCI): boolean {
		return this.channels.get(dlci)?.isEstablished() ?? false
	}

	/**
	 * Returns true if at least one DLC is established.
	 */
	public dlcEstablished(): boolean {
		for (const channel of this.channels.values()) {
			if (channel.isEstablished()) {
				return true
			}
		}

		return false
	}

	public getSessionChannel(dlci: DLCI): SessionChannel | undefined {
		return this.channels.get(dlci)
	}

	/**
	 * Gets the channel for `dlci`, creating an unestablished one if there is none.
	 */
	public findOrCreateSessionChannel(dlci: DLCI): SessionChannel {
		let channel = this.channels.get(dlci)
		if (!channel) {
			channel = new SessionChannel(dlci, this._role, this.options.pendingWritesCapacity)
			this.channels.set(dlci, channel)
			this.observer.onChannelCreated?.(channel)
		}

		return channel
	}

	/**
	 * Returns true if the flow control of the channel for `dlci` has been set.
	 */
	public dlcParametersNegotiated(dlci: DLCI): boolean {
		return this.channels.get(dlci)?.parametersNegotiated() ?? false
	}

	/**
	 * Sets the flow control mode of the channel for `dlci`.
	 * @throws RfcommError with code `InvalidDLCI` if there is no such channel,
	 * or `ChannelAlreadyEstablished` if it is established.
	 */
	public setFlowControl(dlci: DLCI, mode: FlowControlMode) {
		const channel = this.channels.get(dlci)
		if (!channel) {
			throw RfcommError.invalidDlci(dlci)
		}

		channel.setFlowControl(mode)
	}

	/**
	 * Establishes the channel for `dlci`.
	 * @param outbound Receives the frames the channel sends to the peer.
	 * @returns The endpoint for the profile that uses the channel.
	 * @throws RfcommError with code `ChannelAlreadyEstablished` if the channel is established.
	 */
	public establishSessionChannel(dlci: DLCI, outbound: QueueSender<Frame>): Duplex {
		// A session that skipped parameter negotiation uses our preferred parameters.
		if (!this.parametersNegotiated) {
			this.negotiateParameters(this.parameters)
		}

		const maxTxSize = this.parameters.maxFrameSize
		const channel = this.findOrCreateSessionChannel(dlci)
		if (channel.isEstablished()) {
			throw RfcommError.channelAlreadyEstablished(dlci)
		}

		// The local end stays with the channel; the remote end goes to the profile.
		const { first: local, second: remote } = FullDuplexStream.CreatePair(maxTxSize)
		channel.establish(local, maxTxSize, outbound)
		return remote
	}

	/**
	 * Removes the channel for `dlci` and requests that its forwarding task stop.
	 * @returns `true` if there was a channel to close.
	 * @description The forwarding task may still be stopping when this returns; the observer hears of
	 * the removal once it has.
	 */
	public closeSessionChannel(dlci: DLCI): boolean {
		const channel = this.channels.get(dlci)
		if (!channel) {
			return false
		}

		this.channels.delete(dlci)
		caught(channel.close().finally(() => this.observer.onChannelRemoved?.(channel)))
		return true
	}

	/**
	 * Forwards user data received from the peer to the channel for `dlci`.
	 * @throws RfcommError with code `InvalidDLCI` if there is no such channel.
	 */
	public async receiveUserData(dlci: DLCI, data: FlowControlledData): Promise<void> {
		const channel = this.channels.get(dlci)
		if (!channel) {
			throw RfcommError.invalidDlci(dlci)
		}

		await channel.receiveUserData(data)
	}
}
