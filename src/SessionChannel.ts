import { Duplex } from 'stream'
import { DLCI } from './DLCI'
import { createFlowController, FlowControlMode } from './FlowControl'
import { FlowControlledData, Frame } from './Frame'
import { QueueSender } from './FrameQueue'
import { createLogger } from './Logging'
import { RfcommError } from './RfcommError'
import { Role } from './Role'
import { UserDataRelay } from './UserDataRelay'

const log = createLogger('channel')

type ChannelState =
	| { readonly kind: 'unestablished' }
	| { readonly kind: 'established'; readonly endpoint: Duplex; readonly relay: UserDataRelay }

/**
 * One DLC of an RFCOMM session.
 * @description A channel starts unestablished, when only its flow control may be configured.
 * Establishing it hands it the local end of a stream pair and starts relaying user data
 * between that endpoint and the peer.
 */
export class SessionChannel {
	/** The default number of received data items that may wait to be written to the endpoint. */
	static readonly defaultPendingWritesCapacity = 1

	private state: ChannelState = { kind: 'unestablished' }
	private _flowControl?: FlowControlMode

	/**
	 * Initializes a new instance of the `SessionChannel` class.
	 * @param dlci The DLCI this channel is addressed by.
	 * @param role The role of the multiplexer when the channel was created.
	 * @param pendingWritesCapacity See `SessionMultiplexerOptions.pendingWritesCapacity`.
	 */
	constructor(
		public readonly dlci: DLCI,
		public readonly role: Role,
		private readonly pendingWritesCapacity: number = SessionChannel.defaultPendingWritesCapacity,
	) {}

	public isEstablished(): boolean {
		return this.state.kind === 'established'
	}

	/**
	 * Returns true if this channel's flow control has been set.
	 */
	public parametersNegotiated(): boolean {
		return this._flowControl !== undefined
	}

	public get flowControl(): FlowControlMode | undefined {
		return this._flowControl
	}

	/**
	 * Gets the local endpoint, once the channel is established.
	 */
	public get localEndpoint(): Duplex | undefined {
		return this.state.kind === 'established' ? this.state.endpoint : undefined
	}

	/**
	 * Gets a promise that settles once the forwarding task has stopped.
	 * Already resolved for a channel that was never established.
	 */
	public get completion(): Promise<void> {
		return this.state.kind === 'established' ? this.state.relay.completion : Promise.resolve()
	}

	/**
	 * Sets the flow control mode used once the channel is established.
	 * @throws RfcommError with code `ChannelAlreadyEstablished` if the channel is established.
	 */
	public setFlowControl(mode: FlowControlMode) {
		if (this.isEstablished()) {
			throw RfcommError.channelAlreadyEstablished(this.dlci)
		}

		this._flowControl = mode
	}

	/**
	 * Establishes the channel and starts its forwarding task.
	 * @param localEndpoint The endpoint this channel reads from and writes to.
	 * @param maxTxSize The largest payload of a single outbound frame.
	 * @param outbound Receives the frames for the peer.
	 * @description The caller guarantees the channel is not established yet.
	 */
	public establish(localEndpoint: Duplex, maxTxSize: number, outbound: QueueSender<Frame>) {
		if (this.state.kind === 'established') {
			throw new Error(`Channel with DLCI ${this.dlci} was established twice.`)
		}

		// Without a parameter negotiation for this DLC, no credits were exchanged.
		const mode = this._flowControl ?? FlowControlMode.None
		this._flowControl = mode
		const controller = createFlowController(mode, this.role, this.dlci, outbound)
		const relay = new UserDataRelay(this.dlci, localEndpoint, maxTxSize, controller, this.pendingWritesCapacity)
		this.state = { kind: 'established', endpoint: localEndpoint, relay }
		log.info('DLCI %d: established with flow control %s', this.dlci, FlowControlMode.toString(mode))
	}

	/**
	 * Delivers data received from the peer to the local client.
	 * @throws RfcommError with code `ChannelNotEstablished` if the channel is not established,
	 * or its forwarding task has stopped (the channel was closed or the client ended its stream).
	 */
	public async receiveUserData(data: FlowControlledData): Promise<void> {
		if (this.state.kind !== 'established' || this.state.relay.isCancelled) {
			throw RfcommError.channelNotEstablished(this.dlci)
		}

		const relay = this.state.relay
		try {
			await relay.deliver(data)
		} catch (err) {
			if (relay.isCancelled) {
				throw RfcommError.channelNotEstablished(this.dlci)
			}

			throw err
		}
	}

	/**
	 * Stops the forwarding task, if any.
	 * @returns The channel's `completion`.
	 */
	public close(): Promise<void> {
		if (this.state.kind === 'established') {
			this.state.relay.cancel('channel closed')
		}

		return this.completion
	}
}
