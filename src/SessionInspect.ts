import { Role } from './Role'
import { SessionChannel } from './SessionChannel'
import { SessionObserver } from './SessionObserver'
import { SessionParameters } from './SessionParameters'

/** The `flow_control` value of a session using credit-based flow control. */
export const CREDIT_FLOW_CONTROL = 'Credit-Based'

/** The `flow_control` value of a session without RFCOMM-level flow control. */
export const NO_FLOW_CONTROL = 'None'

/** A node of the inspect tree. */
export interface InspectNode {
	[property: string]: string | number | InspectNode
}

/**
 * Records the state of a session multiplexer as a tree of properties.
 * @description Each channel gets a child node, named `channel_<n>` in order of creation, that lives
 * until the multiplexer reports its removal.
 */
export class SessionInspect implements SessionObserver {
	private role: Role = Role.Unassigned
	private parameters?: SessionParameters
	private readonly channelNodes = new Map<SessionChannel, string>()
	private nextChannelIndex = 0

	public onRoleChanged(role: Role) {
		this.role = role
	}

	public onParametersChanged(parameters: SessionParameters) {
		this.parameters = parameters
	}

	public onChannelCreated(channel: SessionChannel) {
		this.channelNodes.set(channel, `channel_${this.nextChannelIndex++}`)
	}

	public onChannelRemoved(channel: SessionChannel) {
		this.channelNodes.delete(channel)
	}

	/**
	 * Gets the current tree.
	 */
	public snapshot(): InspectNode {
		const node: InspectNode = { role: this.role }
		if (this.parameters) {
			node.flow_control = this.parameters.creditBasedFlow ? CREDIT_FLOW_CONTROL : NO_FLOW_CONTROL
			node.max_frame_size = this.parameters.maxFrameSize
		}

		for (const [channel, name] of this.channelNodes) {
			node[name] = { dlci: channel.dlci }
		}

		return node
	}
}
