import { Role } from './Role'
import { SessionChannel } from './SessionChannel'
import { SessionParameters } from './SessionParameters'

/**
 * Receives diagnostics from a session multiplexer.
 * @description Every member is optional and none of them can change how the multiplexer behaves.
 */
export interface SessionObserver {
	onRoleChanged?(role: Role): void

	onParametersChanged?(parameters: SessionParameters): void

	/** A channel was added to the registry. */
	onChannelCreated?(channel: SessionChannel): void

	/** A channel was removed from the registry and its forwarding task, if any, has stopped. */
	onChannelRemoved?(channel: SessionChannel): void
}
