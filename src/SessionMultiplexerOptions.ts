import { SessionObserver } from './SessionObserver'

export interface SessionMultiplexerOptions {
	/** Receives diagnostics about the session. */
	observer?: SessionObserver

	/**
	 * The number of data items received from the peer that may wait, per channel, to be written
	 * to the channel's local endpoint before `receiveUserData` waits.
	 * @default 1
	 */
	pendingWritesCapacity?: number
}
