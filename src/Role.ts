/**
 * The role a multiplexer plays in an RFCOMM session.
 * @description The role is decided by the multiplexer startup exchange and is fixed once the
 * multiplexer has started.
 */
export enum Role {
	/** No startup exchange has happened yet. */
	Unassigned = 'Unassigned',

	/** A startup exchange is in flight; the role is not yet known. */
	Negotiating = 'Negotiating',

	/** This device sent the startup command that was accepted. */
	Initiator = 'Initiator',

	/** This device accepted the peer's startup command. */
	Responder = 'Responder',
}

// tslint:disable-next-line: no-namespace
export namespace Role {
	/** Returns true if `role` is one a started multiplexer can hold. */
	export function isMultiplexerStarted(role: Role): boolean {
		switch (role) {
			case Role.Initiator:
			case Role.Responder:
				return true
			case Role.Unassigned:
			case Role.Negotiating:
				return false
		}
	}

	/** Gets the role the peer plays when this side plays `role`. */
	export function opposite(role: Role): Role {
		switch (role) {
			case Role.Initiator:
				return Role.Responder
			case Role.Responder:
				return Role.Initiator
			case Role.Unassigned:
			case Role.Negotiating:
				return role
		}
	}
}
