import type { DLCI } from './DLCI'
import type { Role } from './Role'

/**
 * The kinds of failure reported by the session multiplexer.
 */
export enum RfcommErrorCode {
	/** Startup was requested on a multiplexer that is already running. */
	MultiplexerAlreadyStarted = 'MultiplexerAlreadyStarted',

	/** Startup was requested with a role that a started multiplexer cannot hold. */
	InvalidRole = 'InvalidRole',

	/** The DLCI is out of range or has no registered channel. */
	InvalidDLCI = 'InvalidDLCI',

	/** The channel is already established, so its establishment state is frozen. */
	ChannelAlreadyEstablished = 'ChannelAlreadyEstablished',

	/** The channel exists but has not been established yet. */
	ChannelNotEstablished = 'ChannelNotEstablished',
}

/**
 * An error raised by an RFCOMM session operation.
 * No state is mutated on the path that raises one of these.
 */
export class RfcommError extends Error {
	/**
	 * Initializes a new instance of the `RfcommError` class.
	 * @param code The kind of failure.
	 * @param dlci The DLCI the failing operation referred to, if any.
	 * @param role The role the failing operation was given, if any.
	 */
	constructor(
		public readonly code: RfcommErrorCode,
		public readonly dlci?: DLCI | number,
		public readonly role?: Role,
	) {
		super(RfcommError.describe(code, dlci, role))
		this.name = 'RfcommError'
	}

	public static multiplexerAlreadyStarted(): RfcommError {
		return new RfcommError(RfcommErrorCode.MultiplexerAlreadyStarted)
	}

	public static invalidRole(role: Role): RfcommError {
		return new RfcommError(RfcommErrorCode.InvalidRole, undefined, role)
	}

	public static invalidDlci(dlci: DLCI | number): RfcommError {
		return new RfcommError(RfcommErrorCode.InvalidDLCI, dlci)
	}

	public static channelAlreadyEstablished(dlci: DLCI): RfcommError {
		return new RfcommError(RfcommErrorCode.ChannelAlreadyEstablished, dlci)
	}

	public static channelNotEstablished(dlci: DLCI): RfcommError {
		return new RfcommError(RfcommErrorCode.ChannelNotEstablished, dlci)
	}

	/**
	 * Checks whether an error is one a profile layer should treat as a protocol race
	 * (a stale DLCI or a duplicate establishment) rather than a session failure.
	 */
	public static isProtocolRace(error: unknown): boolean {
		return error instanceof RfcommError
			&& (error.code === RfcommErrorCode.InvalidDLCI || error.code === RfcommErrorCode.ChannelAlreadyEstablished)
	}

	private static describe(code: RfcommErrorCode, dlci?: number, role?: Role): string {
		switch (code) {
			case RfcommErrorCode.MultiplexerAlreadyStarted:
				return 'Multiplexer already started.'
			case RfcommErrorCode.InvalidRole:
				return `Invalid role: ${role}.`
			case RfcommErrorCode.InvalidDLCI:
				return `Invalid DLCI: ${dlci}.`
			case RfcommErrorCode.ChannelAlreadyEstablished:
				return `Channel with DLCI ${dlci} is already established.`
			case RfcommErrorCode.ChannelNotEstablished:
				return `Channel with DLCI ${dlci} is not established.`
		}
	}
}
