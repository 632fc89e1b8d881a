import { RfcommError } from './RfcommError'

/**
 * A Data Link Connection Identifier: the address of one logical channel in an RFCOMM session.
 * @description Values are plain numbers at run time so they work as `Map` keys; the brand keeps
 * unchecked numbers from being passed where a validated DLCI is expected.
 */
export type DLCI = number & { readonly __brand: 'DLCI' }

// tslint:disable-next-line: no-namespace
export namespace DLCI {
	/** The DLCI of the multiplexer control channel. */
	export const MUX_CONTROL_DLCI = 0

	/** The smallest DLCI that may carry user data. */
	export const MIN_USER_DLCI = 2

	/** The largest valid DLCI. */
	export const MAX_DLCI = 61

	function isDlci(value: number): value is DLCI {
		return Number.isInteger(value) && value >= MUX_CONTROL_DLCI && value <= MAX_DLCI
	}

	/**
	 * Validates a number as a DLCI.
	 * @throws RfcommError with code `InvalidDLCI` when `value` is outside the valid range.
	 */
	export function tryFrom(value: number): DLCI {
		if (!isDlci(value)) {
			throw RfcommError.invalidDlci(value)
		}

		return value
	}

	/** Returns true if the DLCI addresses the multiplexer control channel. */
	export function isMuxControl(dlci: DLCI): boolean {
		return dlci === MUX_CONTROL_DLCI
	}

	/** Returns true if the DLCI may be used for a user data channel. */
	export function isUserDlci(dlci: DLCI): boolean {
		return dlci >= MIN_USER_DLCI
	}

	/** Gets the RFCOMM server channel number the DLCI belongs to. */
	export function serverChannel(dlci: DLCI): number {
		return dlci >> 1
	}
}
