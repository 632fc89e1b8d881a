/**
 * The session-wide parameters of an RFCOMM multiplexer.
 */
export interface SessionParameters {
	/** Whether credit-based flow control is used for this session. */
	readonly creditBasedFlow: boolean

	/** The maximum size of an RFCOMM frame's information field. */
	readonly maxFrameSize: number
}

// tslint:disable-next-line: no-namespace
export namespace SessionParameters {
	/**
	 * Gets the parameters this side proposes before any negotiation.
	 * @param maxFrameSize The largest frame the transport can carry.
	 */
	export function defaultPreferred(maxFrameSize: number): SessionParameters {
		// Credit-based flow control is preferred.
		return { creditBasedFlow: true, maxFrameSize }
	}

	/**
	 * Combines the current parameters with the requested ones.
	 * @description The requested flow control mode is accepted as is, and the smaller frame size wins.
	 */
	export function negotiate(current: SessionParameters, requested: SessionParameters): SessionParameters {
		return {
			creditBasedFlow: requested.creditBasedFlow,
			maxFrameSize: Math.min(current.maxFrameSize, requested.maxFrameSize),
		}
	}

	export function equals(a: SessionParameters, b: SessionParameters): boolean {
		return a.creditBasedFlow === b.creditBasedFlow && a.maxFrameSize === b.maxFrameSize
	}

	export function toString(parameters: SessionParameters): string {
		return `{ creditBasedFlow: ${parameters.creditBasedFlow}, maxFrameSize: ${parameters.maxFrameSize} }`
	}
}

/**
 * Where the session parameters stand in negotiation.
 */
export type ParameterNegotiationState =
	/** Not negotiated yet; holds the preferred parameters. */
	| { readonly kind: 'notNegotiated'; readonly parameters: SessionParameters }
	/** Negotiated at least once; holds the active parameters. */
	| { readonly kind: 'negotiated'; readonly parameters: SessionParameters }

// tslint:disable-next-line: no-namespace
export namespace ParameterNegotiationState {
	export function notNegotiated(parameters: SessionParameters): ParameterNegotiationState {
		return { kind: 'notNegotiated', parameters }
	}

	export function negotiated(parameters: SessionParameters): ParameterNegotiationState {
		return { kind: 'negotiated', parameters }
	}

	/** Gets the held parameters, whether or not they have been negotiated. */
	export function parameters(state: ParameterNegotiationState): SessionParameters {
		switch (state.kind) {
			case 'notNegotiated':
			case 'negotiated':
				return state.parameters
		}
	}

	/**
	 * Negotiates `requested` against the held parameters.
	 * @returns The negotiated state. The caller decides whether negotiation is still allowed.
	 */
	export function negotiate(state: ParameterNegotiationState, requested: SessionParameters): ParameterNegotiationState {
		return negotiated(SessionParameters.negotiate(parameters(state), requested))
	}
}
