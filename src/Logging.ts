import debug, { Debugger } from 'debug'

/** The namespace all loggers of this package live under. */
export const LOG_NAMESPACE = 'rfcomm'

/**
 * A set of level-specific loggers for one component.
 * @description Output is controlled by the `DEBUG` environment variable,
 * e.g. `DEBUG=rfcomm:*` or `DEBUG=rfcomm:*:warn,rfcomm:*:error`.
 */
export interface Logger {
	readonly trace: Debugger
	readonly info: Debugger
	readonly warn: Debugger
	readonly error: Debugger
}

export function createLogger(component: string): Logger {
	const base = debug(`${LOG_NAMESPACE}:${component}`)
	return {
		trace: base.extend('trace'),
		info: base.extend('info'),
		warn: base.extend('warn'),
		error: base.extend('error'),
	}
}
