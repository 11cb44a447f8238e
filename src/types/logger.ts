type LogFn = (obj: unknown, msg?: string) => void

/**
 * Minimal logger interface, a pino logger satisfies it
 */
export type Logger = {
	trace: LogFn
	debug: LogFn
	info: LogFn
	warn: LogFn
	error: LogFn
}
