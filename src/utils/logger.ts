import type { Logger } from '../types/index.ts'

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error'] as const

type LogLevel = typeof LOG_LEVELS[number]

const CONSOLE_METHOD_MAP = {
	trace: 'debug',
	debug: 'debug',
	info: 'info',
	warn: 'warn',
	error: 'error',
} as const

const DEFAULT_LOG_LEVEL: LogLevel = 'warn'

/**
 * Console backed logger that drops entries below `level`.
 * Takes pino's level names, 'silent' turns logging off
 */
export function makeConsoleLogger(level: string = DEFAULT_LOG_LEVEL): Logger {
	const minIndex = level === 'silent'
		? LOG_LEVELS.length
		: getLevelIndex(level)

	const makeLogFn = (lvl: LogLevel) => {
		if(getLevelIndex(lvl) < minIndex) {
			return () => {}
		}

		const method = CONSOLE_METHOD_MAP[lvl]
		return (obj: unknown, msg?: string) => {
			if(msg === undefined) {
				console[method](obj)
				return
			}

			console[method](msg, obj)
		}
	}

	return {
		trace: makeLogFn('trace'),
		debug: makeLogFn('debug'),
		info: makeLogFn('info'),
		warn: makeLogFn('warn'),
		error: makeLogFn('error'),
	}
}

function getLevelIndex(level: string) {
	const index = LOG_LEVELS.findIndex(l => l === level)
	return index === -1
		? LOG_LEVELS.indexOf(DEFAULT_LOG_LEVEL)
		: index
}

export const logger = makeConsoleLogger(process.env.LOG_LEVEL)
