import type { Logger } from './logger.ts'

export type KeyBlobOptions = {
	/**
	 * logger to write diagnostics to,
	 * defaults to a console logger
	 */
	logger?: Logger
}
