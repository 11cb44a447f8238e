import assert from 'node:assert'
import { afterEach, describe, it, mock } from 'node:test'
import { makeConsoleLogger } from '../utils/index.ts'

describe('Console Logger', () => {

	afterEach(() => {
		mock.restoreAll()
	})

	it('should drop entries below the level', () => {
		const debug = mock.method(console, 'debug', () => {})
		const warn = mock.method(console, 'warn', () => {})

		const logger = makeConsoleLogger('info')
		logger.debug({ step: 1 }, 'not logged')
		logger.warn({ step: 2 }, 'logged')

		assert.equal(debug.mock.calls.length, 0)
		assert.equal(warn.mock.calls.length, 1)
		assert.deepEqual(warn.mock.calls[0].arguments, ['logged', { step: 2 }])
	})

	it('should write trace entries to console.debug', () => {
		const debug = mock.method(console, 'debug', () => {})

		makeConsoleLogger('trace').trace('parsed key')

		assert.equal(debug.mock.calls.length, 1)
		assert.deepEqual(debug.mock.calls[0].arguments, ['parsed key'])
	})

	it('should log nothing when silent', () => {
		const error = mock.method(console, 'error', () => {})

		makeConsoleLogger('silent').error(new Error('test'), 'failed')

		assert.equal(error.mock.calls.length, 0)
	})

	it('should fall back to warn on unknown levels', () => {
		const info = mock.method(console, 'info', () => {})
		const warn = mock.method(console, 'warn', () => {})

		const logger = makeConsoleLogger('verbose')
		logger.info('not logged')
		logger.warn('logged')

		assert.equal(info.mock.calls.length, 0)
		assert.equal(warn.mock.calls.length, 1)
	})
})
