import assert from 'node:assert'
import { generateKeyPairSync, type KeyObject } from 'node:crypto'
import { pino } from 'pino'
import type { Logger } from '../types/index.ts'
import { bufToBigint } from '../utils/index.ts'

export function expectBuffsEq(a: Uint8Array, b: Uint8Array) {
	assert.deepEqual(Array.from(a), Array.from(b))
}

/**
 * converts a space separated hex string to a buffer
 * @param txt eg. '01 02 03 04'
 */
export function bufferFromHexStringWithWhitespace(txt: string) {
	return Buffer.from(txt.replace(/\s/g, ''), 'hex')
}

export function wrapInPem(der: Uint8Array, label: string) {
	const b64 = Buffer.from(der).toString('base64')
	const lines = b64.match(/.{1,64}/g) || []
	return `-----BEGIN ${label}-----\n${lines.join('\n')}\n-----END ${label}-----\n`
}

/**
 * Reads an unsigned integer from a base64url JWK field
 */
export function jwkBigint(value: string | undefined) {
	assert.ok(value, 'missing JWK field')
	return bufToBigint(Buffer.from(value, 'base64url'))
}

export function generateRsaKeyPair(modulusLength = 2048) {
	const { publicKey, privateKey } = generateKeyPairSync('rsa', { modulusLength })
	return { publicKey, privateKey, jwk: privateKey.export({ format: 'jwk' }) }
}

export function exportDer(key: KeyObject, type: 'pkcs1' | 'spki' | 'pkcs8') {
	return new Uint8Array(key.export({ format: 'der', type }))
}

// toy key: P = 61, Q = 53, N = 3233, E = 17, D = 2753
export const TOY_KEY = {
	n: 3233n,
	e: 17n,
	d: 2753n,
	p: 61n,
	q: 53n,
}

// RSAPublicKey { 3233, 17 }
export const TOY_PKCS1_PUBLIC_DER = bufferFromHexStringWithWhitespace(
	'30 07 02 02 0c a1 02 01 11'
)

// SubjectPublicKeyInfo { rsaEncryption, NULL, BIT STRING(RSAPublicKey) }
export const TOY_PKIX_PUBLIC_DER = bufferFromHexStringWithWhitespace(
	'30 1b 30 0d 06 09 2a 86 48 86 f7 0d 01 01 01 05 00'
	+ ' 03 0a 00 30 07 02 02 0c a1 02 01 11'
)

// RSAPrivateKey { 0, n, e, d, p, q, dp, dq, qInv }
export const TOY_PKCS1_PRIVATE_DER = bufferFromHexStringWithWhitespace(
	'30 1d 02 01 00 02 02 0c a1 02 01 11 02 02 0a c1'
	+ ' 02 01 3d 02 01 35 02 01 35 02 01 31 02 01 26'
)

// PrivateKeyInfo { 0, rsaEncryption, OCTET STRING(RSAPrivateKey) }
export const TOY_PKCS8_PRIVATE_DER = bufferFromHexStringWithWhitespace(
	'30 33 02 01 00 30 0d 06 09 2a 86 48 86 f7 0d 01 01 01 05 00'
	+ ' 04 1f 30 1d 02 01 00 02 02 0c a1 02 01 11 02 02 0a c1'
	+ ' 02 01 3d 02 01 35 02 01 35 02 01 31 02 01 26'
)

type LogEntry = {
	level: keyof Logger
	obj: unknown
	msg?: string
}

/**
 * Logger that keeps every entry it's given
 */
export function makeRecordingLogger() {
	const entries: LogEntry[] = []
	const makeLogFn = (level: keyof Logger) => (
		(obj: unknown, msg?: string) => {
			entries.push({ level, obj, msg })
		}
	)
	const logger: Logger = {
		trace: makeLogFn('trace'),
		debug: makeLogFn('debug'),
		info: makeLogFn('info'),
		warn: makeLogFn('warn'),
		error: makeLogFn('error'),
	}

	return { logger, entries }
}

export const logger = pino({})
logger.level = process.env.LOG_LEVEL || 'info'
