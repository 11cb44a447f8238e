import { PrivateKeyInfo } from '@peculiar/asn1-pkcs8'
import { id_rsaEncryption, RSAPrivateKey as RSAPrivateKeyAsn, RSAPublicKey as RSAPublicKeyAsn } from '@peculiar/asn1-rsa'
import { AsnParser } from '@peculiar/asn1-schema'
import { SubjectPublicKeyInfo } from '@peculiar/asn1-x509'
import { PemConverter } from '@peculiar/x509'
import { fromBER } from 'asn1js'
import type { KeyBlobOptions, RSAPrivateKey, RSAPublicKey } from '../types/index.ts'
import { DecodeError, InvalidKeyMaterialError, KeyTypeMismatchError, PemDecodeError } from './errors.ts'
import { bufToBigint, bufToUint8Array, uint8ArrayToStr } from './generics.ts'
import { logger as LOGGER } from './logger.ts'

/**
 * Parse an RSA public key from a PEM block,
 * see `parseRsaPublicKey` for the accepted encodings
 */
export function parseRsaPublicKeyPem(
	pem: string | Uint8Array,
	opts?: KeyBlobOptions
) {
	return parseRsaPublicKey(decodePem(pem, opts), opts)
}

/**
 * Parse an RSA private key from a PEM block,
 * see `parseRsaPrivateKey` for the accepted encodings
 */
export function parseRsaPrivateKeyPem(
	pem: string | Uint8Array,
	opts?: KeyBlobOptions
) {
	return parseRsaPrivateKey(decodePem(pem, opts), opts)
}

/**
 * Parse an RSA public key from DER.
 * Tries PKCS#1 RSAPublicKey first & then a SubjectPublicKeyInfo
 * wrapping an RSA key.
 */
export function parseRsaPublicKey(
	der: Uint8Array,
	{ logger = LOGGER }: KeyBlobOptions = {}
): RSAPublicKey {
	assertSingleDerElement(der, 'public key')

	let rsaKey: RSAPublicKeyAsn
	try {
		rsaKey = AsnParser.parse(der.slice(), RSAPublicKeyAsn)
		logger.trace('parsed PKCS#1 public key')
	} catch(pkcs1Err) {
		logger.debug({ err: pkcs1Err }, 'not a PKCS#1 public key, trying PKIX')

		let info: SubjectPublicKeyInfo
		try {
			info = AsnParser.parse(der.slice(), SubjectPublicKeyInfo)
		} catch(err) {
			throw new DecodeError(
				'data is neither a PKCS#1 nor a PKIX public key',
				{ cause: err }
			)
		}

		assertRsaAlgorithm(info.algorithm.algorithm)
		assertSingleDerElement(
			bufToUint8Array(info.subjectPublicKey),
			'PKIX public key contents'
		)
		try {
			rsaKey = AsnParser.parse(info.subjectPublicKey, RSAPublicKeyAsn)
		} catch(err) {
			throw new DecodeError('invalid RSA key in PKIX public key', { cause: err })
		}

		logger.trace('parsed PKIX public key')
	}

	return {
		n: readPositiveInteger(rsaKey.modulus, 'modulus'),
		e: readPositiveInteger(rsaKey.publicExponent, 'public exponent'),
	}
}

/**
 * Parse an RSA private key from DER.
 * Tries PKCS#1 RSAPrivateKey first & then a PKCS#8 PrivateKeyInfo
 * wrapping an RSA key.
 */
export function parseRsaPrivateKey(
	der: Uint8Array,
	{ logger = LOGGER }: KeyBlobOptions = {}
): RSAPrivateKey {
	assertSingleDerElement(der, 'private key')

	let rsaKey: RSAPrivateKeyAsn
	try {
		rsaKey = AsnParser.parse(der.slice(), RSAPrivateKeyAsn)
		logger.trace('parsed PKCS#1 private key')
	} catch(pkcs1Err) {
		logger.debug({ err: pkcs1Err }, 'not a PKCS#1 private key, trying PKCS#8')

		let info: PrivateKeyInfo
		try {
			info = AsnParser.parse(der.slice(), PrivateKeyInfo)
		} catch(err) {
			throw new DecodeError(
				'data is neither a PKCS#1 nor a PKCS#8 private key',
				{ cause: err }
			)
		}

		assertRsaAlgorithm(info.privateKeyAlgorithm.algorithm)
		assertSingleDerElement(
			bufToUint8Array(info.privateKey.buffer),
			'PKCS#8 private key contents'
		)
		try {
			rsaKey = AsnParser.parse(info.privateKey.buffer, RSAPrivateKeyAsn)
		} catch(err) {
			throw new DecodeError('invalid RSA key in PKCS#8 private key', { cause: err })
		}

		logger.trace('parsed PKCS#8 private key')
	}

	// 0 = two-prime, 1 = multi-prime
	if(rsaKey.version > 1) {
		throw new DecodeError(`unsupported PKCS#1 private key version ${rsaKey.version}`)
	}

	// the blob only has room for 2 primes
	if(rsaKey.otherPrimeInfos?.length) {
		throw new DecodeError('multi-prime RSA keys are not supported')
	}

	const key: RSAPrivateKey = {
		n: readPositiveInteger(rsaKey.modulus, 'modulus'),
		e: readPositiveInteger(rsaKey.publicExponent, 'public exponent'),
		d: readPositiveInteger(rsaKey.privateExponent, 'private exponent'),
		p: readPositiveInteger(rsaKey.prime1, 'prime P'),
		q: readPositiveInteger(rsaKey.prime2, 'prime Q'),
	}

	if(key.p * key.q !== key.n) {
		throw new InvalidKeyMaterialError('modulus is not the product of P & Q')
	}

	return key
}

/**
 * Public half of a private key
 */
export function toRsaPublicKey({ n, e }: RSAPublicKey): RSAPublicKey {
	return { n, e }
}

function decodePem(
	pem: string | Uint8Array,
	{ logger = LOGGER }: KeyBlobOptions = {}
) {
	const text = typeof pem === 'string' ? pem : uint8ArrayToStr(pem)
	let blocks: ArrayBuffer[]
	try {
		blocks = PemConverter.decode(text)
	} catch(err) {
		throw new PemDecodeError(undefined, { cause: err })
	}

	if(!blocks.length) {
		throw new PemDecodeError()
	}

	if(blocks.length > 1) {
		logger.warn(
			{ blocks: blocks.length },
			'PEM data has multiple blocks, only the first is read'
		)
	}

	return bufToUint8Array(blocks[0])
}

/**
 * AsnParser stops after the first element, so anything
 * trailing it has to be rejected here
 */
function assertSingleDerElement(der: Uint8Array, name: string) {
	const { offset } = fromBER(der.slice())
	if(offset === -1) {
		throw new DecodeError(`${name} is not valid DER`)
	}

	if(offset !== der.byteLength) {
		throw new DecodeError(
			`${name} has ${der.byteLength - offset} trailing bytes`
		)
	}
}

function assertRsaAlgorithm(oid: string) {
	if(oid !== id_rsaEncryption) {
		throw new KeyTypeMismatchError(`invalid key type, expected RSA got ${oid}`)
	}
}

/**
 * Read a DER INTEGER's contents, which is two's complement
 * big endian, & ensure it's > 0
 */
function readPositiveInteger(buf: ArrayBuffer, name: string) {
	const arr = bufToUint8Array(buf)
	if(!arr.length || arr[0] & 0x80) {
		throw new DecodeError(`${name} must be positive`)
	}

	const value = bufToBigint(arr)
	if(value === 0n) {
		throw new DecodeError(`${name} must be positive`)
	}

	return value
}
