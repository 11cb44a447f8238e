import type { KeyBlobOptions, RSAKeyUsage, RSAPrivateKey, RSAPublicKey } from '../types/index.ts'
import { BLOB_HEADER_BYTE_LENGTH, BLOB_TYPE_MAP, CUR_BLOB_VERSION, RSA_KEY_USAGE_MAP, RSA_MAGIC_MAP, RSA_PUB_KEY_BYTE_LENGTH } from './constants.ts'
import { deriveCrtParams } from './crt.ts'
import { EncodingOverflowError, InvalidKeyMaterialError, InvalidUsageError } from './errors.ts'
import { byteLength, encodeFixedWidthLE } from './fixed-width.ts'
import { concatenateUint8Arrays, toHexStringWithWhitespace, uint8ArrayToDataView } from './generics.ts'
import { logger as LOGGER } from './logger.ts'

const MAX_UINT32 = 0xFFFFFFFFn

/**
 * Export an RSA public key as a PUBLICKEYBLOB
 * @param usage what the key is used for, picks the ALG_ID of the blob
 */
export function exportRsaPublicKeyBlob(
	key: RSAPublicKey,
	usage: RSAKeyUsage,
	{ logger = LOGGER }: KeyBlobOptions = {}
) {
	const algId = getAlgId(usage)
	const keyLength = getKeyByteLength(key)

	const blob = concatenateUint8Arrays([
		packBlobHeader(BLOB_TYPE_MAP.PUBLICKEYBLOB, algId),
		packRsaPubKey(RSA_MAGIC_MAP.PUBLIC, keyLength, key.e),
		encodeFixedWidthLE(key.n, keyLength),
	])

	logger.debug({ usage, bits: keyLength * 8 }, 'exported public key blob')
	logger.trace({ blob: toHexStringWithWhitespace(blob) }, 'public key blob')

	return blob
}

/**
 * Export an RSA private key as a PRIVATEKEYBLOB.
 * The CRT parameters are computed from D, P & Q.
 * @param usage what the key is used for, picks the ALG_ID of the blob
 */
export function exportRsaPrivateKeyBlob(
	key: RSAPrivateKey,
	usage: RSAKeyUsage,
	{ logger = LOGGER }: KeyBlobOptions = {}
) {
	const algId = getAlgId(usage)
	const keyLength = getKeyByteLength(key)
	// P, Q & the CRT params each take half the modulus
	if(keyLength % 2 !== 0) {
		throw new EncodingOverflowError(
			`modulus of ${keyLength} bytes cannot be split between P & Q`
		)
	}

	const halfLength = keyLength / 2
	const { dp, dq, qInv } = deriveCrtParams(key)

	const blob = concatenateUint8Arrays([
		packBlobHeader(BLOB_TYPE_MAP.PRIVATEKEYBLOB, algId),
		packRsaPubKey(RSA_MAGIC_MAP.PRIVATE, keyLength, key.e),
		encodeFixedWidthLE(key.n, keyLength),
		encodeFixedWidthLE(key.p, halfLength),
		encodeFixedWidthLE(key.q, halfLength),
		encodeFixedWidthLE(dp, halfLength),
		encodeFixedWidthLE(dq, halfLength),
		encodeFixedWidthLE(qInv, halfLength),
		encodeFixedWidthLE(key.d, keyLength),
	])

	logger.debug({ usage, bits: keyLength * 8 }, 'exported private key blob')

	return blob
}

export function getAlgId(usage: RSAKeyUsage) {
	if(!Object.hasOwn(RSA_KEY_USAGE_MAP, usage)) {
		throw new InvalidUsageError(`invalid rsa key usage: ${usage}`)
	}

	return RSA_KEY_USAGE_MAP[usage]
}

/**
 * BLOBHEADER: type, version, 2 reserved bytes & the ALG_ID
 */
function packBlobHeader(type: number, algId: number) {
	// reserved bytes 2-3 stay zero
	const header = new Uint8Array(BLOB_HEADER_BYTE_LENGTH)
	header[0] = type
	header[1] = CUR_BLOB_VERSION
	uint8ArrayToDataView(header).setUint32(4, algId, true)
	return header
}

/**
 * RSAPUBKEY: magic, bit length & public exponent
 */
function packRsaPubKey(magic: number, keyLength: number, e: bigint) {
	if(e > MAX_UINT32) {
		throw new EncodingOverflowError('public exponent does not fit in 32 bits')
	}

	const pubKey = new Uint8Array(RSA_PUB_KEY_BYTE_LENGTH)
	const view = uint8ArrayToDataView(pubKey)
	view.setUint32(0, magic, true)
	view.setUint32(4, keyLength * 8, true)
	view.setUint32(8, Number(e), true)
	return pubKey
}

function getKeyByteLength({ n, e }: RSAPublicKey) {
	if(n <= 0n) {
		throw new InvalidKeyMaterialError('modulus must be positive')
	}

	if(e <= 0n) {
		throw new InvalidKeyMaterialError('public exponent must be positive')
	}

	return byteLength(n)
}
