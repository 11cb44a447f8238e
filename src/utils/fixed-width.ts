import { numberToBytesBE } from '@noble/curves/abstract/utils'
import { EncodingOverflowError } from './errors.ts'
import { bufToBigint } from './generics.ts'

/**
 * Minimum number of bytes required to hold the magnitude
 * of a non-negative integer. 0 takes 0 bytes.
 */
export function byteLength(value: bigint) {
	if(value === 0n) {
		return 0
	}

	return Math.ceil(value.toString(16).length / 2)
}

/**
 * Encodes the integer into exactly `width` bytes, little endian.
 * The big endian magnitude is zero-padded on the left & then reversed.
 *
 * @throws EncodingOverflowError if the value is negative or
 *  needs more than `width` bytes
 */
export function encodeFixedWidthLE(value: bigint, width: number) {
	if(value < 0n) {
		throw new EncodingOverflowError(
			`cannot encode negative integer into ${width} bytes`
		)
	}

	const length = byteLength(value)
	if(length > width) {
		throw new EncodingOverflowError(
			`integer of ${length} bytes does not fit in ${width} bytes`
		)
	}

	if(!width) {
		return new Uint8Array()
	}

	return numberToBytesBE(value, width).reverse()
}

/**
 * Reads back a little endian field written by `encodeFixedWidthLE`
 */
export function decodeFixedWidthLE(buff: Uint8Array) {
	return bufToBigint(buff.slice().reverse())
}
