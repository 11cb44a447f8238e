/**
 * Converts a buffer to a hex string with whitespace between each byte
 * @returns eg. '01 02 03 04'
 */
export function toHexStringWithWhitespace(buff: Uint8Array, whitespace = ' ') {
	return [...buff]
		.map(x => x.toString(16).padStart(2, '0'))
		.join(whitespace)
}

export function concatenateUint8Arrays(arrays: Uint8Array[]) {
	const totalLength = arrays.reduce((acc, curr) => acc + curr.length, 0)
	const result = new Uint8Array(totalLength)
	let offset = 0
	for(const arr of arrays) {
		result.set(arr, offset)
		offset += arr.length
	}

	return result
}

export function uint8ArrayToDataView(arr: Uint8Array) {
	return new DataView(arr.buffer, arr.byteOffset, arr.byteLength)
}

export function uint8ArrayToStr(arr: Uint8Array) {
	return new TextDecoder().decode(arr)
}

export function bufToUint8Array(buf: ArrayBuffer | Uint8Array): Uint8Array {
	if(buf instanceof Uint8Array) {
		return buf
	}

	return new Uint8Array(buf)
}

const BITS = 8n

/**
 * Reads an unsigned big endian integer
 */
export function bufToBigint(buf: Uint8Array): bigint {
	let ret = 0n
	for(const i of buf.values()) {
		const bi = BigInt(i)
		ret = (ret << BITS) + bi
	}

	return ret
}
