export class KeyBlobError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options)
		this.name = 'KeyBlobError'
	}
}

/** the input did not contain a PEM block */
export class PemDecodeError extends KeyBlobError {
	constructor(message = 'failed to decode PEM data', options?: ErrorOptions) {
		super(message, options)
		this.name = 'PemDecodeError'
	}
}

/** none of the supported DER forms matched the input */
export class DecodeError extends KeyBlobError {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options)
		this.name = 'DecodeError'
	}
}

/** a wrapped key decoded fine, but is not an RSA key */
export class KeyTypeMismatchError extends KeyBlobError {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options)
		this.name = 'KeyTypeMismatchError'
	}
}

export class InvalidUsageError extends KeyBlobError {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options)
		this.name = 'InvalidUsageError'
	}
}

/** an integer does not fit the fixed width field it's written to */
export class EncodingOverflowError extends KeyBlobError {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options)
		this.name = 'EncodingOverflowError'
	}
}

export class InvalidKeyMaterialError extends KeyBlobError {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options)
		this.name = 'InvalidKeyMaterialError'
	}
}
