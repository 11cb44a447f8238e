// CryptoAPI key blob constants, see:
// https://learn.microsoft.com/en-us/windows/win32/seccrypto/rsa-schannel-key-blobs

export const CUR_BLOB_VERSION = 0x02

export const BLOB_TYPE_MAP = {
	PUBLICKEYBLOB: 0x06,
	PRIVATEKEYBLOB: 0x07,
}

export const RSA_MAGIC_MAP = {
	// "RSA1"
	PUBLIC: 0x31415352,
	// "RSA2"
	PRIVATE: 0x32415352,
}

/**
 * ALG_ID of the key, selected by what the key is used for
 */
export const RSA_KEY_USAGE_MAP = {
	// CALG_RSA_SIGN
	SIGN: 0x00002400,
	// CALG_RSA_KEYX
	KEYX: 0x0000A400,
}

export const RSA_KEY_USAGES = Object.keys(RSA_KEY_USAGE_MAP) as (keyof typeof RSA_KEY_USAGE_MAP)[]

// BLOBHEADER + RSAPUBKEY
export const BLOB_HEADER_BYTE_LENGTH = 8
export const RSA_PUB_KEY_BYTE_LENGTH = 12
