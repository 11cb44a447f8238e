import type { RSA_KEY_USAGE_MAP } from '../utils/constants.ts'

export type RSAPublicKey = {
	/** modulus */
	n: bigint
	/** public exponent, must fit in 32 bits to be exported */
	e: bigint
}

export type RSAPrivateKey = RSAPublicKey & {
	/** private exponent */
	d: bigint
	p: bigint
	q: bigint
}

/**
 * CRT parameters of a private key, computed from D, P & Q
 * as they're needed by the PRIVATEKEYBLOB layout
 */
export type RSACRTParams = {
	/** D mod (P - 1) */
	dp: bigint
	/** D mod (Q - 1) */
	dq: bigint
	/** Q^-1 mod P */
	qInv: bigint
}

export type RSAKeyUsage = keyof typeof RSA_KEY_USAGE_MAP
