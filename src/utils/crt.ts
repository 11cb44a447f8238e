import { invert, mod } from '@noble/curves/abstract/modular'
import type { RSACRTParams, RSAPrivateKey } from '../types/index.ts'
import { InvalidKeyMaterialError } from './errors.ts'

/**
 * Computes the CRT parameters of a private key.
 * PKCS#1 carries these, but the wrapped forms & caller
 * supplied keys may not -- so we always derive them
 */
export function deriveCrtParams(
	{ d, p, q }: Pick<RSAPrivateKey, 'd' | 'p' | 'q'>
): RSACRTParams {
	if(p < 2n || q < 2n) {
		throw new InvalidKeyMaterialError('primes P & Q must be greater than 1')
	}

	let qInv: bigint
	try {
		qInv = invert(q, p)
	} catch(err) {
		throw new InvalidKeyMaterialError(
			'Q has no inverse modulo P, primes are not coprime',
			{ cause: err }
		)
	}

	return {
		dp: mod(d, p - 1n),
		dq: mod(d, q - 1n),
		qInv,
	}
}
