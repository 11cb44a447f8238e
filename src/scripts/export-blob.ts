import { readFile, writeFile } from 'node:fs/promises'
import { pino } from 'pino'
import type { RSAKeyUsage } from '../types/index.ts'
import { exportRsaPrivateKeyBlob, exportRsaPublicKeyBlob, parseRsaPrivateKey, parseRsaPrivateKeyPem, parseRsaPublicKey, parseRsaPublicKeyPem, RSA_KEY_USAGES, toHexStringWithWhitespace, toRsaPublicKey, uint8ArrayToStr } from '../utils/index.ts'

const LOGGER = pino()
LOGGER.level = process.env.LOG_LEVEL || 'info'

const PEM_PREFIX = '-----BEGIN'

const inPath = readArg('--in')
if(!inPath) {
	console.error(
		'Please provide a key file using --in <path>,'
		+ ' optionally with --private, --public, --usage <SIGN|KEYX> & --out <path>'
	)
	process.exit(1)
}

const usage = readArg('--usage') || 'SIGN'
if(!isKeyUsage(usage)) {
	console.error(`--usage must be one of ${RSA_KEY_USAGES.join(', ')}`)
	process.exit(1)
}

const isPrivate = process.argv.includes('--private')
// export just the public half of a private key
const publicOnly = process.argv.includes('--public')
const outPath = readArg('--out')

try {
	const data = new Uint8Array(await readFile(inPath))
	const isPem = uint8ArrayToStr(data.slice(0, 256)).includes(PEM_PREFIX)
	const opts = { logger: LOGGER }

	let blob: Uint8Array
	if(isPrivate) {
		const key = isPem
			? parseRsaPrivateKeyPem(data, opts)
			: parseRsaPrivateKey(data, opts)
		blob = publicOnly
			? exportRsaPublicKeyBlob(toRsaPublicKey(key), usage, opts)
			: exportRsaPrivateKeyBlob(key, usage, opts)
	} else {
		const key = isPem
			? parseRsaPublicKeyPem(data, opts)
			: parseRsaPublicKey(data, opts)
		blob = exportRsaPublicKeyBlob(key, usage, opts)
	}

	LOGGER.info(
		{ inPath, usage, isPrivate, publicOnly, length: blob.length },
		'exported key blob'
	)

	if(outPath) {
		await writeFile(outPath, blob)
	} else {
		console.log(toHexStringWithWhitespace(blob, ''))
	}
} catch(err) {
	LOGGER.error({ err }, 'failed to export key blob')
	process.exit(1)
}

function isKeyUsage(value: string): value is RSAKeyUsage {
	return RSA_KEY_USAGES.some(u => u === value)
}

function readArg(arg: string) {
	const index = process.argv.indexOf(arg)
	if(index === -1) {
		return undefined
	}

	return process.argv[index + 1] || ''
}
