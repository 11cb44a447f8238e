export * from './constants.ts'
export * from './crt.ts'
export * from './errors.ts'
export * from './fixed-width.ts'
export * from './generics.ts'
export * from './key-blob.ts'
export * from './logger.ts'
export * from './parse-rsa-key.ts'
