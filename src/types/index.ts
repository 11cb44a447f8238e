export * from './rsa.ts'
export * from './logger.ts'
export * from './options.ts'
