export * from './types/index.ts'
export * from './utils/index.ts'
