export * from './api-contracts'
export * from './log-contracts'
