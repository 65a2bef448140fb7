export * from './config'
export * from './config-validation'
export * from './errors'
export * from './exec'
export * from './provisioner'
export * from './services/database'
export * from './services/manager'
export * from './steps'
export type * from './types'
