export * from './builder'
export * from './cli'
export * from './config'
export * from './container'
export * from './errors'
export * from './github'
export * from './http'
export * from './logging'
export * from './mirrors'
export * from './orchestrator'
export * from './publisher'
export * from './sandbox'
export * from './signature'
export * from './summary'
export * from './targets'
export * from './types'
export * from './versions'
