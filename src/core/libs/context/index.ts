export * from './async-context'
