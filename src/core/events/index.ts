export * from './canonical-event'
export * from './eventable'
export * from './explicit-event'
export * from './identifier-tokenizer'
export * from './to-event'
export * from './timer'
export * from './custom-event'
