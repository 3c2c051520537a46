export * from './mood'
export * from './turn'
export * from './session'
