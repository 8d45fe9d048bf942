export * from './store'
export * from './snapshot'
