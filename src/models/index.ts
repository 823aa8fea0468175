export * from './profile'
export * from './search'
