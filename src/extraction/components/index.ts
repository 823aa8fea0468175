export * from './entity-index'
export * from './identifiers'
export * from './list-root'
export * from './nodes'
export * from './raw'
export * from './references'
export * from './text-locator'
