export * from './merkle'
export * from './schema'
export * from './tree-leaves'
