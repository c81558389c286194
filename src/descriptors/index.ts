export * from './builtin/index.js'
export * from './pgdump/index.js'
