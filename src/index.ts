export * from './lib/storage/index.js'
