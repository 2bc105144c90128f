export * from './types.js'
export * from './render.js'
export * from './with-output.js'
