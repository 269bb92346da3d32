export * from './types.js'
export { CHANNELS, ANSI, RESET } from './channels.js'
export { makeClientBuffer } from './buffer.js'
export { createLogger } from './pino.js'
