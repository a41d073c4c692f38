export { createLogger } from './pino.js'
export { makeClientBuffer, isClientLogLevel, type ClientBufferOptions } from './buffer.js'
export { CHANNELS } from './channels.js'
export {
    LogChannel,
    type ChannelColor,
    type ChannelLogger,
    type ClientLog,
    type ClientLogBuffer,
    type ClientLogFilter,
    type ClientLogLevel,
    type ClientLogListener,
    type LoggerBundle,
} from './types.js'
