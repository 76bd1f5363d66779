export type { Logger, LoggerFactory } from './types.ts'
export { LoggerFactoryContext, silentLogger, useLogger } from './context.ts'
export { createPinoLoggerFactory, type PinoLoggerOptions } from './pino-logger.ts'
export { setupLogger, type LoggerSetup } from './setup.ts'
