import type { Operation } from 'effection'
import type { LoggerFactory } from './types.ts'
import { LoggerFactoryContext } from './context.ts'
import { createPinoLoggerFactory, type PinoLoggerOptions } from './pino-logger.ts'

/** Pino settings, or a ready-made factory such as a test recorder. */
export type LoggerSetup = PinoLoggerOptions | { factory: LoggerFactory }

/**
 * Install a logger factory for the rest of the current scope.
 *
 * @example
 * ```typescript
 * yield* setupLogger({ level: config.logLevel, pretty: config.prettyLogs })
 * ```
 */
export function* setupLogger(setup: LoggerSetup = {}): Operation<LoggerFactory> {
  const factory = 'factory' in setup ? setup.factory : createPinoLoggerFactory(setup)
  return yield* LoggerFactoryContext.set(factory)
}
