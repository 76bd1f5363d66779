import { createContext, type Operation } from 'effection'
import type { Logger, LoggerFactory } from './types.ts'

export const LoggerFactoryContext = createContext<LoggerFactory>('zoo.logger-factory')

const ignore = () => {}

/** Discards every line. */
export const silentLogger: Logger = { debug: ignore, info: ignore }

/**
 * The logger for `module`, from the factory in scope. Without one the game
 * runs silent, which is what most tests want.
 *
 * @example
 * ```typescript
 * const log = yield* useLogger('store:file')
 * log.debug({ path }, 'tree saved')
 * ```
 */
export function* useLogger(module: string): Operation<Logger> {
  const factory = yield* LoggerFactoryContext.get()
  return factory ? factory(module) : silentLogger
}
