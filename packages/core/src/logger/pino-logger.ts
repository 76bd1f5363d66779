import pino from 'pino'
import type { Logger, LoggerFactory } from './types.ts'

const STDERR = 2

export interface PinoLoggerOptions {
  /** Pino level name, `silent` included. Defaults to `warn`. */
  level?: string
  /** Format lines with pino-pretty. Defaults to true. */
  pretty?: boolean
}

/**
 * A factory of pino child loggers under a root named `zoo`, one per module.
 * Lines go to stderr so they never mix with the game's dialogue on stdout.
 */
export function createPinoLoggerFactory({
  level = 'warn',
  pretty = true,
}: PinoLoggerOptions = {}): LoggerFactory {
  const root = pretty
    ? pino({
        name: 'zoo',
        level,
        transport: { target: 'pino-pretty', options: { colorize: true, destination: STDERR } },
      })
    : pino({ name: 'zoo', level }, pino.destination(STDERR))

  return (module: string): Logger => root.child({ module })
}
