/**
 * What the engine, the stores and the CLI session log through. A pino
 * child logger satisfies it; tests pass their own recorder.
 */
export interface Logger {
  debug(msg: string): void
  debug(fields: object, msg: string): void
  info(msg: string): void
  info(fields: object, msg: string): void
}

/** Hands out a logger per module, named like `engine:play` or `store:file`. */
export type LoggerFactory = (module: string) => Logger
