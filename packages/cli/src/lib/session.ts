import type { Operation } from 'effection'
import {
  createFileTreeStore,
  InterruptedError,
  PrompterContext,
  runGame,
  say,
  setupLogger,
  TreeStoreContext,
  useLogger,
  type GameConfig,
  type LoggerFactory,
  type RoundOutcome,
} from '@zoo/core'
import { useTerminal, type TerminalOptions } from './terminal.ts'

export interface PlaySessionOptions {
  config: GameConfig
  terminal?: TerminalOptions
  /** Replaces the pino factory built from `config`. */
  loggerFactory?: LoggerFactory
}

export type SessionResult =
  | { kind: 'finished'; outcome: RoundOutcome }
  | { kind: 'interrupted' }

/**
 * Wire the file store, the terminal and logging together and play one
 * round. An interrupt ends the session with a goodbye rather than an error;
 * the tree is only ever written after a completed lesson, so there is
 * nothing to clean up.
 */
export function* playSession(options: PlaySessionOptions): Operation<SessionResult> {
  const { config } = options

  // Ctrl-C is ours from here on.
  yield* PrompterContext.set(yield* useTerminal(options.terminal))

  yield* setupLogger(
    options.loggerFactory
      ? { factory: options.loggerFactory }
      : { level: config.logLevel, pretty: config.prettyLogs }
  )
  const log = yield* useLogger('cli:session')

  yield* TreeStoreContext.set(
    createFileTreeStore({ path: config.dataFile, seedAnimal: config.seedAnimal })
  )

  try {
    const outcome = yield* runGame()
    return { kind: 'finished', outcome }
  } catch (error) {
    if (!(error instanceof InterruptedError)) throw error

    log.debug({ reason: error.reason }, 'session interrupted')
    yield* say()
    yield* say()
    yield* say('Ok, bye for now.', 'farewell')
    yield* say()
    return { kind: 'interrupted' }
  }
}
