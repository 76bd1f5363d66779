/**
 * Terminal Prompter
 *
 * A Prompter over node:readline, provided as an effection resource so the
 * interface is closed when the session ends.
 *
 * Lines are queued as they arrive, so input piped in ahead of the prompts
 * is not lost. Ctrl-C rejects the pending (or next) `ask` with an
 * InterruptedError; end of input does the same once the queue is drained.
 */
import { call, resource, type Operation } from 'effection'
import { createInterface } from 'node:readline'
import type { EventEmitter } from 'node:events'
import chalk, { Chalk, type ChalkInstance } from 'chalk'
import { InterruptedError, type Prompter, type Tone } from '@zoo/core'

export interface TerminalOptions {
  /** Default: process.stdin */
  input?: NodeJS.ReadableStream
  /** Default: process.stdout */
  output?: NodeJS.WritableStream
  /** Colour output by tone. Default: whatever chalk detects for the terminal. */
  colors?: boolean
  /** Source of process-level SIGINT. Default: process */
  signals?: EventEmitter
}

function paintFor(colors: boolean | undefined): ChalkInstance {
  if (colors === undefined) return chalk
  return new Chalk({ level: colors ? chalk.level || 1 : 0 })
}

function styler(paint: ChalkInstance): Record<Tone, (text: string) => string> {
  return {
    plain: (text) => text,
    success: paint.green,
    failure: paint.red,
    farewell: paint.blue,
  }
}

interface PendingLine {
  resolve(line: string): void
  reject(error: InterruptedError): void
}

export function useTerminal(options: TerminalOptions = {}): Operation<Prompter> {
  return resource(function* (provide) {
    const input = options.input ?? process.stdin
    const output = options.output ?? process.stdout
    const signals = options.signals ?? process
    const style = styler(paintFor(options.colors))

    const rl = createInterface({ input, output })
    const lines: string[] = []
    let pending: PendingLine | undefined
    let stopped: InterruptedError | undefined
    let closed = false

    const onLine = (line: string) => {
      if (pending) {
        const waiting = pending
        pending = undefined
        waiting.resolve(line)
      } else {
        lines.push(line)
      }
    }

    const stop = (reason: InterruptedError['reason']) => {
      stopped ??= new InterruptedError(reason)
      if (pending) {
        const waiting = pending
        pending = undefined
        waiting.reject(stopped)
      }
    }
    const onInterrupt = () => stop('interrupt')
    const onClose = () => {
      closed = true
      stop('end-of-input')
    }

    rl.on('line', onLine)
    rl.on('close', onClose)
    rl.on('SIGINT', onInterrupt)
    signals.on('SIGINT', onInterrupt)

    const terminal: Prompter = {
      *ask(prompt: string): Operation<string> {
        if (closed) {
          output.write(`${prompt} `)
        } else {
          rl.setPrompt(`${prompt} `)
          rl.prompt()
        }

        if (stopped?.reason === 'interrupt') throw stopped
        const queued = lines.shift()
        if (queued !== undefined) return queued
        if (stopped) throw stopped

        return yield* call(
          () =>
            new Promise<string>((resolve, reject) => {
              pending = { resolve, reject }
            })
        )
      },

      *say(message = '', tone: Tone = 'plain'): Operation<void> {
        output.write(`${style[tone](message)}\n`)
      },
    }

    try {
      yield* provide(terminal)
    } finally {
      signals.off('SIGINT', onInterrupt)
      rl.off('close', onClose)
      rl.close()
    }
  })
}
