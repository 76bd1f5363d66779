import { describe, it, expect } from '@effectionx/vitest'
import { spawn } from 'effection'
import { EventEmitter } from 'node:events'
import { PassThrough, Writable } from 'node:stream'
import { InterruptedError, type Prompter } from '@zoo/core'
import { useTerminal } from '../terminal.ts'

function createStreams() {
  const input = new PassThrough()
  let written = ''
  const output = new Writable({
    write(chunk: Buffer, _encoding, done) {
      written += chunk.toString('utf-8')
      done()
    },
  })
  return { input, options: { input, output }, written: () => written }
}

function* expectInterrupted(prompter: Prompter, prompt: string, reason: InterruptedError['reason']) {
  let caught: unknown
  try {
    yield* prompter.ask(prompt)
  } catch (error) {
    caught = error
  }
  expect(caught).toBeInstanceOf(InterruptedError)
  expect(caught).toHaveProperty('reason', reason)
}

describe('useTerminal', () => {
  it('writes the prompt and returns the line entered', function* () {
    const streams = createStreams()
    const terminal = yield* useTerminal({ ...streams.options, colors: false, signals: new EventEmitter() })

    streams.input.write('Yes please\n')
    const line = yield* terminal.ask('Is your animal a dog?')

    expect(line).toBe('Yes please')
    expect(streams.written()).toBe('Is your animal a dog? ')
  })

  it('keeps lines that arrive before they are asked for', function* () {
    const streams = createStreams()
    const terminal = yield* useTerminal({ ...streams.options, colors: false, signals: new EventEmitter() })

    streams.input.write('no\ncat\nyes\n')

    expect(yield* terminal.ask('Is your animal a dog?')).toBe('no')
    expect(yield* terminal.ask('What animal were you thinking of?')).toBe('cat')
    expect(yield* terminal.ask('Your animal was "cat"?')).toBe('yes')
  })

  it('prints lines without colour when colours are off', function* () {
    const streams = createStreams()
    const terminal = yield* useTerminal({ ...streams.options, colors: false, signals: new EventEmitter() })

    yield* terminal.say('Yay! I guessed right!', 'success')
    yield* terminal.say()

    expect(streams.written()).toBe('Yay! I guessed right!\n\n')
  })

  it('colours lines by tone when colours are on', function* () {
    const streams = createStreams()
    const terminal = yield* useTerminal({ ...streams.options, colors: true, signals: new EventEmitter() })

    yield* terminal.say('Ok, bye for now.', 'farewell')

    expect(streams.written()).toBe('\u001b[34mOk, bye for now.\u001b[39m\n')
  })

  it('hands out queued lines after input ends, then reports end of input', function* () {
    const streams = createStreams()
    const terminal = yield* useTerminal({ ...streams.options, colors: false, signals: new EventEmitter() })

    streams.input.end('cat\n')

    expect(yield* terminal.ask('What animal were you thinking of?')).toBe('cat')
    yield* expectInterrupted(terminal, 'Your animal was "cat"?', 'end-of-input')
  })

  it('rejects the pending question on SIGINT', function* () {
    const streams = createStreams()
    const signals = new EventEmitter()
    const terminal = yield* useTerminal({ ...streams.options, colors: false, signals })

    setTimeout(() => signals.emit('SIGINT'), 0)

    yield* expectInterrupted(terminal, 'Does it meow?', 'interrupt')
    expect(signals.listenerCount('SIGINT')).toBe(1)
  })

  it('stops listening for SIGINT once the session is over', function* () {
    const signals = new EventEmitter()
    const streams = createStreams()

    const session = yield* spawn(function* () {
      yield* useTerminal({ ...streams.options, colors: false, signals })
      expect(signals.listenerCount('SIGINT')).toBe(1)
    })
    yield* session

    expect(signals.listenerCount('SIGINT')).toBe(0)
  })
})
