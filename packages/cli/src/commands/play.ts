/**
 * Play Command
 *
 * Plays one round against the saved tree, teaching it a new animal if
 * the guess is wrong.
 */

import { defineCommand } from 'citty'
import { run } from 'effection'
import { resolveGameConfig } from '@zoo/core'
import { playSession } from '../lib/session.ts'

export const playCommand = defineCommand({
  meta: {
    name: 'play',
    description: 'Think of an animal and let the game guess it',
  },
  args: {
    data: {
      type: 'string',
      description: 'File the decision tree is saved in (default: $ZOO_DATA_FILE or zoo.json)',
      alias: 'd',
    },
    seed: {
      type: 'string',
      description: 'Animal a brand new game starts by guessing (default: dog)',
    },
    logLevel: {
      type: 'string',
      description: 'pino log level written to stderr (default: $LOG_LEVEL or warn)',
    },
  },
  async run({ args }) {
    try {
      await run(function* () {
        const config = yield* resolveGameConfig({
          dataFile: args.data,
          seedAnimal: args.seed,
          logLevel: args.logLevel,
        })
        yield* playSession({ config })
      })
    } catch (error) {
      console.error(`Error: ${error instanceof Error ? error.message : String(error)}`)
      process.exit(1)
    }
  },
})
