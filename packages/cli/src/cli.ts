/**
 * @zoo/cli
 *
 * An animal guessing game that learns from its mistakes.
 *
 * Usage:
 *   zoo play --data ./zoo.json
 *   zoo dump --data ./zoo.json
 */

import { defineCommand, runMain } from 'citty'
import { playCommand } from './commands/play.ts'
import { dumpCommand } from './commands/dump.ts'

const main = defineCommand({
  meta: {
    name: 'zoo',
    version: '0.1.0',
    description: 'Think of an animal, and I will try and guess what it is',
  },
  subCommands: {
    play: playCommand,
    dump: dumpCommand,
  },
})

runMain(main)
