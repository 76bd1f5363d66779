import type { Operation } from 'effection'
import { useLogger } from '../logger/index.ts'
import { say } from '../prompt/ask.ts'
import { TreeStoreContext } from '../store/types.ts'
import { countNodes } from '../tree/inspect.ts'
import type { GameTree } from '../tree/types.ts'
import { playRound, type RoundOutcome } from './play.ts'

export const BANNER = [
  '',
  '-'.repeat(54),
  "Think of an animal, and I'll try and guess what it is.",
]

/**
 * Load the saved tree, greet the player and play a single round.
 *
 * Needs a TreeStore and a Prompter in context.
 */
export function* runGame(): Operation<RoundOutcome> {
  const log = yield* useLogger('engine:game')
  const store = yield* TreeStoreContext.expect()

  const tree: GameTree = { root: yield* store.load() }
  log.debug(countNodes(tree.root), 'game started')

  for (const line of BANNER) {
    yield* say(line)
  }
  return yield* playRound(tree)
}
