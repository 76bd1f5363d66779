/**
 * Play
 *
 * One round of the game: walk the tree on the player's answers until we
 * reach a guess, then either celebrate or learn the animal we missed.
 */
import type { Operation } from 'effection'
import { useLogger } from '../logger/index.ts'
import { askAnimalName, askDistinguishingQuestion, askYesNo, say } from '../prompt/ask.ts'
import { TreeStoreContext } from '../store/types.ts'
import { follow } from '../tree/inspect.ts'
import type { ChildSlot, GameTree, GuessNode, QuestionNode } from '../tree/types.ts'
import { teach } from './teach.ts'

export type RoundOutcome =
  | {
      kind: 'guessed'
      animal: string
      /** Answers given on the way to the guess. */
      path: boolean[]
    }
  | {
      kind: 'learned'
      /** The animal the player was thinking of. */
      animal: string
      /** The wrong guess, now on the "no" side of `question`. */
      replaced: string
      question: string
      /** Where the new question was attached. */
      slot: ChildSlot | 'root'
      path: boolean[]
    }

type RoundState =
  | { kind: 'at-question'; node: QuestionNode }
  | { kind: 'at-guess'; node: GuessNode }

function stateFor(node: QuestionNode | GuessNode): RoundState {
  return node.kind === 'question'
    ? { kind: 'at-question', node }
    : { kind: 'at-guess', node }
}

/**
 * Ask questions from `tree.root` down to a guess.
 *
 * @returns the guess reached and the answers that led to it
 */
export function* traverse(tree: GameTree): Operation<{ guess: GuessNode; path: boolean[] }> {
  const log = yield* useLogger('engine:play')
  const path: boolean[] = []
  let state = stateFor(tree.root)

  while (state.kind === 'at-question') {
    const { node } = state
    const answer = yield* askYesNo(`${node.text}?`)
    log.debug({ question: node.text, answer }, 'question answered')
    path.push(answer)
    state = stateFor(follow(node, answer))
  }
  return { guess: state.node, path }
}

/**
 * After a wrong guess, find out what the animal was and how to tell it
 * apart, grow the tree, and save it.
 */
export function* learn(
  tree: GameTree,
  guess: GuessNode
): Operation<Omit<Extract<RoundOutcome, { kind: 'learned' }>, 'path'>> {
  const log = yield* useLogger('engine:learn')
  const store = yield* TreeStoreContext.expect()

  yield* say()
  yield* say(`Ok, so it's not a ${guess.animal}. I give up.`, 'failure')
  yield* say()

  const animal = yield* askAnimalName()
  const question = yield* askDistinguishingQuestion(guess.animal, animal)
  const result = teach(tree, guess, { animal, question })

  log.info(
    { animal, replaced: guess.animal, question: result.question.text, slot: result.replaced },
    'learned a new animal'
  )
  yield* store.save(tree.root)

  return {
    kind: 'learned',
    animal,
    replaced: guess.animal,
    question: result.question.text,
    slot: result.replaced,
  }
}

/**
 * Play one round against `tree`, which is mutated and saved if the guess
 * is wrong. A right guess leaves the tree and the store untouched.
 */
export function* playRound(tree: GameTree): Operation<RoundOutcome> {
  const log = yield* useLogger('engine:play')
  const { guess, path } = yield* traverse(tree)

  if (yield* askYesNo(`Is your animal a ${guess.animal}?`)) {
    yield* say()
    yield* say('Yay! I guessed right!', 'success')
    log.info({ animal: guess.animal, steps: path.length }, 'guessed right')
    return { kind: 'guessed', animal: guess.animal, path }
  }

  const learned = yield* learn(tree, guess)
  return { ...learned, path }
}
