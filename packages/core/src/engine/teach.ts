import { PreconditionFailedError } from '../errors.ts'
import { createGuess, createQuestion, replaceChild, slotOf } from '../tree/create.ts'
import type { ChildSlot, GameTree, GuessNode, QuestionNode } from '../tree/types.ts'

/**
 * What the player told us after a wrong guess.
 */
export interface Lesson {
  /** The animal they were thinking of. */
  animal: string
  /** A question that is true for `animal` and false for the wrong guess. */
  question: string
}

export interface TeachResult {
  question: QuestionNode
  /** Slot of the former parent that now holds `question`; `root` if none. */
  replaced: ChildSlot | 'root'
}

/**
 * Split `guess` into a question that tells it apart from the lesson's
 * animal. The new animal always goes on the "yes" side and the old guess
 * on the "no" side. The question takes over whatever slot held `guess`,
 * or becomes the root if `guess` was the root.
 *
 * The tree is only touched once every check has passed.
 *
 * @throws PreconditionFailedError if `guess` is not where its parent link
 * says it is
 * @throws InvalidInputError if the lesson's animal or question is blank
 */
export function teach(tree: GameTree, guess: GuessNode, lesson: Lesson): TeachResult {
  // createQuestion re-parents its children, so read this first.
  const parent = guess.parent
  if (parent ? !slotOf(parent, guess) : tree.root !== guess) {
    throw new PreconditionFailedError(`Guess "${guess.animal}" is not attached to this tree`)
  }

  const newGuess = createGuess(lesson.animal)
  const question = createQuestion(lesson.question, newGuess, guess)

  if (!parent) {
    tree.root = question
    return { question, replaced: 'root' }
  }
  return { question, replaced: replaceChild(parent, guess, question) }
}
