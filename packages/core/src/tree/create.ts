import { InvalidInputError, PreconditionFailedError } from '../errors.ts'
import type { ChildSlot, GuessNode, QuestionNode, TreeNode } from './types.ts'

/**
 * Trim and lower-case an animal name. May return an empty string.
 */
export function normalizeAnimalName(name: string): string {
  return name.trim().toLowerCase()
}

/**
 * Trim a question and drop its trailing question marks. Applying it twice
 * gives the same text as applying it once. May return an empty string.
 */
export function normalizeQuestionText(text: string): string {
  return text.trim().replace(/[\s?]+$/, '')
}

/**
 * Create a guess for `animal`. The new node has no parent until it is
 * placed under a question.
 *
 * @throws InvalidInputError if the name is blank
 */
export function createGuess(animal: string): GuessNode {
  const normalized = normalizeAnimalName(animal)
  if (!normalized) {
    throw new InvalidInputError('animal')
  }
  return { kind: 'guess', animal: normalized, parent: null }
}

/**
 * Create a question owning `positive` and `negative`, and point both
 * children's parent at it. Callers that need a child's previous parent must
 * read it first.
 *
 * @throws InvalidInputError if the text is blank once normalized
 * @throws PreconditionFailedError if both children are the same node
 */
export function createQuestion(
  text: string,
  positive: TreeNode,
  negative: TreeNode
): QuestionNode {
  const normalized = normalizeQuestionText(text)
  if (!normalized) {
    throw new InvalidInputError('question')
  }
  if (positive === negative) {
    throw new PreconditionFailedError('A question cannot own the same node in both slots')
  }

  const question: QuestionNode = {
    kind: 'question',
    text: normalized,
    positive,
    negative,
    parent: null,
  }
  positive.parent = question
  negative.parent = question
  return question
}

/**
 * Find which slot of `parent` holds `child`, by identity.
 */
export function slotOf(parent: QuestionNode, child: TreeNode): ChildSlot | undefined {
  if (parent.positive === child) return 'positive'
  if (parent.negative === child) return 'negative'
  return undefined
}

/**
 * Swap `oldChild` for `newChild` in whichever slot of `parent` holds it, and
 * re-parent `newChild`. `oldChild.parent` is left for the caller to update.
 *
 * @returns the slot that was rewritten
 * @throws PreconditionFailedError if `oldChild` is not a child of `parent`
 */
export function replaceChild(
  parent: QuestionNode,
  oldChild: TreeNode,
  newChild: TreeNode
): ChildSlot {
  const slot = slotOf(parent, oldChild)
  if (!slot) {
    throw new PreconditionFailedError(
      `Node is not a child of question "${parent.text}"`
    )
  }
  parent[slot] = newChild
  newChild.parent = parent
  return slot
}
