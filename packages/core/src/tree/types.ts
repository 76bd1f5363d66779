/**
 * Tree Types
 *
 * The decision tree is a strict binary tree of two node kinds. Forward
 * links (`positive`, `negative` and the game's root holder) own nodes.
 * `parent` is a non-owning back-reference, kept only so a guess can be
 * swapped out of its parent's slot when the game learns.
 */

/**
 * A terminal node: the animal we guess when we get here.
 */
export interface GuessNode {
  readonly kind: 'guess'
  /** Trimmed, lower-case animal name. Never empty. */
  readonly animal: string
  /** Non-owning. `null` for the root. */
  parent: QuestionNode | null
}

/**
 * An internal node: a yes/no question and the subtree for each answer.
 */
export interface QuestionNode {
  readonly kind: 'question'
  /** Trimmed, without the trailing "?". Never empty. */
  readonly text: string
  /** Followed when the answer is "yes". */
  positive: TreeNode
  /** Followed when the answer is "no". */
  negative: TreeNode
  /** Non-owning. `null` for the root. */
  parent: QuestionNode | null
}

export type TreeNode = GuessNode | QuestionNode

/**
 * Which of a question's two child slots a node occupies.
 */
export type ChildSlot = 'positive' | 'negative'

/**
 * Mutable holder for the root. Teaching at a parentless guess replaces the
 * root, so the game owns the tree through this rather than a bare node.
 */
export interface GameTree {
  root: TreeNode
}
