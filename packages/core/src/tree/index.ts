export type { ChildSlot, GameTree, GuessNode, QuestionNode, TreeNode } from './types.ts'
export {
  createGuess,
  createQuestion,
  normalizeAnimalName,
  normalizeQuestionText,
  replaceChild,
  slotOf,
} from './create.ts'
export {
  collectNodes,
  countNodes,
  formatCounts,
  nodeLabel,
  follow,
  formatTree,
  validateTree,
  walk,
  type TreeCounts,
  type WalkResult,
} from './inspect.ts'
