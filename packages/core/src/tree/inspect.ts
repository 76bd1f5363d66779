/**
 * Tree Inspection
 *
 * Read-only helpers over a decision tree: navigation, enumeration,
 * invariant checks and a text dump for debugging.
 */
import { PreconditionFailedError } from '../errors.ts'
import type { GuessNode, QuestionNode, TreeNode } from './types.ts'

/**
 * The child to visit after answering `question`.
 */
export function follow(question: QuestionNode, answer: boolean): TreeNode {
  return answer ? question.positive : question.negative
}

export interface WalkResult {
  guess: GuessNode
  /** The answers actually consumed, one per question visited. */
  path: boolean[]
}

/**
 * Follow `answers` from `root` until a guess is reached. Answers left over
 * once a guess is reached are ignored.
 *
 * @throws PreconditionFailedError if the answers run out at a question
 */
export function walk(root: TreeNode, answers: readonly boolean[]): WalkResult {
  const path: boolean[] = []
  let node = root
  while (node.kind === 'question') {
    const answer = answers[path.length]
    if (answer === undefined) {
      throw new PreconditionFailedError(
        `Ran out of answers at question "${node.text}" after ${path.length} step(s)`
      )
    }
    path.push(answer)
    node = follow(node, answer)
  }
  return { guess: node, path }
}

/**
 * Every node reachable from `root` through forward links, pre-order:
 * a question, then its positive subtree, then its negative subtree.
 */
export function collectNodes(root: TreeNode): TreeNode[] {
  const nodes: TreeNode[] = []
  const stack: TreeNode[] = [root]
  let node = stack.pop()
  while (node) {
    nodes.push(node)
    if (node.kind === 'question') {
      stack.push(node.negative, node.positive)
    }
    node = stack.pop()
  }
  return nodes
}

/**
 * List every structural invariant `root` violates. An empty list means the
 * tree is consistent.
 */
export function validateTree(root: TreeNode): string[] {
  const problems: string[] = []
  if (root.parent !== null) {
    problems.push('root has a parent')
  }

  const seen = new Set<TreeNode>()
  const stack: TreeNode[] = [root]
  let node = stack.pop()
  while (node) {
    if (seen.has(node)) {
      problems.push(`${nodeLabel(node)} is reachable more than once`)
      node = stack.pop()
      continue
    }
    seen.add(node)

    switch (node.kind) {
      case 'guess':
        if (!node.animal.trim()) problems.push('guess with an empty animal name')
        break
      case 'question':
        if (!node.text.trim()) problems.push('question with empty text')
        if (node.positive.parent !== node) {
          problems.push(`positive child of ${nodeLabel(node)} has the wrong parent`)
        }
        if (node.negative.parent !== node) {
          problems.push(`negative child of ${nodeLabel(node)} has the wrong parent`)
        }
        stack.push(node.negative, node.positive)
        break
    }
    node = stack.pop()
  }
  return problems
}

export interface TreeCounts {
  questions: number
  guesses: number
  /** Questions on the longest root-to-guess path. */
  depth: number
}

export function countNodes(root: TreeNode): TreeCounts {
  const counts: TreeCounts = { questions: 0, guesses: 0, depth: 0 }
  const stack: Array<[TreeNode, number]> = [[root, 0]]
  let entry = stack.pop()
  while (entry) {
    const [node, depth] = entry
    if (node.kind === 'question') {
      counts.questions++
      stack.push([node.negative, depth + 1], [node.positive, depth + 1])
    } else {
      counts.guesses++
      counts.depth = Math.max(counts.depth, depth)
    }
    entry = stack.pop()
  }
  return counts
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`
}

/** `2 questions, 3 animals, depth 2` */
export function formatCounts({ questions, guesses, depth }: TreeCounts): string {
  return `${plural(questions, 'question')}, ${plural(guesses, 'animal')}, depth ${depth}`
}

/**
 * One-line label for a node, e.g. `Guess(dog)` or `Question(Does it meow)`.
 */
export function nodeLabel(node: TreeNode): string {
  return node.kind === 'guess' ? `Guess(${node.animal})` : `Question(${node.text})`
}

/**
 * Indented dump of the tree, two spaces per level, children prefixed with
 * the answer that leads to them:
 *
 * ```
 * Question(Does it meow)
 *   yes: Guess(cat)
 *   no: Guess(dog)
 * ```
 */
export function formatTree(root: TreeNode): string {
  const lines: string[] = []
  const stack: Array<[TreeNode, number, string]> = [[root, 0, '']]
  let entry = stack.pop()
  while (entry) {
    const [node, depth, label] = entry
    lines.push(`${'  '.repeat(depth)}${label}${nodeLabel(node)}`)
    if (node.kind === 'question') {
      stack.push([node.negative, depth + 1, 'no: '], [node.positive, depth + 1, 'yes: '])
    }
    entry = stack.pop()
  }
  return lines.join('\n')
}
