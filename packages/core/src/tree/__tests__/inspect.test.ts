import { describe, it, expect } from 'vitest'
import { createGuess, createQuestion } from '../create.ts'
import {
  collectNodes,
  countNodes,
  formatCounts,
  formatTree,
  nodeLabel,
  validateTree,
  walk,
} from '../inspect.ts'
import { PreconditionFailedError } from '../../errors.ts'
import type { QuestionNode } from '../types.ts'

/**
 * Does it live in water?
 *   yes: Guess(fish)
 *   no:  Does it meow?
 *          yes: Guess(cat)
 *          no:  Guess(dog)
 */
function sampleTree(): QuestionNode {
  return createQuestion(
    'Does it live in water',
    createGuess('fish'),
    createQuestion('Does it meow', createGuess('cat'), createGuess('dog'))
  )
}

describe('walk', () => {
  it('follows yes to the positive child and no to the negative child', () => {
    const root = sampleTree()
    expect(walk(root, [true]).guess.animal).toBe('fish')
    expect(walk(root, [false, true]).guess.animal).toBe('cat')
    expect(walk(root, [false, false]).guess.animal).toBe('dog')
  })

  it('reports only the answers it used', () => {
    const result = walk(sampleTree(), [true, false, false])
    expect(result.path).toEqual([true])
  })

  it('returns a lone guess without consuming answers', () => {
    const result = walk(createGuess('dog'), [])
    expect(result).toEqual({ guess: expect.objectContaining({ animal: 'dog' }), path: [] })
  })

  it('fails when the answers stop at a question', () => {
    expect(() => walk(sampleTree(), [false])).toThrow(PreconditionFailedError)
  })
})

describe('collectNodes', () => {
  it('lists nodes pre-order, positive before negative', () => {
    expect(collectNodes(sampleTree()).map(nodeLabel)).toEqual([
      'Question(Does it live in water)',
      'Guess(fish)',
      'Question(Does it meow)',
      'Guess(cat)',
      'Guess(dog)',
    ])
  })
})

describe('validateTree', () => {
  it('accepts a tree built with the constructors', () => {
    expect(validateTree(sampleTree())).toEqual([])
  })

  it('reports a child whose parent link is wrong', () => {
    const root = sampleTree()
    root.positive.parent = null
    expect(validateTree(root)).toEqual([
      'positive child of Question(Does it live in water) has the wrong parent',
    ])
  })

  it('reports a root that has a parent', () => {
    const root = sampleTree()
    const inner = root.negative
    expect(validateTree(inner)).toEqual(['root has a parent'])
  })

  it('reports a node reachable twice', () => {
    const root = sampleTree()
    const shared = root.positive
    if (root.negative.kind !== 'question') throw new Error('unexpected shape')
    root.negative.negative = shared
    expect(validateTree(root)).toContain('Guess(fish) is reachable more than once')
  })
})

describe('countNodes', () => {
  it('counts questions, guesses and the deepest path', () => {
    expect(countNodes(sampleTree())).toEqual({ questions: 2, guesses: 3, depth: 2 })
  })

  it('treats a lone guess as depth zero', () => {
    expect(countNodes(createGuess('dog'))).toEqual({ questions: 0, guesses: 1, depth: 0 })
  })
})

describe('formatTree', () => {
  it('indents two spaces per level and labels each branch', () => {
    expect(formatTree(sampleTree())).toBe(
      [
        'Question(Does it live in water)',
        '  yes: Guess(fish)',
        '  no: Question(Does it meow)',
        '    yes: Guess(cat)',
        '    no: Guess(dog)',
      ].join('\n')
    )
  })
})

describe('formatCounts', () => {
  it('summarizes a tree in one line', () => {
    expect(formatCounts(countNodes(sampleTree()))).toBe('2 questions, 3 animals, depth 2')
  })

  it('uses the singular for one of a kind', () => {
    expect(formatCounts({ questions: 1, guesses: 2, depth: 1 })).toBe('1 question, 2 animals, depth 1')
    expect(formatCounts(countNodes(createGuess('dog')))).toBe('0 questions, 1 animal, depth 0')
  })
})
