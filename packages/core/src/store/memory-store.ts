import type { Operation } from 'effection'
import { createGuess } from '../tree/create.ts'
import type { TreeNode } from '../tree/types.ts'
import { decodeTree, encodeTree } from './codec.ts'
import type { TreeStore } from './types.ts'

export interface MemoryTreeStore extends TreeStore {
  /** Number of completed saves. */
  readonly saves: number
  /** The encoded document last saved, if any. */
  readonly document: string | undefined
}

/**
 * An in-process store. It keeps the encoded document rather than the node
 * objects, so every load returns a fresh tree that has been through the
 * codec.
 */
export function createMemoryTreeStore(
  initial?: TreeNode,
  seedAnimal = 'dog'
): MemoryTreeStore {
  let document = initial ? encodeTree(initial) : undefined
  let saves = 0

  return {
    get saves() {
      return saves
    },
    get document() {
      return document
    },
    *load(): Operation<TreeNode> {
      return document === undefined ? createGuess(seedAnimal) : decodeTree(document)
    },
    *save(root: TreeNode): Operation<void> {
      document = encodeTree(root)
      saves++
    },
  }
}
