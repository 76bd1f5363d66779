import { createContext, type Operation } from 'effection'
import type { TreeNode } from '../tree/types.ts'

/**
 * Where the game keeps its tree between sessions.
 */
export interface TreeStore {
  /** The saved tree, or a single seed guess when nothing is saved yet. */
  load(): Operation<TreeNode>
  /** Overwrite the saved tree with `root`, all or nothing. */
  save(root: TreeNode): Operation<void>
}

export const TreeStoreContext = createContext<TreeStore>('zoo.tree-store')
