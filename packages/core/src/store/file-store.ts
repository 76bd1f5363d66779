/**
 * File Tree Store
 *
 * Keeps the tree as a JSON document on disk. Saves go to a temporary file
 * beside the target which is then renamed over it, so an interrupted save
 * leaves the previous tree in place.
 */
import { call, type Operation } from 'effection'
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises'
import { basename, dirname, join } from 'node:path'
import { PersistenceUnavailableError } from '../errors.ts'
import { useLogger } from '../logger/index.ts'
import { createGuess } from '../tree/create.ts'
import { countNodes } from '../tree/inspect.ts'
import type { TreeNode } from '../tree/types.ts'
import { decodeTree, encodeTree } from './codec.ts'
import type { TreeStore } from './types.ts'

export interface FileTreeStoreOptions {
  path: string
  /** The animal a brand new game guesses. */
  seedAnimal: string
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

async function readDocument(path: string): Promise<string | undefined> {
  try {
    return await readFile(path, 'utf-8')
  } catch (error) {
    if (isMissingFile(error)) {
      return undefined
    }
    throw error
  }
}

async function writeDocument(path: string, contents: string): Promise<void> {
  const dir = dirname(path)
  const temp = join(dir, `.${basename(path)}.${process.pid}.tmp`)
  await mkdir(dir, { recursive: true })
  try {
    await writeFile(temp, contents, 'utf-8')
    await rename(temp, path)
  } catch (error) {
    await rm(temp, { force: true })
    throw error
  }
}

export function createFileTreeStore(options: FileTreeStoreOptions): TreeStore {
  const { path, seedAnimal } = options

  return {
    *load(): Operation<TreeNode> {
      const log = yield* useLogger('store:file')

      let root: TreeNode | undefined
      try {
        const contents = yield* call(() => readDocument(path))
        root = contents === undefined ? undefined : decodeTree(contents)
      } catch (error) {
        throw new PersistenceUnavailableError(path, 'load', error)
      }

      if (!root) {
        log.info({ path, seedAnimal }, 'no saved tree, starting from seed')
        return createGuess(seedAnimal)
      }
      log.debug({ path, ...countNodes(root) }, 'tree loaded')
      return root
    },

    *save(root: TreeNode): Operation<void> {
      const log = yield* useLogger('store:file')
      const contents = encodeTree(root)
      try {
        yield* call(() => writeDocument(path, contents))
      } catch (error) {
        throw new PersistenceUnavailableError(path, 'save', error)
      }
      log.debug({ path, ...countNodes(root) }, 'tree saved')
    },
  }
}
