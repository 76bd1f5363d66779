/**
 * Dump Command
 *
 * Prints the saved decision tree, one node per line.
 */

import { defineCommand } from 'citty'
import { run } from 'effection'
import {
  countNodes,
  createFileTreeStore,
  formatCounts,
  formatTree,
  resolveGameConfig,
  validateTree,
} from '@zoo/core'

export const dumpCommand = defineCommand({
  meta: {
    name: 'dump',
    description: 'Print the saved decision tree',
  },
  args: {
    data: {
      type: 'string',
      description: 'File the decision tree is saved in (default: $ZOO_DATA_FILE or zoo.json)',
      alias: 'd',
    },
  },
  async run({ args }) {
    try {
      const report = await run(function* () {
        const config = yield* resolveGameConfig({ dataFile: args.data })
        const store = createFileTreeStore({ path: config.dataFile, seedAnimal: config.seedAnimal })
        const root = yield* store.load()
        return { tree: formatTree(root), counts: countNodes(root), problems: validateTree(root) }
      })

      console.log(report.tree)
      console.log(`\n${formatCounts(report.counts)}`)
      for (const problem of report.problems) {
        console.warn(`warning: ${problem}`)
      }
    } catch (error) {
      console.error(`Error: ${error instanceof Error ? error.message : String(error)}`)
      process.exit(1)
    }
  },
})
