/**
 * Tree Codec
 *
 * JSON form of a tree. Parent links are not written; decoding rebuilds
 * them through the tree constructors, which also re-validates names and
 * question text.
 */
import { z } from 'zod'
import { createGuess, createQuestion } from '../tree/create.ts'
import type { TreeNode } from '../tree/types.ts'

export const FORMAT_VERSION = 1

export type SerializedNode =
  | { kind: 'guess'; animal: string }
  | { kind: 'question'; text: string; positive: SerializedNode; negative: SerializedNode }

export interface SerializedTree {
  version: typeof FORMAT_VERSION
  root: SerializedNode
}

const SerializedGuessSchema = z.object({
  kind: z.literal('guess'),
  animal: z.string().min(1),
})

export const SerializedNodeSchema: z.ZodType<SerializedNode> = z.lazy(() =>
  z.union([
    SerializedGuessSchema,
    z.object({
      kind: z.literal('question'),
      text: z.string().min(1),
      positive: SerializedNodeSchema,
      negative: SerializedNodeSchema,
    }),
  ])
)

export const SerializedTreeSchema = z.object({
  version: z.literal(FORMAT_VERSION),
  root: SerializedNodeSchema,
})

export function serializeNode(node: TreeNode): SerializedNode {
  switch (node.kind) {
    case 'guess':
      return { kind: 'guess', animal: node.animal }
    case 'question':
      return {
        kind: 'question',
        text: node.text,
        positive: serializeNode(node.positive),
        negative: serializeNode(node.negative),
      }
  }
}

export function deserializeNode(data: SerializedNode): TreeNode {
  switch (data.kind) {
    case 'guess':
      return createGuess(data.animal)
    case 'question':
      return createQuestion(
        data.text,
        deserializeNode(data.positive),
        deserializeNode(data.negative)
      )
  }
}

/**
 * Encode a tree as a JSON document.
 */
export function encodeTree(root: TreeNode): string {
  const document: SerializedTree = { version: FORMAT_VERSION, root: serializeNode(root) }
  return `${JSON.stringify(document, null, 2)}\n`
}

/**
 * Decode a JSON document produced by `encodeTree`.
 *
 * @throws SyntaxError if `json` is not JSON
 * @throws ZodError if it does not describe a tree
 * @throws InvalidInputError if a name or question is blank
 */
export function decodeTree(json: string): TreeNode {
  const document = SerializedTreeSchema.parse(JSON.parse(json))
  return deserializeNode(document.root)
}
