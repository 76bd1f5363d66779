export { TreeStoreContext, type TreeStore } from './types.ts'
export {
  decodeTree,
  deserializeNode,
  encodeTree,
  FORMAT_VERSION,
  serializeNode,
  SerializedNodeSchema,
  SerializedTreeSchema,
  type SerializedNode,
  type SerializedTree,
} from './codec.ts'
export { createFileTreeStore, type FileTreeStoreOptions } from './file-store.ts'
export { createMemoryTreeStore, type MemoryTreeStore } from './memory-store.ts'
