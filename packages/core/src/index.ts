/**
 * @zoo/core
 *
 * An animal guessing game that learns. The decision tree, the game engine
 * that plays and grows it, the prompts it asks through, and the stores it
 * is saved in.
 *
 * @packageDocumentation
 */

export * from './tree/index.ts'
export * from './engine/index.ts'
export * from './prompt/index.ts'
export * from './store/index.ts'
export * from './logger/index.ts'
export {
  configFromEnv,
  DEFAULT_CONFIG,
  GameConfigContext,
  resolveGameConfig,
  type GameConfig,
} from './config/index.ts'
export {
  InterruptedError,
  InvalidInputError,
  PersistenceUnavailableError,
  PreconditionFailedError,
} from './errors.ts'
