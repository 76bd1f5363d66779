/**
 * Game Configuration
 *
 * Resolved by merging, in order:
 * 1) explicit options (command-line flags)
 * 2) context-provided config (GameConfigContext)
 * 3) environment variables
 * 4) defaults
 */
import { createContext, type Operation } from 'effection'

export interface GameConfig {
  /** Where the tree is persisted. */
  dataFile: string
  /** The single guess a brand new game starts from. */
  seedAnimal: string
  logLevel: string
  prettyLogs: boolean
}

export const DEFAULT_CONFIG: GameConfig = {
  dataFile: 'zoo.json',
  seedAnimal: 'dog',
  logLevel: 'warn',
  prettyLogs: true,
}

export const GameConfigContext = createContext<Partial<GameConfig>>('zoo.config')

/** Trimmed text, or undefined when it is unset or blank. */
function present(value: string | undefined): string | undefined {
  const trimmed = value?.trim()
  return trimmed ? trimmed : undefined
}

/** Drop unset and blank strings so they fall through to the next source. */
function compact(config: Partial<GameConfig>): Partial<GameConfig> {
  const result: Partial<GameConfig> = {}
  const dataFile = present(config.dataFile)
  const seedAnimal = present(config.seedAnimal)
  const logLevel = present(config.logLevel)
  if (dataFile) result.dataFile = dataFile
  if (seedAnimal) result.seedAnimal = seedAnimal
  if (logLevel) result.logLevel = logLevel
  if (config.prettyLogs !== undefined) result.prettyLogs = config.prettyLogs
  return result
}

/**
 * Values taken from the environment. Unset or blank variables are omitted.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<GameConfig> {
  return compact({
    dataFile: env['ZOO_DATA_FILE'],
    seedAnimal: env['ZOO_SEED_ANIMAL'],
    logLevel: env['LOG_LEVEL'],
    prettyLogs: env['NODE_ENV'] === 'production' ? false : undefined,
  })
}

export function* resolveGameConfig(
  options: Partial<GameConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): Operation<GameConfig> {
  const flags = compact(options)
  const ctxConfig = compact((yield* GameConfigContext.get()) ?? {})
  const envConfig = configFromEnv(env)

  return {
    dataFile: flags.dataFile ?? ctxConfig.dataFile ?? envConfig.dataFile ?? DEFAULT_CONFIG.dataFile,
    seedAnimal:
      flags.seedAnimal ?? ctxConfig.seedAnimal ?? envConfig.seedAnimal ?? DEFAULT_CONFIG.seedAnimal,
    logLevel: flags.logLevel ?? ctxConfig.logLevel ?? envConfig.logLevel ?? DEFAULT_CONFIG.logLevel,
    prettyLogs:
      flags.prettyLogs ?? ctxConfig.prettyLogs ?? envConfig.prettyLogs ?? DEFAULT_CONFIG.prettyLogs,
  }
}
