import { describe, it, expect } from '@effectionx/vitest'
import { configFromEnv, DEFAULT_CONFIG, GameConfigContext, resolveGameConfig } from '../index.ts'

describe('configFromEnv', () => {
  it('reads the game variables and ignores blank ones', function* () {
    expect(
      configFromEnv({ ZOO_DATA_FILE: '/tmp/zoo.json', ZOO_SEED_ANIMAL: ' ', LOG_LEVEL: 'debug' })
    ).toEqual({ dataFile: '/tmp/zoo.json', logLevel: 'debug' })
  })

  it('turns pretty logs off in production', function* () {
    expect(configFromEnv({ NODE_ENV: 'production' })).toEqual({ prettyLogs: false })
  })
})

describe('resolveGameConfig', () => {
  it('falls back to the defaults', function* () {
    expect(yield* resolveGameConfig({}, {})).toEqual(DEFAULT_CONFIG)
  })

  it('prefers options over context over environment', function* () {
    yield* GameConfigContext.set({ seedAnimal: 'cat', logLevel: 'info' })

    const config = yield* resolveGameConfig(
      { logLevel: 'trace' },
      { ZOO_SEED_ANIMAL: 'owl', ZOO_DATA_FILE: 'saves/zoo.json', LOG_LEVEL: 'error' }
    )

    expect(config).toEqual({
      dataFile: 'saves/zoo.json',
      seedAnimal: 'cat',
      logLevel: 'trace',
      prettyLogs: true,
    })
  })

  it('treats options left undefined as unset', function* () {
    const config = yield* resolveGameConfig({ dataFile: undefined }, { ZOO_DATA_FILE: 'env.json' })
    expect(config.dataFile).toBe('env.json')
  })

  it('trims option values and lets blank ones fall through', function* () {
    const config = yield* resolveGameConfig(
      { seedAnimal: '   ', dataFile: '  saves/zoo.json ', logLevel: '' },
      { ZOO_SEED_ANIMAL: 'cat' }
    )
    expect(config).toEqual({
      dataFile: 'saves/zoo.json',
      seedAnimal: 'cat',
      logLevel: 'warn',
      prettyLogs: true,
    })
  })
})
