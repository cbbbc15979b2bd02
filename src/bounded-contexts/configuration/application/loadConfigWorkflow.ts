import { Storage } from '@/common/infrastructure/storage'
import { Result, andThen, fold, mapError } from '@/common/types/result'
import { describeError } from '@/common/types/errors'
import { fromIoFailure } from '@/common/types/conversions'
import { Config, parseConfigText, withDefaults } from '@/bounded-contexts/configuration/domain/config'

/**
 * Load Config Workflow - Application Layer
 *
 * 1. Read the file (a read failure aborts the load as an Io error)
 * 2. Parse lines into a Config (pure; only an invalid port fails)
 */
export const loadConfigWorkflow = (storage: Storage) =>
  async (filePath: string): Promise<Result<Config>> => {
    const readResult = mapError(fromIoFailure)(await storage.readText(filePath))
    return andThen(parseConfigText)(readResult)
  }

/**
 * Loads the config, falling back to defaults on any failure.
 * The failure is logged, not returned.
 */
export const loadConfigOrDefaults = (storage: Storage) =>
  async (filePath: string): Promise<Config> =>
    fold<Config, Config>(
      error => {
        console.warn(`Could not load config from ${filePath} (${describeError(error)}). Using defaults.`)
        return withDefaults()
      },
      config => config
    )(await loadConfigWorkflow(storage)(filePath))
