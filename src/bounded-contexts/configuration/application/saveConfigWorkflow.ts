import { Storage } from '@/common/infrastructure/storage'
import { Result, andThenAsync, mapError } from '@/common/types/result'
import { fromIoFailure } from '@/common/types/conversions'
import { Config, formatConfig, validateConfigForSave } from '@/bounded-contexts/configuration/domain/config'

/**
 * Save Config Workflow - Application Layer
 *
 * 1. Validate that the config reads back unchanged (pure)
 * 2. Write it in the layout loadConfigWorkflow reads (an invalid config never reaches storage)
 */
export const saveConfigWorkflow = (storage: Storage) =>
  async (filePath: string, config: Config): Promise<Result<void>> =>
    andThenAsync(async (valid: Config): Promise<Result<void>> =>
      mapError(fromIoFailure)(await storage.writeText(filePath, formatConfig(valid)))
    )(validateConfigForSave(config))
