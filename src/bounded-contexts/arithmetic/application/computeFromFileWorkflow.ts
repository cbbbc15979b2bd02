import { Storage } from '@/common/infrastructure/storage'
import { chainAsync } from '@/common/types/chain'
import { Result } from '@/common/types/result'
import { parseFloatStrict } from '@/shared/parsing'
import { divide, sqrt } from '@/bounded-contexts/arithmetic/domain/arithmetic'

export const RESULT_DIVISOR = 10

/**
 * Compute From File Workflow - Application Layer
 *
 * read text → parse float → square root → divide by RESULT_DIVISOR.
 * The first failing link stops the chain; its failure is returned as an AppError.
 */
export const computeFromFileWorkflow = (storage: Storage) =>
  (filePath: string): Promise<Result<number>> =>
    chainAsync<string>()
      .andThen(storage.readText)
      .andThen(text => parseFloatStrict(text.trim()))
      .andThen(sqrt)
      .andThen(root => divide(root, RESULT_DIVISOR))
      .run(filePath)
