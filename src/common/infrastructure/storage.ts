import { readFile, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { Result, Success, Failure } from '@/common/types/result'
import { IoFailure } from '@/common/types/failures'
import { fromNullable, getOrElse } from '@/common/types/option'

/**
 * Text storage collaborator. Failures are reported as IoFailure values and
 * converted to AppError by whoever consumes them.
 */
export interface Storage {
  readText: (filePath: string) => Promise<Result<string, IoFailure>>
  writeText: (filePath: string, content: string) => Promise<Result<void, IoFailure>>
}

const toIoFailure = (e: unknown, filePath: string): IoFailure => {
  if (e instanceof Error) {
    const code = 'code' in e && typeof e.code === 'string' ? e.code : undefined
    return {
      kind: 'IoFailure',
      code: getOrElse('EIO')(fromNullable(code)),
      path: filePath,
      message: e.message,
    }
  }
  return { kind: 'IoFailure', code: 'EIO', path: filePath, message: String(e) }
}

const safeFsCall = async <T>(filePath: string, action: () => Promise<T>): Promise<Result<T, IoFailure>> => {
  try {
    return Success(await action())
  } catch (e: unknown) {
    return Failure(toIoFailure(e, filePath))
  }
}

/**
 * File-backed storage rooted at `rootDir`. Relative paths resolve under the
 * root; anything resolving outside it fails with EACCES without touching disk.
 */
export const createFileStorage = (rootDir: string): Storage => {
  const root = path.resolve(rootDir)

  const resolveUnderRoot = (filePath: string): Result<string, IoFailure> => {
    const target = path.resolve(root, filePath)
    const relative = path.relative(root, target)
    if (relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
      return Failure({
        kind: 'IoFailure',
        code: 'EACCES',
        path: filePath,
        message: `EACCES: permission denied, path outside storage root '${filePath}'`,
      })
    }
    return Success(target)
  }

  return {
    readText: async filePath => {
      const target = resolveUnderRoot(filePath)
      if (!target.isSuccess) return target
      return safeFsCall(filePath, () => readFile(target.value, 'utf8'))
    },
    writeText: async (filePath, content) => {
      const target = resolveUnderRoot(filePath)
      if (!target.isSuccess) return target
      return safeFsCall(filePath, () => writeFile(target.value, content, 'utf8'))
    },
  }
}

/**
 * In-process storage over a plain map, reporting a missing entry the way
 * Node reports a missing file.
 */
export const createInMemoryStorage = (initialFiles: Record<string, string> = {}): Storage => {
  const files = new Map<string, string>(Object.entries(initialFiles))

  return {
    readText: async filePath => {
      const content = files.get(filePath)
      if (content === undefined) {
        return Failure({
          kind: 'IoFailure',
          code: 'ENOENT',
          path: filePath,
          message: `ENOENT: no such file or directory, open '${filePath}'`,
        })
      }
      return Success(content)
    },
    writeText: async (filePath, content) => {
      files.set(filePath, content)
      return Success(undefined)
    },
  }
}
