import * as R from 'ramda'
import { Result, Success, Failure, getOrElse, mapError } from '@/common/types/result'
import { ParseError } from '@/common/types/errors'
import { fromParseIntError } from '@/common/types/conversions'
import { parseBool, parseUnsignedInt, U16_MAX } from '@/shared/parsing'

export type Config = {
  debug: boolean
  port: number // 0..65535
  host: string
}

export const DEFAULT_CONFIG: Readonly<Config> = {
  debug: false,
  port: 8080,
  host: 'localhost',
}

export const withDefaults = (): Config => ({ ...DEFAULT_CONFIG })

type ConfigEntry = { key: string, value: string }

// --- Pure Calculations ---

/**
 * Splits a line into a trimmed key/value pair. A line must contain exactly one
 * `=`; anything else (no separator, several) is not an entry.
 */
const toEntry = (line: string): ConfigEntry | null => {
  const parts = R.split('=', line)
  if (parts.length !== 2) return null
  const [key, value] = R.map(R.trim, parts)
  return { key, value }
}

const isEntry = (entry: ConfigEntry | null): entry is ConfigEntry => entry !== null

/**
 * Applies one entry to the config being built.
 * `debug` falls back to false on a bad value, `port` fails the load, `host` is verbatim.
 */
const applyEntry = (config: Config, { key, value }: ConfigEntry): Result<Config> => {
  switch (key) {
    case 'debug':
      return Success({ ...config, debug: getOrElse(false)(parseBool(value)) })
    case 'port': {
      const port = mapError(fromParseIntError)(parseUnsignedInt(value, U16_MAX))
      return port.isSuccess ? Success({ ...config, port: port.value }) : port
    }
    case 'host':
      return Success({ ...config, host: value })
    default:
      return Success(config)
  }
}

/**
 * Parses `key=value` lines into a fully populated Config.
 *
 * Malformed lines and unknown keys are skipped, later lines override earlier
 * ones, and the only failure is a `port` value that is not an unsigned 16-bit
 * integer.
 */
export const parseConfigText = (text: string): Result<Config> => {
  const entries = R.filter(isEntry, R.map(toEntry, R.split('\n', text)))

  let current = withDefaults()
  for (const entry of entries) {
    const applied = applyEntry(current, entry)
    if (!applied.isSuccess) return Failure(applied.error)
    current = applied.value
  }
  return Success(current)
}

/**
 * Checks that every field survives formatConfig → parseConfigText unchanged:
 * the port must be an integer in 0..65535, the host must hold no `=` or line
 * break and carry no surrounding whitespace.
 */
export const validateConfigForSave = (config: Config): Result<Config> => {
  const port = mapError(fromParseIntError)(parseUnsignedInt(String(config.port), U16_MAX))
  if (!port.isSuccess) return port

  const { host } = config
  if (host.includes('=') || host.includes('\n') || host !== host.trim()) {
    return Failure(
      ParseError(
        'Unrepresentable',
        host,
        'host must not contain `=` or a line break, or start or end with whitespace'
      )
    )
  }
  return Success(config)
}

/**
 * Serializes a Config to the persisted `key=value` layout.
 */
export const formatConfig = (config: Config): string =>
  [
    `debug=${config.debug}`,
    `port=${config.port}`,
    `host=${config.host}`,
  ].join('\n') + '\n'
