import type { LevelWithSilent, Logger, LoggerOptions } from 'pino'
import pino from 'pino'

export const validLogLevels: LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
]

export interface LoggerSetupOptions {
  /** Minimum level to emit. Falls back to the `logLevel` env var, then `info`. */
  level?: LevelWithSilent
  /** Human-readable terminal output through pino-pretty (default: true unless `enableConsoleOutput=false`) */
  pretty?: boolean
}

/**
 * Checks whether a value is one of the pino log levels.
 */
export function isLogLevel(value: unknown): value is LevelWithSilent {
  return (
    typeof value === 'string' &&
    validLogLevels.some((level) => level === value)
  )
}

function readRecord(value: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value))
}

/**
 * Creates an error serializer that handles standard errors as well as the
 * client's API errors, which carry `method`, `url` and `status`.
 *
 * @returns A function that serializes error objects with message, stack, name, cause and custom properties.
 */
export function createErrorSerializer() {
  const serialize = (err: unknown): unknown => {
    if (err == null) {
      return err
    }

    // Handle primitive values (string, number, boolean)
    if (typeof err !== 'object') {
      const primitiveType =
        typeof err === 'string'
          ? 'StringError'
          : typeof err === 'number'
            ? 'NumberError'
            : 'BooleanError'
      return { message: String(err), type: primitiveType }
    }

    const serialized: Record<string, unknown> = {}

    if ('message' in err && err.message) serialized.message = err.message
    if ('name' in err && err.name) serialized.name = err.name
    if ('status' in err && err.status !== undefined)
      serialized.status = err.status

    if (err instanceof TypeError) {
      serialized.type = 'TypeError'
    } else if (err instanceof SyntaxError) {
      serialized.type = 'SyntaxError'
    } else if (err instanceof Error) {
      serialized.type = 'Error'
    } else if ('name' in err && typeof err.name === 'string' && err.name) {
      serialized.type = err.name
    } else {
      serialized.type = 'UnknownError'
    }

    // 4xx responses are expected outcomes; their stacks are noise
    const status =
      'status' in err && typeof err.status === 'number' ? err.status : undefined
    const shouldIncludeStack = !status || status >= 500
    if ('stack' in err && err.stack && shouldIncludeStack) {
      serialized.stack = err.stack
    }

    // cause is non-enumerable on Error
    if ('cause' in err && err.cause) {
      serialized.cause = serialize(err.cause)
    }

    const record = readRecord(err)
    for (const key of Object.keys(record)) {
      if (!['message', 'stack', 'name', 'status', 'type'].includes(key)) {
        serialized[key] = record[key]
      }
    }

    return serialized
  }

  return serialize
}

/**
 * Builds pino options from explicit settings and environment variables.
 *
 * Environment variables:
 * - logLevel: minimum level (default: info)
 * - enableConsoleOutput: pretty terminal output (default: true)
 */
export function createLoggerConfig(
  options: LoggerSetupOptions = {},
): LoggerOptions {
  const envLevel = process.env.logLevel
  const level = options.level ?? (isLogLevel(envLevel) ? envLevel : 'info')
  const pretty = options.pretty ?? process.env.enableConsoleOutput !== 'false'
  const errorSerializer = createErrorSerializer()

  return {
    level,
    ...(pretty
      ? {
          transport: {
            target: 'pino-pretty',
            options: {
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
              colorize: true,
            },
          },
        }
      : {}),
    serializers: {
      err: errorSerializer,
      error: errorSerializer,
    },
  }
}

export function createLogger(options: LoggerSetupOptions = {}): Logger {
  return pino(createLoggerConfig(options))
}

/**
 * Creates a child logger whose messages are prefixed with the upper-cased service name,
 * e.g. `[TRAKT] rate limit reached`.
 */
export function createServiceLogger(parent: Logger, service: string): Logger {
  return parent.child({}, { msgPrefix: `[${service.toUpperCase()}] ` })
}
