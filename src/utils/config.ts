import {
  type TraktConfig,
  TraktConfigSchema,
} from '@schemas/config/trakt-config.schema.js'
import { ConfigError } from '@utils/trakt/errors.js'
import { config as loadDotenv } from 'dotenv'

export interface LoadConfigOptions {
  /** Explicit environment; when omitted `.env` is loaded into `process.env` first */
  env?: NodeJS.ProcessEnv
  /** Path of the dotenv file (default: `.env` in the working directory) */
  envFile?: string
}

/**
 * Validates raw settings into a {@link TraktConfig}.
 *
 * @throws {ConfigError} listing every invalid field
 */
export function parseConfig(raw: unknown): TraktConfig {
  const result = TraktConfigSchema.safeParse(raw)
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => {
        const field = issue.path.map(String).join('.')
        return field ? `${field}: ${issue.message}` : issue.message
      }),
    )
  }
  return result.data
}

/**
 * Reads client settings from environment variables:
 * traktClientId, traktClientSecret, traktEmail, traktPassword, syncMode,
 * traktApiBaseUrl, traktBrowserBaseUrl.
 */
export function loadConfig(options: LoadConfigOptions = {}): TraktConfig {
  let env = options.env
  if (!env) {
    loadDotenv(options.envFile ? { path: options.envFile } : undefined)
    env = process.env
  }

  return parseConfig({
    clientId: env.traktClientId,
    clientSecret: env.traktClientSecret,
    email: env.traktEmail,
    password: env.traktPassword,
    syncMode: env.syncMode,
    apiBaseUrl: env.traktApiBaseUrl || undefined,
    browserBaseUrl: env.traktBrowserBaseUrl || undefined,
  })
}
