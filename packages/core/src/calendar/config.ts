/**
 * Connection Configuration Loader
 *
 * Resolves the CalDAV URL and credentials. Precedence, highest first:
 * CLI flags, environment variables, the `caldav:` section of a YAML file
 * (`--config <path>` or CALDAV_MCP_CONFIG).
 */

import { existsSync, readFileSync } from 'node:fs'
import { parse } from 'yaml'
import { z } from 'zod'
import { ConfigurationError } from './errors.js'
import type { ConnectionSettings } from './types.js'

export interface ConfigOverrides {
  url?: string
  username?: string
  password?: string
  /** YAML config file */
  configPath?: string
}

type Env = Record<string, string | undefined>

const fileSchema = z.object({
  caldav: z
    .object({
      url: z.string().optional(),
      username: z.string().optional(),
      password: z.string().optional(),
    })
    .optional(),
})

const settingsSchema = z.object({
  url: z.string().url(),
  username: z.string().min(1),
  password: z.string().min(1),
})

type FileSection = NonNullable<z.infer<typeof fileSchema>['caldav']>

/**
 * Read the `caldav:` section of a YAML config file.
 */
export function loadConfigFile(configPath: string): FileSection {
  if (!existsSync(configPath)) {
    throw new ConfigurationError(`Config file not found: ${configPath}`)
  }

  let raw: unknown
  try {
    raw = parse(readFileSync(configPath, 'utf-8'))
  } catch (err) {
    throw new ConfigurationError(
      `Could not parse ${configPath}: ${err instanceof Error ? err.message : String(err)}`,
    )
  }

  // An empty file parses to null
  const result = fileSchema.safeParse(raw ?? {})
  if (!result.success) {
    const issue = result.error.issues[0]
    throw new ConfigurationError(
      `Invalid config file ${configPath}: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unexpected shape'}`,
    )
  }

  return result.data.caldav ?? {}
}

function firstSet(...values: Array<string | undefined>): string | undefined {
  return values.find((value) => value !== undefined && value.trim() !== '')
}

/**
 * Resolve connection settings.
 *
 * @throws ConfigurationError listing the variables that are missing, or
 *   describing a malformed URL
 */
export function loadConnectionSettings(
  overrides: ConfigOverrides = {},
  env: Env = process.env,
): ConnectionSettings {
  const configPath = firstSet(overrides.configPath, env.CALDAV_MCP_CONFIG)
  const file = configPath ? loadConfigFile(configPath) : {}

  const url = firstSet(overrides.url, env.CALDAV_URL, file.url)
  const username = firstSet(
    overrides.username,
    env.CALDAV_USERNAME,
    env.YANDEX_USERNAME,
    file.username,
  )
  const password = firstSet(
    overrides.password,
    env.CALDAV_PASSWORD,
    env.YANDEX_PASSWORD,
    file.password,
  )

  const missing: string[] = []
  if (!url) missing.push('CALDAV_URL')
  if (!username) missing.push('CALDAV_USERNAME')
  if (!password) missing.push('CALDAV_PASSWORD')
  if (missing.length > 0) {
    throw new ConfigurationError(
      `CalDAV connection is not configured. Missing: ${missing.join(', ')}. ` +
        'Set them in the environment, pass --caldav-url/--caldav-username/--caldav-password, ' +
        'or add a caldav section to the config file.',
      missing,
    )
  }

  const result = settingsSchema.safeParse({ url: url?.trim(), username, password })
  if (!result.success) {
    throw new ConfigurationError(`Invalid CALDAV_URL "${url ?? ''}": expected an absolute URL`)
  }

  return result.data
}

/**
 * MCP_VERBOSE turns on debug logging (`1`, `true`, `yes`).
 */
export function isVerboseEnv(env: Env = process.env): boolean {
  const value = env.MCP_VERBOSE?.trim().toLowerCase()
  return value === '1' || value === 'true' || value === 'yes'
}
