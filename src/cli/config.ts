/**
 * CLI Configuration
 *
 * Resolves the cache backend from EXTRACTION_CACHE_* environment variables,
 * with command-line flags taking precedence. Defaults live under
 * ~/.cache/extraction-cache (XDG style).
 */

import { homedir } from 'node:os'
import { join } from 'node:path'
import { z } from 'zod'
import { CacheError } from '../cache/errors'
import type { CacheConfig } from '../cache/factory'

const DEFAULT_CACHE_ROOT = join(homedir(), '.cache', 'extraction-cache')
export const DEFAULT_CACHE_DIR = join(DEFAULT_CACHE_ROOT, 'entries')
export const DEFAULT_CACHE_DB = join(DEFAULT_CACHE_ROOT, 'cache.db')

/** Environment variable read for each setting */
export const CONFIG_ENV_VARS = {
  backend: 'EXTRACTION_CACHE_BACKEND',
  directory: 'EXTRACTION_CACHE_DIR',
  path: 'EXTRACTION_CACHE_DB',
  maxSize: 'EXTRACTION_CACHE_MAX_SIZE',
  ttlSeconds: 'EXTRACTION_CACHE_TTL_SECONDS'
} as const

type ConfigField = keyof typeof CONFIG_ENV_VARS

const CONFIG_FIELDS: readonly ConfigField[] = [
  'backend',
  'directory',
  'path',
  'maxSize',
  'ttlSeconds'
]

function isConfigField(value: unknown): value is ConfigField {
  return CONFIG_FIELDS.some((field) => field === value)
}

/**
 * Raw setting values as typed on the command line.
 */
export type CacheConfigOverrides = { readonly [K in ConfigField]?: string | undefined }

const settingsSchema = z.object({
  backend: z.enum(['memory', 'file', 'sqlite']).default('file'),
  directory: z.string().default(DEFAULT_CACHE_DIR),
  path: z.string().default(DEFAULT_CACHE_DB),
  maxSize: z.coerce.number().int().min(1).optional(),
  // "none" disables expiry
  ttlSeconds: z
    .string()
    .transform((value) => (value.toLowerCase() === 'none' ? null : value))
    .pipe(z.coerce.number().finite().nonnegative().nullable())
    .default('none')
})

function pickSettings(
  env: NodeJS.ProcessEnv,
  overrides: CacheConfigOverrides
): Partial<Record<ConfigField, string>> {
  const settings: Partial<Record<ConfigField, string>> = {}
  for (const field of CONFIG_FIELDS) {
    const value = (overrides[field] ?? env[CONFIG_ENV_VARS[field]])?.trim()
    // Empty means unset
    if (value) settings[field] = value
  }
  return settings
}

/**
 * Build a cache configuration from the environment and CLI overrides.
 *
 * @throws CacheError (operation 'config') listing every invalid setting
 */
export function loadCacheConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: CacheConfigOverrides = {}
): CacheConfig {
  const parsed = settingsSchema.safeParse(pickSettings(env, overrides))

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const field = issue.path[0]
      const label = isConfigField(field) ? `${field} (${CONFIG_ENV_VARS[field]})` : 'config'
      return `${label}: ${issue.message}`
    })
    throw new CacheError(`Invalid cache configuration: ${issues.join('; ')}`, {
      operation: 'config',
      details: { issues }
    })
  }

  const { backend, directory, path, maxSize, ttlSeconds } = parsed.data
  switch (backend) {
    case 'memory':
      return { backend, maxSize, ttlSeconds }
    case 'file':
      return { backend, directory, ttlSeconds }
    case 'sqlite':
      return { backend, path, maxSize, ttlSeconds }
  }
}
