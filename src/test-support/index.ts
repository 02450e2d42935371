/**
 * Test Support Module
 *
 * Fingerprints, temp directories and logger spies shared by the cache tests.
 */

import { mkdtempSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { type Mock, vi } from 'vitest'
import { Fingerprint } from '../fingerprint'
import type { Logger } from '../logger'

/**
 * Create a fingerprint whose content hash is the given label.
 */
export function createKey(label: string, overrides: { provider?: string; model?: string } = {}) {
  return new Fingerprint({
    contentHash: label,
    promptHash: 'p',
    schemaHash: 's',
    provider: overrides.provider ?? 'g',
    model: overrides.model
  })
}

/**
 * Create an isolated temp directory. Call the returned cleanup in afterEach.
 */
export function createTempDir(prefix: string): { dir: string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), `${prefix}-`))
  return {
    dir,
    cleanup: () => rmSync(dir, { recursive: true, force: true })
  }
}

export type LoggerSpy = { [K in keyof Logger]: Mock<(msg: string) => void> }

/**
 * Logger whose methods are vitest spies.
 */
export function createLoggerSpy(): LoggerSpy {
  return {
    log: vi.fn<(msg: string) => void>(),
    verbose: vi.fn<(msg: string) => void>(),
    success: vi.fn<(msg: string) => void>(),
    warn: vi.fn<(msg: string) => void>(),
    error: vi.fn<(msg: string) => void>()
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}
