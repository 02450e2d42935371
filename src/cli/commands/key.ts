/**
 * Key Command
 *
 * Print the fingerprint a document and extraction request would be cached
 * under. No cache is opened.
 */

import { existsSync } from 'node:fs'
import { describeError } from '../../cache/errors'
import { deriveFingerprintFromFile, type Fingerprint } from '../../fingerprint'
import type { Logger } from '../../logger'
import type { CLIArgs } from '../args'

function parseSchema(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch (error) {
    throw new Error(`Invalid --schema JSON: ${describeError(error)}`)
  }
}

/**
 * Execute the key command. The canonical key goes to stdout.
 */
export async function cmdKey(args: CLIArgs, logger: Logger): Promise<Fingerprint> {
  if (!args.file) {
    throw new Error('No input file specified')
  }
  if (!existsSync(args.file)) {
    throw new Error(`File not found: ${args.file}`)
  }
  if (!args.prompt || !args.provider) {
    throw new Error('Both --prompt and --provider are required')
  }

  const key = await deriveFingerprintFromFile(args.file, {
    prompt: args.prompt,
    schema: parseSchema(args.schema),
    provider: args.provider,
    model: args.model
  })

  logger.verbose(`content ${key.contentHash}`)
  logger.verbose(`prompt  ${key.promptHash}`)
  logger.verbose(`schema  ${key.schemaHash}`)
  console.log(key.toString())
  return key
}
