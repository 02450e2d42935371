/**
 * CLI Argument Parsing
 *
 * Uses commander for subcommand-based CLI with per-command options.
 */

import { Command, type OptionValues } from 'commander'
import { VERSION } from '../index'
import type { CacheConfigOverrides } from './config'

export type CommandName = 'stats' | 'cleanup' | 'clear' | 'key' | 'help'

export interface CLIArgs {
  command: CommandName
  quiet: boolean
  verbose: boolean
  /** Backend settings given as flags; unset ones come from the environment */
  cache: CacheConfigOverrides
  /** For stats command: print machine-readable JSON */
  json: boolean
  /** For key command: document to fingerprint */
  file: string | undefined
  prompt: string | undefined
  /** For key command: schema as JSON text */
  schema: string
  provider: string | undefined
  model: string | undefined
}

const DESCRIPTION = `Inspect and maintain the extraction result cache.

Backends:
  • file    one JSON file per entry (default)
  • sqlite  single database file with LRU eviction
  • memory  process lifetime only (useful with "key")

Settings come from EXTRACTION_CACHE_BACKEND, EXTRACTION_CACHE_DIR,
EXTRACTION_CACHE_DB, EXTRACTION_CACHE_MAX_SIZE and EXTRACTION_CACHE_TTL_SECONDS;
the flags below override them.

Examples:
  $ extraction-cache stats
  $ extraction-cache --backend sqlite --db ./cache.db cleanup
  $ extraction-cache key invoice.pdf --prompt "Extract all invoice details" --provider gemini`

function createProgram(): Command {
  const program = new Command()
    .name('extraction-cache')
    .description(DESCRIPTION)
    .version(VERSION, '-V, --version', 'Show version number')
    // Global options inherited by all subcommands
    .option('-q, --quiet', 'Minimal output')
    .option('-v, --verbose', 'Verbose output')
    .option('--backend <name>', 'Cache backend: memory, file, sqlite')
    .option('--dir <dir>', 'Entry directory for the file backend')
    .option('--db <path>', 'Database file for the sqlite backend')
    .option('--max-size <num>', 'Entry limit for the memory and sqlite backends')
    .option('--ttl <seconds>', 'Default TTL in seconds, or "none"')

  program
    .command('stats')
    .description('Show entry count, hit rate and configuration')
    .option('--json', 'Output as JSON')

  program.command('cleanup').description('Remove expired entries')

  program.command('clear').description('Remove every entry')

  program
    .command('key')
    .description('Print the cache key for a document and extraction request')
    .argument('<file>', 'Document file')
    .requiredOption('--prompt <text>', 'Extraction prompt')
    .option('--schema <json>', 'Output schema as JSON', '{}')
    .requiredOption('--provider <id>', 'Provider identifier (e.g. gemini, openai)')
    .option('--model <id>', 'Model identifier')

  return program
}

function stringOption(opts: OptionValues, name: string): string | undefined {
  const value: unknown = opts[name]
  return typeof value === 'string' ? value : undefined
}

function parseCommandName(name: string): CommandName {
  if (name === 'stats' || name === 'cleanup' || name === 'clear' || name === 'key') {
    return name
  }
  return 'help'
}

function buildCLIArgs(commandName: string, file: string | undefined, opts: OptionValues): CLIArgs {
  return {
    command: parseCommandName(commandName),
    quiet: opts['quiet'] === true,
    verbose: opts['verbose'] === true,
    cache: {
      backend: stringOption(opts, 'backend'),
      directory: stringOption(opts, 'dir'),
      path: stringOption(opts, 'db'),
      maxSize: stringOption(opts, 'maxSize'),
      ttlSeconds: stringOption(opts, 'ttl')
    },
    json: opts['json'] === true,
    file,
    prompt: stringOption(opts, 'prompt'),
    schema: stringOption(opts, 'schema') ?? '{}',
    provider: stringOption(opts, 'provider'),
    model: stringOption(opts, 'model')
  }
}

/**
 * Attach action handlers that capture the parsed args of whichever
 * subcommand runs. optsWithGlobals() includes the program's options.
 */
function captureArgs(program: Command, capture: (args: CLIArgs) => void): void {
  for (const cmd of program.commands) {
    cmd.action(() => {
      capture(buildCLIArgs(cmd.name(), cmd.args[0], cmd.optsWithGlobals()))
    })
  }
}

/**
 * Parse CLI arguments and return structured args.
 * Exits on --help or --version.
 */
export function parseCliArgs(): CLIArgs {
  const program: Command = createProgram()

  let result: CLIArgs | null = null
  captureArgs(program, (args) => {
    result = args
  })

  program.parse()

  if (!result) {
    program.help()
  }

  return result
}

/**
 * Parse CLI arguments from an argv array (for testing).
 */
export function parseArgs(argv: string[], exitOnHelp = true): CLIArgs {
  const program = createProgram()

  if (!exitOnHelp) {
    // Subcommands were created before the override and need their own
    for (const cmd of [program, ...program.commands]) {
      cmd.exitOverride()
    }
  }

  let result: CLIArgs | null = null
  captureArgs(program, (args) => {
    result = args
  })

  try {
    program.parse(argv, { from: 'user' })
  } catch {
    // exitOverride throws on help, version and usage errors
    return result ?? buildCLIArgs('help', undefined, {})
  }

  return result ?? buildCLIArgs('help', undefined, {})
}
