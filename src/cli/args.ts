import { Command } from 'commander'
import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { dirname, join } from 'node:path'
import { z } from 'zod'

const getVersion = (): string => {
  try {
    const __dirname = dirname(fileURLToPath(import.meta.url))
    const pkgPath = join(__dirname, '..', '..', 'package.json')
    const pkg = z.object({ version: z.string() }).parse(JSON.parse(readFileSync(pkgPath, 'utf-8')))
    return pkg.version
  } catch {
    return '0.0.0'
  }
}

export const outputFormatSchema = z.enum(['json', 'text'], {
  errorMap: () => ({ message: 'Output format must be json or text' }),
})

export type OutputFormat = z.infer<typeof outputFormatSchema>

export interface GlobalOptions {
  format: OutputFormat
  quiet: boolean
  pageSize?: number
  currency?: string
}

export type CommandAction =
  | { command: 'tui'; options: GlobalOptions }
  | { command: 'categories'; options: GlobalOptions }
  | { command: 'config'; options: GlobalOptions }

interface RawGlobalOptions {
  format: string
  quiet: boolean
  pageSize?: string
  currency?: string
}

const toGlobalOptions = (raw: RawGlobalOptions): GlobalOptions => ({
  format: outputFormatSchema.parse(raw.format),
  quiet: raw.quiet,
  pageSize: raw.pageSize === undefined ? undefined : Number(raw.pageSize),
  currency: raw.currency,
})

/**
 * Options typed after a subcommand win; anything the subcommand only has
 * as a default falls back to what was typed before it.
 */
const resolveOptions = (program: Command, sub: Command): GlobalOptions => {
  const parent = program.opts<RawGlobalOptions>()
  const own = sub.opts<RawGlobalOptions>()
  const pick = <K extends keyof RawGlobalOptions>(key: K): RawGlobalOptions[K] =>
    sub.getOptionValueSource(key) === 'cli' ? own[key] : parent[key]

  return toGlobalOptions({
    format: pick('format'),
    quiet: pick('quiet'),
    pageSize: pick('pageSize'),
    currency: pick('currency'),
  })
}

/**
 * Parse CLI arguments and return the command to execute
 * Returns null if --help or --version was displayed
 */
export const parseArgs = (argv: string[]): CommandAction | null => {
  let result: CommandAction | null = null

  // Global options available to every command
  const addGlobalOptions = (cmd: Command) => {
    return cmd
      .option('-f, --format <format>', 'Output format: json or text', 'text')
      .option('-q, --quiet', 'Suppress progress messages', false)
      .option('-p, --page-size <number>', 'Rows visible at once (10-100)')
      .option('-c, --currency <symbol>', 'Currency symbol')
  }

  const program: Command = addGlobalOptions(
    new Command()
      .name('expense-tracker')
      .description('Track expenses in the terminal')
      .version(getVersion())
      // Throw instead of calling process.exit; subcommands inherit this
      .exitOverride()
      // Options after a subcommand name are parsed by the subcommand
      .enablePositionalOptions()
  ).action(() => {
    // Default action when no subcommand is provided - run TUI
    result = { command: 'tui', options: toGlobalOptions(program.opts<RawGlobalOptions>()) }
  })

  const categories: Command = addGlobalOptions(
    program
      .command('categories')
      .description('List accepted transaction categories')
  ).action(() => {
    result = { command: 'categories', options: resolveOptions(program, categories) }
  })

  const config: Command = addGlobalOptions(
    program
      .command('config')
      .description('Show the resolved configuration')
  ).action(() => {
    result = { command: 'config', options: resolveOptions(program, config) }
  })

  try {
    program.parse(argv)
  } catch (err: unknown) {
    // Commander throws on --help and --version, which is expected
    if (err && typeof err === 'object' && 'code' in err) {
      const { code } = err
      if (code === 'commander.helpDisplayed' || code === 'commander.version') {
        return null
      }
    }
    throw err
  }

  return result
}
