import { Command, Option } from 'commander'
import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { dirname, join } from 'node:path'
import { z } from 'zod'
import { TIME_BUCKETS } from '../analytics/types.js'

const getVersion = (): string => {
  const here = dirname(fileURLToPath(import.meta.url))
  // src/cli/args.ts when run from source, dist/cli.js when bundled
  for (const pkgPath of [join(here, '..', '..', 'package.json'), join(here, '..', 'package.json')]) {
    try {
      const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'))
      const parsed = z.object({ version: z.string() }).safeParse(pkg)
      if (parsed.success) return parsed.data.version
    } catch {
      continue
    }
  }
  return '0.0.0'
}

export const OUTPUT_FORMATS = ['json', 'text'] as const

export type OutputFormat = (typeof OUTPUT_FORMATS)[number]

const globalOptionsSchema = z.object({
  format: z.enum(OUTPUT_FORMATS).default('text'),
  quiet: z.boolean().default(false),
  ledger: z.string().optional(),
  config: z.string().optional(),
})

const tuiOptionsSchema = z.object({
  search: z.string().optional(),
  ledger: z.string().optional(),
  config: z.string().optional(),
})

const addOptionsSchema = globalOptionsSchema.extend({
  date: z.string().optional(),
  description: z.string().optional(),
  category: z.string().optional(),
  amount: z.string().optional(),
})

const searchOptionsSchema = globalOptionsSchema.extend({
  query: z.string(),
  limit: z.coerce.number().int().positive().optional(),
})

const summaryOptionsSchema = globalOptionsSchema.extend({
  bucket: z.enum(TIME_BUCKETS).optional(),
})

const logsOptionsSchema = globalOptionsSchema.extend({
  lines: z.coerce.number().int().positive().default(20),
})

export type GlobalOptions = z.infer<typeof globalOptionsSchema>
export type TuiOptions = z.infer<typeof tuiOptionsSchema>
export type AddOptions = z.infer<typeof addOptionsSchema>
export type SearchOptions = z.infer<typeof searchOptionsSchema>
export type SummaryOptions = z.infer<typeof summaryOptionsSchema>
export type LogsOptions = z.infer<typeof logsOptionsSchema>

export type CommandAction =
  | { command: 'tui'; options: TuiOptions }
  | { command: 'add'; options: AddOptions }
  | { command: 'edit'; options: GlobalOptions }
  | { command: 'search'; options: SearchOptions }
  | { command: 'summary'; options: SummaryOptions }
  | { command: 'logs'; options: LogsOptions }
  | { command: 'init'; options: GlobalOptions }

/**
 * Parse CLI arguments and return the command to execute
 * Returns null if --help or --version was displayed
 */
export const parseArgs = (argv: string[]): CommandAction | null => {
  let result: CommandAction | null = null

  const program = new Command()
    .name('tally')
    .description('Personal finance ledger with a terminal dashboard')
    .version(getVersion())
    .enablePositionalOptions()
    .exitOverride()
    .option('-s, --search <query>', 'Open the dashboard filtered by a search')
    .option('--ledger <path>', 'Path to the ledger CSV file')
    .option('--config <path>', 'Path to config file')
    .action((options) => {
      // Default action when no subcommand is provided - run TUI
      result = { command: 'tui', options: tuiOptionsSchema.parse(options) }
    })

  // --ledger and --config may also be given before the subcommand name
  const withProgramOptions = (options: object) => ({ ...program.opts(), ...options })

  // Global options available to all subcommands
  const addGlobalOptions = (cmd: Command) => {
    return cmd
      .addOption(
        new Option('-f, --format <format>', 'Output format').choices(OUTPUT_FORMATS).default('text')
      )
      .option('-q, --quiet', 'Suppress progress messages', false)
      .option('--ledger <path>', 'Path to the ledger CSV file')
      .option('--config <path>', 'Path to config file')
  }

  addGlobalOptions(
    program
      .command('add')
      .description('Add a transaction (prompts for anything not given)')
      .option('-d, --date <date>', 'Date as YYYY-MM-DD or YYYY/MM/DD')
      .option('--description <text>', 'What the money was for')
      .option('-c, --category <name>', 'Category, e.g. Food or Travel')
      .option('-a, --amount <amount>', 'Signed amount; negative for expenses')
  ).action((options) => {
    result = { command: 'add', options: addOptionsSchema.parse(withProgramOptions(options)) }
  })

  addGlobalOptions(
    program.command('edit').description('Edit the ledger file in $EDITOR')
  ).action((options) => {
    result = { command: 'edit', options: globalOptionsSchema.parse(withProgramOptions(options)) }
  })

  addGlobalOptions(
    program
      .command('search')
      .description('Search by exact category or fuzzy description')
      .argument('<query>', 'Text to search for')
      .option('-l, --limit <number>', 'Maximum number of results')
  ).action((query: string, options) => {
    result = { command: 'search', options: searchOptionsSchema.parse({ ...withProgramOptions(options), query }) }
  })

  addGlobalOptions(
    program
      .command('summary')
      .description('Print dashboard totals')
      .addOption(new Option('-b, --bucket <bucket>', 'Time series bucket').choices(TIME_BUCKETS))
  ).action((options) => {
    result = { command: 'summary', options: summaryOptionsSchema.parse(withProgramOptions(options)) }
  })

  addGlobalOptions(
    program
      .command('logs')
      .description('Show the end of the log file')
      .option('-n, --lines <number>', 'Number of lines to show', '20')
  ).action((options) => {
    result = { command: 'logs', options: logsOptionsSchema.parse(withProgramOptions(options)) }
  })

  addGlobalOptions(
    program.command('init').description('Write a default config and create the ledger file')
  ).action((options) => {
    result = { command: 'init', options: globalOptionsSchema.parse(withProgramOptions(options)) }
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
