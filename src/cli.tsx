#!/usr/bin/env node
import React from 'react'
import { render } from 'ink'
import { App } from './app.js'
import { runDashboardSession } from './dashboard/dashboard-session.js'
import type { AppConfig } from './config/config-types.js'
import { parseArgs, type CommandAction } from './cli/args.js'
import { loadConfigWithEnv, resolveEditor } from './config/config-loader.js'
import {
  addCommand,
  editCommand,
  initCommand,
  logsCommand,
  searchCommand,
  summaryCommand,
} from './cli/commands/index.js'
import {
  ensureLedgerFile,
  loadStore,
  ParseError,
  reloadStore,
  type TransactionStore,
} from './ledger/index.js'
import { openInEditor } from './shared/editor.js'
import { configureLogger, createLogger } from './shared/logger.js'

const log = createLogger('main')

const runTuiMode = async (config: AppConfig, initialQuery?: string) => {
  await ensureLedgerFile(config.ledger.path)

  let store: TransactionStore
  try {
    store = await loadStore(config.ledger.path)
  } catch (err) {
    if (err instanceof ParseError) {
      throw new Error(
        `Could not read ledger ${config.ledger.path}: ${err.message}. Run 'tally edit' to fix it.`
      )
    }
    throw err
  }

  await runDashboardSession(
    { query: initialQuery ?? '', bucket: config.display.bucket },
    {
      mount: (view, onEdit) =>
        render(<App config={config} store={store} initialView={view} onEdit={onEdit} />),
      // Re-render with whatever the file holds now
      edit: async () => {
        openInEditor(resolveEditor(config), config.ledger.path)
        await reloadStore(store, config.ledger.path)
      },
      onEditError: (err) => {
        // A missing editor or a broken edit keeps the previous contents
        const message = err instanceof Error ? err.message : String(err)
        log.error(message)
        process.stderr.write(`Ledger not reloaded: ${message}\n`)
      },
    }
  )
}

const runCliCommand = async (action: CommandAction) => {
  const { config, source } = await loadConfigWithEnv({
    configPath: action.options.config,
    ledgerPath: action.options.ledger,
  })

  configureLogger({ level: config.log.level, file: config.log.file })
  log.info('====Starting tally====')
  log.debug(`Config loaded from ${source}, ledger at ${config.ledger.path}`)

  // Execute the command
  switch (action.command) {
    case 'tui':
      await runTuiMode(config, action.options.search)
      break
    case 'add':
      await addCommand(action.options, config)
      break
    case 'edit':
      await editCommand(action.options, config)
      break
    case 'search':
      await searchCommand(action.options, config)
      break
    case 'summary':
      await summaryCommand(action.options, config)
      break
    case 'logs':
      await logsCommand(action.options, config)
      break
    case 'init':
      await initCommand(action.options, config)
      break
  }

  log.info('====Exiting tally====')
}

const main = async () => {
  try {
    // Parse command line arguments
    const action = parseArgs(process.argv)

    // If null, --help or --version was displayed
    if (!action) {
      process.exit(0)
    }

    await runCliCommand(action)
  } catch (error) {
    log.error(error instanceof Error ? error.message : String(error))
    console.error('Error:', error instanceof Error ? error.message : error)
    process.exit(1)
  }
}

void main()
