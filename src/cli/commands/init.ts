import type { GlobalOptions } from '../args.js'
import { getConfigPath, loadConfig, saveConfig } from '../../config/config-service.js'
import type { AppConfig } from '../../config/config-types.js'
import { ensureLedgerFile } from '../../ledger/index.js'
import { createFormatter } from '../output.js'

/**
 * Writes the effective config if none exists yet and creates an empty ledger.
 * Never overwrites either file.
 */
export const initCommand = async (options: GlobalOptions, config: AppConfig): Promise<void> => {
  const formatter = createFormatter(options.format, options.quiet)
  const configPath = options.config ?? getConfigPath()

  const existing = await loadConfig(configPath)
  if (!existing) {
    await saveConfig(config, configPath)
  }
  const ledgerCreated = await ensureLedgerFile(config.ledger.path)

  const lines = [
    existing ? `Config already exists at ${configPath}` : `Wrote config to ${configPath}`,
    ledgerCreated
      ? `Created ledger at ${config.ledger.path}`
      : `Ledger already exists at ${config.ledger.path}`,
  ]

  formatter.success({
    success: true,
    configPath,
    configCreated: !existing,
    ledgerPath: config.ledger.path,
    ledgerCreated,
    formatted: lines.join('\n'),
  })
}
