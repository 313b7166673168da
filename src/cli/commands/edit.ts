import type { GlobalOptions } from '../args.js'
import type { AppConfig } from '../../config/config-types.js'
import { resolveEditor } from '../../config/config-loader.js'
import { ensureLedgerFile } from '../../ledger/index.js'
import { openInEditor } from '../../shared/editor.js'
import { createLogger } from '../../shared/logger.js'
import { openLedger } from '../ledger.js'
import { createFormatter } from '../output.js'

const log = createLogger('edit')

/**
 * Opens the ledger in the user's editor, then re-reads it so that
 * a record broken by hand is reported straight away.
 */
export const editCommand = async (options: GlobalOptions, config: AppConfig): Promise<void> => {
  const formatter = createFormatter(options.format, options.quiet)
  const path = config.ledger.path

  if (await ensureLedgerFile(path)) {
    formatter.progress(`Created ${path}`)
  }

  const editor = resolveEditor(config)
  formatter.progress(`Opening ${path} in ${editor}...`)
  const status = openInEditor(editor, path)
  if (status !== 0) {
    formatter.warn(`${editor} exited with code ${status}`)
  }

  const store = await openLedger(path, formatter)
  log.info(`Ledger reloaded after edit with ${store.size()} transactions`)

  formatter.success({
    success: true,
    path,
    count: store.size(),
    formatted: `${path}: ${store.size()} transactions`,
  })
}
