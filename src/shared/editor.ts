import { spawnSync } from 'node:child_process'
import { createLogger } from './logger.js'

const log = createLogger('editor')

/**
 * Opens `file` in `editor` and blocks until the editor exits.
 * `editor` may carry arguments, e.g. "code --wait".
 * Returns the editor's exit code.
 */
export const openInEditor = (editor: string, file: string): number => {
  const [command, ...args] = editor.split(/\s+/).filter((part) => part.length > 0)
  if (!command) {
    throw new Error('No editor configured')
  }

  log.trace(`Choosing '${editor}' as the editor`)
  const result = spawnSync(command, [...args, file], { stdio: 'inherit' })

  if (result.error) {
    throw new Error(`Could not start editor "${editor}": ${result.error.message}`)
  }

  const status = result.status ?? 0
  log.info(`Editor exited with code ${status}`)
  return status
}
