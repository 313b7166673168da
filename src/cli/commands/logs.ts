import { existsSync } from 'node:fs'
import { readFile } from 'node:fs/promises'
import type { LogsOptions } from '../args.js'
import type { AppConfig } from '../../config/config-types.js'
import { createFormatter } from '../output.js'

/**
 * Last `count` non-empty lines of `text`.
 */
export const tailLines = (text: string, count: number): string[] => {
  const lines = text.split('\n').filter((line) => line.trim().length > 0)
  return count >= lines.length ? lines : lines.slice(lines.length - count)
}

export const logsCommand = async (options: LogsOptions, config: AppConfig): Promise<void> => {
  const formatter = createFormatter(options.format, options.quiet)
  const path = config.log.file

  if (!existsSync(path)) {
    formatter.success({ success: true, path, lines: [], formatted: `No log file at ${path}` })
    return
  }

  const lines = tailLines(await readFile(path, 'utf-8'), options.lines)
  formatter.success({ success: true, path, lines, formatted: lines.join('\n') })
}
