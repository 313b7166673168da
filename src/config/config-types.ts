import { homedir } from 'node:os'
import { join } from 'node:path'
import { z } from 'zod'
import { TIME_BUCKETS } from '../analytics/types.js'
import { LOG_LEVELS } from '../shared/logger.js'

export const CONFIG_DIR = join(homedir(), '.config', 'tally')
export const DATA_DIR = join(homedir(), '.local', 'share', 'tally')
export const DEFAULT_LEDGER_PATH = join(DATA_DIR, 'transactions.csv')
export const DEFAULT_LOG_PATH = join(DATA_DIR, 'tally.log')
export const DEFAULT_EDITOR = 'nano'

export const appConfigSchema = z.object({
  ledger: z
    .object({
      path: z.string().min(1).default(DEFAULT_LEDGER_PATH),
    })
    .default({}),
  display: z
    .object({
      pageSize: z.number().int().min(5).max(100).default(20),
      bucket: z.enum(TIME_BUCKETS).default('month'),
    })
    .default({}),
  log: z
    .object({
      level: z.enum(LOG_LEVELS).default('info'),
      file: z.string().min(1).default(DEFAULT_LOG_PATH),
    })
    .default({}),
  editor: z.string().min(1).optional(),
})

export type AppConfig = z.infer<typeof appConfigSchema>

/**
 * Expands a leading `~` to the home directory.
 */
export const expandHome = (path: string): string =>
  path === '~' || path.startsWith('~/') ? join(homedir(), path.slice(1)) : path
