import { loadConfig as loadConfigFile } from './config-service.js'
import { appConfigSchema, DEFAULT_EDITOR, expandHome, type AppConfig } from './config-types.js'

/**
 * Environment variables that override the config file
 */
export const ENV_VARS = {
  TALLY_LEDGER: 'TALLY_LEDGER',
  TALLY_LOG_LEVEL: 'TALLY_LOG_LEVEL',
  EDITOR: 'EDITOR',
} as const

type Env = Record<string, string | undefined>

export interface LoadConfigOptions {
  /** Config file to read instead of the default */
  configPath?: string
  /** Ledger path from the command line; beats every other source */
  ledgerPath?: string
  env?: Env
}

interface LoadConfigResult {
  config: AppConfig
  source: 'env' | 'file' | 'mixed' | 'defaults'
}

/**
 * Load config from the config file with environment overrides.
 * Precedence: command line, then env vars, then the file, then defaults.
 */
export const loadConfigWithEnv = async (
  options: LoadConfigOptions = {}
): Promise<LoadConfigResult> => {
  const env = options.env ?? process.env
  const fileConfig = await loadConfigFile(options.configPath)

  const envLedger = env[ENV_VARS.TALLY_LEDGER] || undefined
  const envLogLevel = env[ENV_VARS.TALLY_LOG_LEVEL] || undefined
  const usedEnv = !!(envLedger || envLogLevel)

  const merged = {
    ledger: {
      path: options.ledgerPath || envLedger || fileConfig?.ledger.path,
    },
    display: { ...fileConfig?.display },
    log: {
      level: envLogLevel || fileConfig?.log.level,
      file: fileConfig?.log.file,
    },
    editor: fileConfig?.editor,
  }

  // Validate with zod schema; fills defaults for anything left undefined
  const result = appConfigSchema.safeParse(merged)
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new Error(`Invalid configuration: ${issues}`)
  }

  const config: AppConfig = {
    ...result.data,
    ledger: { path: expandHome(result.data.ledger.path) },
    log: { ...result.data.log, file: expandHome(result.data.log.file) },
  }

  let source: LoadConfigResult['source']
  if (fileConfig) {
    source = usedEnv ? 'mixed' : 'file'
  } else {
    source = usedEnv ? 'env' : 'defaults'
  }

  return { config, source }
}

/**
 * Picks the editor for `tally edit`: config, then $EDITOR, then nano.
 */
export const resolveEditor = (config: AppConfig, env: Env = process.env): string =>
  config.editor || env[ENV_VARS.EDITOR] || DEFAULT_EDITOR
