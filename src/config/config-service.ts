import { dirname, join } from 'node:path'
import { readFile, writeFile, mkdir } from 'node:fs/promises'
import { existsSync } from 'node:fs'
import { appConfigSchema, CONFIG_DIR, type AppConfig } from './config-types.js'

const CONFIG_FILE = join(CONFIG_DIR, 'config.json')

export const getConfigPath = () => CONFIG_FILE

/**
 * Reads and validates the config file. Returns null when there is none.
 * Throws if the file exists but is not valid JSON or fails the schema.
 */
export const loadConfig = async (path: string = CONFIG_FILE): Promise<AppConfig | null> => {
  if (!existsSync(path)) return null

  const content = await readFile(path, 'utf-8')
  let parsed: unknown
  try {
    parsed = JSON.parse(content)
  } catch (err) {
    throw new Error(
      `Config file ${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`
    )
  }

  const result = appConfigSchema.safeParse(parsed)
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new Error(`Config file ${path} is invalid: ${issues}`)
  }
  return result.data
}

export const saveConfig = async (config: AppConfig, path: string = CONFIG_FILE): Promise<void> => {
  await mkdir(dirname(path), { recursive: true })
  await writeFile(path, JSON.stringify(config, null, 2))
}
