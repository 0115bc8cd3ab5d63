import { homedir } from 'node:os'
import { dirname, join } from 'node:path'
import { readFile, writeFile, mkdir } from 'node:fs/promises'
import { existsSync } from 'node:fs'
import { appConfigSchema, type AppConfig } from './config-types.js'

const CONFIG_FILE = join(homedir(), '.config', 'order-spend', 'config.json')

export const getConfigPath = () => CONFIG_FILE

export const loadConfig = async (path = CONFIG_FILE): Promise<AppConfig | null> => {
  try {
    if (!existsSync(path)) return null
    const content = await readFile(path, 'utf-8')
    const parsed: unknown = JSON.parse(content)
    return appConfigSchema.parse(parsed)
  } catch {
    return null
  }
}

export const saveConfig = async (config: AppConfig, path = CONFIG_FILE): Promise<void> => {
  await mkdir(dirname(path), { recursive: true })
  await writeFile(path, JSON.stringify(config, null, 2))
}

export const isConfigured = async (path = CONFIG_FILE): Promise<boolean> => {
  const config = await loadConfig(path)
  return !!config?.files.ordersPath
}
