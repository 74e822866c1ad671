import type { DotverConfig, DotverOptions } from './types.js'
import process from 'node:process'
import { loadConfig } from 'bunfig'

export const defaultConfig: DotverConfig = {
  // Parsing
  declare: false,

  // UI options
  quiet: false,
  verbose: false,

  // Sorting
  sortFormat: 'stringify',
  sortDirection: 'asc',
}

/**
 * Load dotver configuration with overrides
 *
 * The config file is `dotver.config.js` in the working directory. Node does
 * not import a `dotver.config.ts`, so under Node that file is skipped.
 */
const cachedConfigs = new Map<string, DotverConfig>()

async function getConfig(cwd: string): Promise<DotverConfig> {
  const cached = cachedConfigs.get(cwd)
  if (cached)
    return cached

  const loaded = await loadConfig({
    name: 'dotver',
    cwd,
    defaultConfig,
  })

  // Merge with defaults to ensure completeness
  const config = { ...defaultConfig, ...loaded }
  cachedConfigs.set(cwd, config)
  return config
}

export async function loadDotverConfig(overrides?: DotverOptions, cwd: string = process.cwd()): Promise<DotverConfig> {
  const base = await getConfig(cwd)
  return { ...defaultConfig, ...base, ...overrides }
}

export function resetConfigCache(): void {
  cachedConfigs.clear()
}

/**
 * Define configuration helper for TypeScript config files
 */
export function defineConfig(config: DotverOptions): DotverOptions {
  return config
}
