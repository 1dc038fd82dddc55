import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import { parse as parseYaml } from 'yaml'
import { z } from 'zod'
import { defaultCatalogPath } from '../data/catalog.js'

/**
 * Configuration options for linkdeck
 */
export interface LinkdeckConfig {
  /**
   * Catalog file (JSON or YAML). Relative paths in a config file resolve
   * against that file's directory.
   */
  catalog?: string

  /**
   * Module id or display name committed at startup
   */
  module?: string

  /**
   * Append log lines to this file
   */
  logFile?: string

  /**
   * Enable debug logging
   */
  debug?: boolean
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly configPath: string | null
  ) {
    super(message)
    this.name = 'ConfigError'
  }
}

/**
 * Config file names to search for, in order of priority
 */
export const CONFIG_FILES = [
  'linkdeck.config.yaml',
  'linkdeck.config.yml',
  'linkdeck.config.json',
  '.linkdeckrc',
]

const ConfigSchema = z
  .object({
    catalog: z.string().min(1).optional(),
    module: z.string().min(1).optional(),
    logFile: z.string().min(1).optional(),
    debug: z.boolean().optional(),
  })
  .strict()

/**
 * Per-user config, consulted when no project config is found
 */
export function homeConfigPath(homeDir: string = os.homedir()): string {
  return path.join(homeDir, '.linkdeck', 'config.yaml')
}

/**
 * Find the config file in the given directory or its parents, falling back
 * to the per-user config
 */
export function findConfigFile(startDir: string, homeDir?: string): string | null {
  let currentDir = path.resolve(startDir)

  while (true) {
    for (const configFile of CONFIG_FILES) {
      const configPath = path.join(currentDir, configFile)
      if (fs.existsSync(configPath)) {
        return configPath
      }
    }

    const parentDir = path.dirname(currentDir)
    if (parentDir === currentDir) {
      // Reached filesystem root
      break
    }
    currentDir = parentDir
  }

  const userConfig = homeConfigPath(homeDir)
  return fs.existsSync(userConfig) ? userConfig : null
}

/**
 * Validate a parsed config value and return typed config.
 * An empty document is an empty config.
 */
export function validateConfig(raw: unknown, configPath: string): LinkdeckConfig {
  if (raw === null || raw === undefined) {
    return {}
  }

  const result = ConfigSchema.safeParse(raw)
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  - ${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('\n')
    throw new ConfigError(`Invalid config in ${configPath}:\n${issues}`, configPath)
  }

  const config: LinkdeckConfig = { ...result.data }
  const baseDir = path.dirname(configPath)
  if (config.catalog !== undefined) {
    config.catalog = path.resolve(baseDir, config.catalog)
  }
  if (config.logFile !== undefined) {
    config.logFile = path.resolve(baseDir, config.logFile)
  }
  return config
}

/**
 * Load config from a specific file path. `.json` files are parsed as JSON,
 * everything else (including `.linkdeckrc`) as YAML.
 */
export function loadConfigFromFile(configPath: string): LinkdeckConfig {
  if (!fs.existsSync(configPath)) {
    throw new ConfigError(`Config file not found: ${configPath}`, configPath)
  }

  const content = fs.readFileSync(configPath, 'utf-8')
  let raw: unknown
  try {
    raw = path.extname(configPath) === '.json' ? JSON.parse(content) : parseYaml(content)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new ConfigError(`Failed to parse config file: ${configPath}\nReason: ${message}`, configPath)
  }

  return validateConfig(raw, configPath)
}

/**
 * Load configuration from a config file
 * Searches for config files starting from the given directory
 *
 * @returns Loaded config or empty object if no config file found
 */
export function loadConfig(startDir?: string, homeDir?: string): LinkdeckConfig {
  const configPath = findConfigFile(startDir || process.cwd(), homeDir)
  return configPath ? loadConfigFromFile(configPath) : {}
}

function parseBoolean(name: string, value: string): boolean {
  switch (value.toLowerCase()) {
    case 'true':
    case '1':
      return true
    case 'false':
    case '0':
      return false
    default:
      throw new ConfigError(`Invalid ${name} value: ${value}. Must be true or false.`, null)
  }
}

/**
 * Settings from LINKDECK_* environment variables. Empty values are unset.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): LinkdeckConfig {
  const config: LinkdeckConfig = {}
  if (env['LINKDECK_CATALOG']) config.catalog = env['LINKDECK_CATALOG']
  if (env['LINKDECK_MODULE']) config.module = env['LINKDECK_MODULE']
  if (env['LINKDECK_LOG_FILE']) config.logFile = env['LINKDECK_LOG_FILE']
  if (env['LINKDECK_DEBUG']) config.debug = parseBoolean('LINKDECK_DEBUG', env['LINKDECK_DEBUG'])
  return config
}

/**
 * Merge config layers; later layers take precedence.
 * Only values that are set override earlier ones.
 */
export function mergeOptions(...layers: LinkdeckConfig[]): LinkdeckConfig {
  const merged: LinkdeckConfig = {}
  for (const layer of layers) {
    if (layer.catalog !== undefined) merged.catalog = layer.catalog
    if (layer.module !== undefined) merged.module = layer.module
    if (layer.logFile !== undefined) merged.logFile = layer.logFile
    if (layer.debug !== undefined) merged.debug = layer.debug
  }
  return merged
}

export interface CliOptions extends LinkdeckConfig {
  config?: string
}

export interface ResolveOptions {
  cli: CliOptions
  env?: NodeJS.ProcessEnv
  cwd?: string
  homeDir?: string
}

export interface ResolvedSettings {
  configPath: string | null
  catalogPath: string
  startModule: string | undefined
  logFile: string | null
  debug: boolean
}

/**
 * Flags over environment over config file over defaults.
 * Flag and environment paths resolve against the working directory.
 */
export function resolveSettings({ cli, env = process.env, cwd = process.cwd(), homeDir }: ResolveOptions): ResolvedSettings {
  const configPath = cli.config ? path.resolve(cwd, cli.config) : findConfigFile(cwd, homeDir)
  const fileConfig = configPath ? loadConfigFromFile(configPath) : {}
  const merged = mergeOptions(fileConfig, configFromEnv(env), cli)

  return {
    configPath,
    catalogPath: merged.catalog ? path.resolve(cwd, merged.catalog) : defaultCatalogPath(),
    startModule: merged.module,
    logFile: merged.logFile ? path.resolve(cwd, merged.logFile) : null,
    debug: merged.debug ?? false,
  }
}
