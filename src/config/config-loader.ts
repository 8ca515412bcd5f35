import { readFile } from 'node:fs/promises'
import { isAbsolute, resolve } from 'node:path'
import type { Logger } from '../utils/logger'
import { defaultDashboardConfig, parseDashboardConfig, type DashboardConfig } from './dashboard-config'

/**
 * Error thrown when configuration loading fails
 */
export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly originalError?: Error
  ) {
    super(message)
    this.name = 'ConfigLoadError'
  }
}

/**
 * Expands environment variables in a string
 * Supports ${VAR_NAME} and $VAR_NAME syntax
 */
export function expandEnvironmentVariables(str: string, env: NodeJS.ProcessEnv = process.env): string {
  return str
    .replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
      return env[varName] || ''
    })
    .replace(/\$([A-Z_][A-Z0-9_]*)/gi, (_, varName: string) => {
      return env[varName] || ''
    })
}

/**
 * Recursively expands environment variables in an object
 */
export function expandObjectEnvironmentVariables(obj: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof obj === 'string') {
    return expandEnvironmentVariables(obj, env)
  }

  if (Array.isArray(obj)) {
    return obj.map(item => expandObjectEnvironmentVariables(item, env))
  }

  if (obj && typeof obj === 'object') {
    const expanded: Record<string, unknown> = {}
    for (const [key, value] of Object.entries(obj)) {
      expanded[key] = expandObjectEnvironmentVariables(value, env)
    }
    return expanded
  }

  return obj
}

/**
 * Loads the dashboard configuration file
 * @param configPath Path to the configuration file (absolute or relative)
 * @returns Validated configuration; defaults when the file is missing or unreadable
 * @throws ConfigLoadError if the file holds malformed JSON
 */
export async function loadDashboardConfig(configPath: string, logger: Logger): Promise<DashboardConfig> {
  // Resolve path (convert relative to absolute)
  const resolvedPath = isAbsolute(configPath)
    ? configPath
    : resolve(process.cwd(), configPath)

  let rawContent: string
  try {
    rawContent = await readFile(resolvedPath, 'utf-8')
  } catch (error) {
    logger.warn('Failed to load configuration file, using default values', {
      path: resolvedPath,
      error: error instanceof Error ? error.message : String(error)
    })
    return defaultDashboardConfig()
  }

  let parsedConfig: unknown
  try {
    parsedConfig = JSON.parse(rawContent)
  } catch (error) {
    throw new ConfigLoadError(
      `Failed to parse JSON configuration: ${error instanceof Error ? error.message : 'Invalid JSON'}`,
      resolvedPath,
      error instanceof Error ? error : undefined
    )
  }

  const config = parseDashboardConfig(expandObjectEnvironmentVariables(parsedConfig), logger)
  logger.info('Configuration loaded', {
    path: resolvedPath,
    mainSymbols: config.main_symbols.length,
    marqueeSymbols: config.marquee_symbols.length,
    miners: config.miners_ips.length
  })
  return config
}
