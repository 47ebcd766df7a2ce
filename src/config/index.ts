import dotenv from 'dotenv'
import { readFile } from 'fs/promises'
import path from 'path'
import { fileURLToPath } from 'url'
import { ConfigError } from '../utils/errors.js'

const __dirname = path.dirname(fileURLToPath(import.meta.url))
export const ENV_PATH = path.resolve(__dirname, '..', '..', '.env')
export const ENV_EXAMPLE_PATH = path.resolve(__dirname, '..', '..', '.env.example')

dotenv.config({ path: ENV_PATH })

const DEFAULT_THREAD_URL = 'https://bbs.io-tech.fi/threads/151/'
const DEFAULT_STATE_DIR = '/etc/tarjousbot'

export interface NotifierConfig {
  // Thread
  threadUrl: string          // Always ends with a slash; pages are `${threadUrl}page-<n>`
  forumOrigin: string        // Base for relative member and avatar links

  // State
  stateDir: string
  webhookUrlFile: string

  // HTTP
  userAgent: string
  requestTimeoutMs: number

  // Formatting
  titleMarker: string
  defaultTitle: string

  logLevel: string
}

function getEnvVar(name: string, defaultValue = ''): string {
  return process.env[name] || defaultValue
}

function getEnvInt(name: string, defaultValue: number): number {
  const value = process.env[name]
  if (!value) return defaultValue
  const parsed = parseInt(value, 10)
  return Number.isNaN(parsed) ? defaultValue : parsed
}

function withTrailingSlash(url: string): string {
  return url.endsWith('/') ? url : `${url}/`
}

function originOf(url: string): string {
  try {
    return new URL(url).origin
  } catch {
    return ''
  }
}

function loadConfigFromEnv(): NotifierConfig {
  const threadUrl = withTrailingSlash(getEnvVar('THREAD_URL', DEFAULT_THREAD_URL))
  const stateDir = getEnvVar('STATE_DIR', DEFAULT_STATE_DIR)

  return {
    threadUrl,
    forumOrigin: getEnvVar('FORUM_ORIGIN', originOf(threadUrl)),

    stateDir,
    webhookUrlFile: getEnvVar('WEBHOOK_URL_FILE', path.join(stateDir, 'webhook.conf')),

    userAgent: getEnvVar('USER_AGENT', 'forum-thread-notifier/1.0.0'),
    requestTimeoutMs: getEnvInt('REQUEST_TIMEOUT_MS', 30000),

    titleMarker: getEnvVar('TITLE_MARKER', 'Tuote:'),
    defaultTitle: getEnvVar('DEFAULT_TITLE', 'Uusi tarjous'),

    logLevel: getEnvVar('LOG_LEVEL', 'info'),
  }
}

export let config: NotifierConfig = loadConfigFromEnv()

export function reloadConfig(): void {
  config = loadConfigFromEnv()
}

export function getInvalidConfig(): string[] {
  const invalid: string[] = []
  if (!originOf(config.threadUrl)) invalid.push('THREAD_URL')
  if (!originOf(config.forumOrigin)) invalid.push('FORUM_ORIGIN')
  if (!config.stateDir) invalid.push('STATE_DIR')
  if (config.requestTimeoutMs <= 0) invalid.push('REQUEST_TIMEOUT_MS')
  return invalid
}

export function validateConfig(): void {
  const invalid = getInvalidConfig()
  if (invalid.length > 0) {
    throw new ConfigError(`Invalid config: ${invalid.join(', ')}`)
  }
}

// The webhook URL is a secret kept outside .env; it is passed to fetch as-is.
export async function loadWebhookUrl(file: string = config.webhookUrlFile): Promise<string> {
  let content: string
  try {
    content = await readFile(file, 'utf8')
  } catch (error) {
    const cause = error instanceof Error ? error : undefined
    throw new ConfigError(`Cannot read webhook URL from ${file}: ${cause?.message ?? String(error)}`, cause)
  }

  const url = content.trim()
  if (!url) {
    throw new ConfigError(`Webhook URL file ${file} is empty`)
  }
  return url
}
