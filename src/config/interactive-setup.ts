import dotenv from 'dotenv'
import { existsSync } from 'fs'
import { mkdir, readFile, writeFile } from 'fs/promises'
import path from 'path'
import readline from 'readline/promises'
import { stdin as input, stdout as output } from 'process'
import { ENV_EXAMPLE_PATH, ENV_PATH, config, reloadConfig } from './index.js'

type EnvMap = Record<string, string>
type Prompter = Pick<ReturnType<typeof readline.createInterface>, 'question'>

const PLAIN_ENV_VALUE = /^[\w./:@%+,=-]*$/

async function readEnvFile(file: string): Promise<EnvMap> {
  if (!existsSync(file)) return {}
  return dotenv.parse(await readFile(file, 'utf8'))
}

// Anything beyond URL and path characters is double-quoted
function envLine(key: string, value: string): string {
  return PLAIN_ENV_VALUE.test(value) ? `${key}=${value}` : `${key}=${JSON.stringify(value)}`
}

// Replaces the key's line, commented out or not, or appends one
function setEnvValue(template: string, key: string, value: string): string {
  const pattern = new RegExp(`^#?\\s*${key}=.*$`, 'm')
  const line = envLine(key, value)
  return pattern.test(template)
    ? template.replace(pattern, line)
    : `${template.trimEnd()}\n${line}\n`
}

async function writeEnvFile(values: EnvMap): Promise<void> {
  const templatePath = [ENV_PATH, ENV_EXAMPLE_PATH].find(file => existsSync(file))
  const template = templatePath ? await readFile(templatePath, 'utf8') : ''

  const content = Object.entries(values).reduce(
    (current, [key, value]) => setEnvValue(current, key, value),
    template
  )
  await writeFile(ENV_PATH, content)
}

// Re-asks until there is an answer; Enter keeps the current value.
async function askValue(rl: Prompter, label: string, current: string): Promise<string> {
  const prompt = current ? `${label} [${current}]: ` : `${label}: `
  let answer = ''
  while (!answer) {
    answer = (await rl.question(prompt)).trim() || current
  }
  return answer
}

async function readExistingWebhookUrl(file: string): Promise<string> {
  if (!existsSync(file)) return ''
  return (await readFile(file, 'utf8')).trim()
}

// Prompts for the thread, state directory and webhook URL, then writes .env
// and the webhook file. Does nothing without a TTY.
export async function ensureConfigInteractive(): Promise<void> {
  if (!process.stdin.isTTY) return

  console.log('Starting interactive setup...')

  const existingValues = await readEnvFile(ENV_PATH)
  const existingWebhookUrl = await readExistingWebhookUrl(config.webhookUrlFile)

  const rl = readline.createInterface({ input, output })

  try {
    const values: EnvMap = {
      THREAD_URL: await askValue(rl, 'THREAD_URL', existingValues.THREAD_URL || config.threadUrl),
      STATE_DIR: await askValue(rl, 'STATE_DIR', existingValues.STATE_DIR || config.stateDir),
    }
    const webhookUrl = await askValue(rl, 'Webhook URL', existingWebhookUrl)

    await writeEnvFile(values)
    dotenv.config({ path: ENV_PATH, override: true })
    reloadConfig()

    await mkdir(path.dirname(config.webhookUrlFile), { recursive: true })
    await writeFile(config.webhookUrlFile, `${webhookUrl}\n`, { mode: 0o600 })
    console.log(`Webhook URL written to ${config.webhookUrlFile}`)
  } finally {
    rl.close()
  }
}
