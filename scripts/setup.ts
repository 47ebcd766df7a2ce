/**
 * Interactive setup to create/update .env and the webhook URL file.
 *
 * Usage:
 *   npm run setup
 */

import { ensureConfigInteractive } from '../src/config/interactive-setup.js'
import { loadWebhookUrl, validateConfig } from '../src/config/index.js'

async function main(): Promise<void> {
  await ensureConfigInteractive()
  validateConfig()
  await loadWebhookUrl()
  console.log('Setup complete.')
}

main().catch(error => {
  console.error('Setup failed:', error)
  process.exit(1)
})
