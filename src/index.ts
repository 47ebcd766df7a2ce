#!/usr/bin/env node
import { config, loadWebhookUrl, validateConfig } from './config/index.js'
import { runCrawl } from './crawler.js'
import { WebhookNotifier } from './notify/webhook.js'
import { PostExtractor } from './scrapers/extractor.js'
import { ThreadPageFetcher } from './scrapers/thread.js'
import { FileStateStore } from './state/store.js'
import { errorMessage } from './utils/errors.js'
import { logger } from './utils/logger.js'

async function main(): Promise<void> {
  validateConfig()

  const webhookUrl = await loadWebhookUrl()

  logger.info({
    thread: config.threadUrl,
    stateDir: config.stateDir,
  }, 'Forum thread notifier starting')

  await runCrawl({
    store: new FileStateStore(config.stateDir),
    fetcher: new ThreadPageFetcher({
      threadUrl: config.threadUrl,
      userAgent: config.userAgent,
      timeoutMs: config.requestTimeoutMs,
    }),
    extractor: new PostExtractor({
      origin: config.forumOrigin,
      titleMarker: config.titleMarker,
      defaultTitle: config.defaultTitle,
    }),
    notifier: new WebhookNotifier(webhookUrl, {
      userAgent: config.userAgent,
      timeoutMs: config.requestTimeoutMs,
    }),
  })
}

main().catch(error => {
  logger.error({ err: error }, errorMessage(error))
  process.exit(1)
})
