/**
 * Crawl the thread once without delivering or checkpointing anything.
 * Notifications that would be sent are printed to stdout.
 *
 * Usage:
 *   npm run crawl:once
 *   npm run crawl:once -- --page 120 --since 4501234
 */

import { parseArgs } from 'util'
import { config, validateConfig } from '../src/config/index.js'
import { runCrawl } from '../src/crawler.js'
import { LoggingNotifier } from '../src/notify/webhook.js'
import { PostExtractor } from '../src/scrapers/extractor.js'
import { ThreadPageFetcher } from '../src/scrapers/thread.js'
import { loadCursor } from '../src/state/cursor.js'
import { FileStateStore, MemoryStateStore } from '../src/state/store.js'
import { errorMessage } from '../src/utils/errors.js'
import { logger } from '../src/utils/logger.js'
import { parseUint32 } from '../src/utils/validation.js'

function parseOverride(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined
  const parsed = parseUint32(value)
  if (parsed === null) {
    throw new Error(`--${name} expects a non-negative integer, got ${value}`)
  }
  return parsed
}

async function main(): Promise<void> {
  validateConfig()

  const { values } = parseArgs({
    options: {
      page: { type: 'string' },
      since: { type: 'string' },
    },
  })

  // Start from the real cursor, but never write it back
  const cursor = await loadCursor(new FileStateStore(config.stateDir))
  const lastPage = parseOverride('page', values.page) ?? cursor.lastPage ?? undefined
  const lastSentId = parseOverride('since', values.since) ?? cursor.lastSentId ?? undefined

  logger.info({ lastPage, lastSentId }, 'Running dry crawl')

  const notifier = new LoggingNotifier()
  const summary = await runCrawl({
    store: new MemoryStateStore({ last_page: lastPage, last_sent_id: lastSentId }),
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
    notifier,
  })

  logger.info({ ...summary, wouldDeliver: notifier.sent.length }, 'Dry crawl completed')
}

main().catch(error => {
  logger.error({ err: error }, errorMessage(error))
  process.exit(1)
})
