import { formatNotification } from './notify/formatter.js'
import type { Notifier } from './notify/webhook.js'
import type { PageFetcher, PageRef, PostParser } from './scrapers/types.js'
import { loadCursor, saveCursor } from './state/cursor.js'
import type { StateStore } from './state/store.js'
import { ScrapingError } from './utils/errors.js'
import { logger } from './utils/logger.js'

export type CrawlOutcome = 'done' | 'aborted'

export interface CrawlDependencies {
  store: StateStore
  fetcher: PageFetcher
  extractor: PostParser
  notifier: Notifier
}

export interface CrawlSummary {
  outcome: CrawlOutcome       // 'aborted' after a failed delivery; progress before it is kept
  page: number
  lastSentId: number
  delivered: number
  baseline: boolean
}

/**
 * Walks the thread from the stored page onwards, delivering every post newer
 * than the watermark, then checkpoints the cursor.
 *
 * The cursor is written exactly once, when the crawl stops. Fetch and scraping
 * errors propagate without a write, so posts delivered earlier in the same run
 * are delivered again by the next run.
 */
export async function runCrawl(deps: CrawlDependencies): Promise<CrawlSummary> {
  const { store, fetcher, extractor, notifier } = deps

  const cursor = await loadCursor(store)
  const baseline = cursor.lastSentId === null

  logger.info({ lastPage: cursor.lastPage, lastSentId: cursor.lastSentId }, 'Loaded cursor')

  let pageRef: PageRef = cursor.lastPage ?? 'latest'
  let watermark = cursor.lastSentId
  let delivered = 0
  let failed = false

  for (;;) {
    const { html, page } = await fetcher.fetch(pageRef)
    const { posts, nextPage } = extractor.extract(html)

    logger.debug({ page, posts: posts.length, nextPage }, 'Extracted page')

    if (nextPage !== null && nextPage <= page) {
      throw new ScrapingError(`Page ${page} links to page ${nextPage} as its next page`)
    }

    if (watermark === null || baseline) {
      const last = posts.at(-1)
      if (!last) {
        throw new ScrapingError(`Page ${page} has no posts to set a baseline from`)
      }
      watermark = last.id
      logger.info({ page, watermark }, 'Baseline run, skipping existing posts')
    } else {
      for (const post of posts) {
        if (post.id <= watermark) continue

        logger.info({ id: post.id, title: post.derivedTitle, author: post.authorName }, 'New post')

        const result = await notifier.deliver(formatNotification(post))
        if (!result.success) {
          logger.debug({ id: post.id, error: result.error }, 'Delivery failed, stopping run')
          failed = true
          break
        }

        watermark = post.id
        delivered++
      }
    }

    if (failed || nextPage === null) {
      const outcome: CrawlOutcome = failed ? 'aborted' : 'done'
      await saveCursor(store, { lastPage: page, lastSentId: watermark })

      logger.info({ outcome, page, lastSentId: watermark, delivered }, 'Crawl finished')
      return { outcome, page, lastSentId: watermark, delivered, baseline }
    }

    pageRef = nextPage
  }
}
