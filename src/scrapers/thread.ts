import { fetchHtml } from './http.js'
import { ScrapingError } from '../utils/errors.js'
import { logger } from '../utils/logger.js'
import { parseUint32 } from '../utils/validation.js'
import type { PageFetcher, PageRef, ThreadPage } from './types.js'

// Any page past the end redirects to the thread's last page.
const LATEST_PAGE_PLACEHOLDER = 0xffffffff
const PAGE_SEGMENT = /^page-(\d+)$/

export interface ThreadFetcherOptions {
  threadUrl: string
  userAgent?: string
  timeoutMs?: number
}

export function pageFromUrl(url: string): number {
  let pathname: string
  try {
    pathname = new URL(url).pathname
  } catch {
    throw new ScrapingError(`Cannot parse redirect target ${url}`)
  }

  const lastSegment = pathname.split('/').pop() ?? ''
  const match = lastSegment.match(PAGE_SEGMENT)
  const page = match ? parseUint32(match[1]) : null
  if (page === null) {
    throw new ScrapingError(`Redirect target ${url} does not end in page-<number>`)
  }
  return page
}

export class ThreadPageFetcher implements PageFetcher {
  private readonly threadUrl: string

  constructor(private readonly options: ThreadFetcherOptions) {
    this.threadUrl = options.threadUrl.endsWith('/') ? options.threadUrl : `${options.threadUrl}/`
  }

  pageUrl(page: number): string {
    return `${this.threadUrl}page-${page}`
  }

  async fetch(page: PageRef): Promise<ThreadPage> {
    const requested = page === 'latest' ? LATEST_PAGE_PLACEHOLDER : page
    const url = this.pageUrl(requested)

    logger.info({ page }, 'Fetching thread page')

    const response = await fetchHtml(url, {
      userAgent: this.options.userAgent,
      timeoutMs: this.options.timeoutMs,
    })

    if (page !== 'latest') {
      return { html: response.body, page }
    }

    const resolved = pageFromUrl(response.url)
    logger.debug({ url: response.url, page: resolved }, 'Resolved latest page')
    return { html: response.body, page: resolved }
  }
}
