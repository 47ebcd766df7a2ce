import { describe, it, expect, vi } from 'vitest'
import { runCrawl } from '../crawler.js'
import type { Notification } from '../notify/formatter.js'
import type { DeliveryResult, Notifier } from '../notify/webhook.js'
import { PostExtractor } from '../scrapers/extractor.js'
import type { PageFetcher, PageRef, ThreadPage } from '../scrapers/types.js'
import { loadCursor } from '../state/cursor.js'
import { MemoryStateStore } from '../state/store.js'
import { FetchError, ScrapingError } from '../utils/errors.js'
import { threadPageHtml, type PostFixture } from './thread-html.js'

const extractor = new PostExtractor({
  origin: 'https://forum.example.test',
  titleMarker: 'Tuote:',
  defaultTitle: 'Uusi tarjous',
})

// In-process stand-in for the forum: pages 1..n, 'latest' resolves to n.
class FakeThread implements PageFetcher {
  readonly requested: PageRef[] = []
  private readonly pages = new Map<number, string>()
  private readonly lastPage: number

  constructor(pages: PostFixture[][]) {
    this.lastPage = pages.length
    pages.forEach((posts, index) => {
      this.setPage(index + 1, posts)
    })
  }

  setPage(page: number, posts: PostFixture[]): void {
    this.pages.set(page, threadPageHtml(page, posts, this.lastPage))
  }

  async fetch(page: PageRef): Promise<ThreadPage> {
    this.requested.push(page)
    const resolved = page === 'latest' ? this.lastPage : page
    const html = this.pages.get(resolved)
    if (html === undefined) {
      throw new FetchError('HTTP 404: Not Found', 404)
    }
    return { html, page: resolved }
  }
}

function ids(...values: number[]): PostFixture[] {
  return values.map(id => ({ id }))
}

// Titles are "Item <id>" for posts built by threadPageHtml.
class RecordingNotifier implements Notifier {
  readonly delivered: string[] = []

  constructor(private readonly failOn: number[] = []) {}

  async deliver(notification: Notification): Promise<DeliveryResult> {
    if (this.failOn.some(id => notification.title === `Item ${id}`)) {
      return { success: false, error: 'HTTP 500: Internal Server Error' }
    }
    this.delivered.push(notification.title)
    return { success: true }
  }
}

function spiedStore(initial: ConstructorParameters<typeof MemoryStateStore>[0] = {}) {
  const store = new MemoryStateStore(initial)
  const set = vi.spyOn(store, 'set')
  return { store, set }
}

describe('runCrawl', () => {
  it('sets a baseline on the first run without delivering anything', async () => {
    const thread = new FakeThread([ids(1, 2), ids(3, 4), ids(5, 6, 7)])
    const notifier = new RecordingNotifier()
    const { store } = spiedStore()

    const summary = await runCrawl({ store, fetcher: thread, extractor, notifier })

    expect(notifier.delivered).toEqual([])
    expect(thread.requested).toEqual(['latest'])
    expect(summary).toEqual({ outcome: 'done', page: 3, lastSentId: 7, delivered: 0, baseline: true })
    expect(await loadCursor(store)).toEqual({ lastPage: 3, lastSentId: 7 })
  })

  it('keeps establishing the baseline across pages when only the page is stored', async () => {
    const thread = new FakeThread([ids(1, 2), ids(3, 4), ids(5, 6)])
    const notifier = new RecordingNotifier()
    const { store } = spiedStore({ last_page: 2 })

    await runCrawl({ store, fetcher: thread, extractor, notifier })

    expect(notifier.delivered).toEqual([])
    expect(thread.requested).toEqual([2, 3])
    expect(await loadCursor(store)).toEqual({ lastPage: 3, lastSentId: 6 })
  })

  it('delivers new posts in order across pages and checkpoints the last page', async () => {
    const thread = new FakeThread([ids(1, 2), ids(5, 6, 7), ids(8, 9)])
    const notifier = new RecordingNotifier()
    const { store, set } = spiedStore({ last_page: 2, last_sent_id: 6 })

    const summary = await runCrawl({ store, fetcher: thread, extractor, notifier })

    expect(notifier.delivered).toEqual(['Item 7', 'Item 8', 'Item 9'])
    expect(thread.requested).toEqual([2, 3])
    expect(summary).toEqual({ outcome: 'done', page: 3, lastSentId: 9, delivered: 3, baseline: false })
    expect(set).toHaveBeenCalledTimes(2)
    expect(await loadCursor(store)).toEqual({ lastPage: 3, lastSentId: 9 })
  })

  it('delivers nothing and leaves the cursor as it was on an unchanged thread', async () => {
    const thread = new FakeThread([ids(1, 2), ids(3, 4)])
    const notifier = new RecordingNotifier()
    const { store } = spiedStore({ last_page: 2, last_sent_id: 4 })

    const summary = await runCrawl({ store, fetcher: thread, extractor, notifier })

    expect(notifier.delivered).toEqual([])
    expect(summary.outcome).toBe('done')
    expect(await loadCursor(store)).toEqual({ lastPage: 2, lastSentId: 4 })
  })

  it('only delivers posts above the watermark', async () => {
    const thread = new FakeThread([ids(3, 10, 11)])
    const notifier = new RecordingNotifier()
    const { store } = spiedStore({ last_page: 1, last_sent_id: 10 })

    await runCrawl({ store, fetcher: thread, extractor, notifier })

    expect(notifier.delivered).toEqual(['Item 11'])
    expect(await loadCursor(store)).toEqual({ lastPage: 1, lastSentId: 11 })
  })

  it('formats the delivered notification from the post', async () => {
    const thread = new FakeThread([[{ id: 8, author: 'erin', body: 'Tuote:Monitor<br>199 €' }]])
    const deliver = vi.fn(async (_notification: Notification): Promise<DeliveryResult> => ({ success: true }))
    const { store } = spiedStore({ last_page: 1, last_sent_id: 7 })

    await runCrawl({ store, fetcher: thread, extractor, notifier: { deliver } })

    expect(deliver).toHaveBeenCalledWith({
      title: 'Monitor',
      description: 'Tuote:Monitor\n199 €',
      timestamp: '2026-04-01T08:00:00+0300',
      author: { name: 'erin', url: 'https://forum.example.test/members/erin.1/' },
    })
  })

  it('stops at the first failed delivery and checkpoints the progress before it', async () => {
    const thread = new FakeThread([ids(1, 2), ids(3, 4, 5, 6, 7), ids(8, 9, 10), ids(11)])
    const notifier = new RecordingNotifier([9])
    const { store, set } = spiedStore({ last_page: 3, last_sent_id: 7 })

    const summary = await runCrawl({ store, fetcher: thread, extractor, notifier })

    expect(notifier.delivered).toEqual(['Item 8'])
    expect(thread.requested).toEqual([3])
    expect(summary).toEqual({ outcome: 'aborted', page: 3, lastSentId: 8, delivered: 1, baseline: false })
    expect(set).toHaveBeenCalledTimes(2)
    expect(await loadCursor(store)).toEqual({ lastPage: 3, lastSentId: 8 })
  })

  it('keeps the watermark when the first delivery fails', async () => {
    const thread = new FakeThread([ids(8, 9)])
    const notifier = new RecordingNotifier([8])
    const { store } = spiedStore({ last_page: 1, last_sent_id: 7 })

    const summary = await runCrawl({ store, fetcher: thread, extractor, notifier })

    expect(summary.outcome).toBe('aborted')
    expect(await loadCursor(store)).toEqual({ lastPage: 1, lastSentId: 7 })
  })

  it('discards the whole run on a scraping error, so the next run delivers again', async () => {
    const thread = new FakeThread([ids(3, 4), ids(5, 6)])
    thread.setPage(2, [{ id: 'post-five' }])
    const notifier = new RecordingNotifier()
    const { store, set } = spiedStore({ last_page: 1, last_sent_id: 2 })

    await expect(runCrawl({ store, fetcher: thread, extractor, notifier })).rejects.toBeInstanceOf(ScrapingError)

    expect(notifier.delivered).toEqual(['Item 3', 'Item 4'])
    expect(set).not.toHaveBeenCalled()
    expect(await loadCursor(store)).toEqual({ lastPage: 1, lastSentId: 2 })

    thread.setPage(2, ids(5, 6))
    await runCrawl({ store, fetcher: thread, extractor, notifier })

    expect(thread.requested).toEqual([1, 2, 1, 2])
    expect(notifier.delivered).toEqual(['Item 3', 'Item 4', 'Item 3', 'Item 4', 'Item 5', 'Item 6'])
    expect(await loadCursor(store)).toEqual({ lastPage: 2, lastSentId: 6 })
  })

  it('does not write the cursor when a page cannot be fetched', async () => {
    const thread = new FakeThread([ids(1, 2)])
    const notifier = new RecordingNotifier()
    const { store, set } = spiedStore({ last_page: 5, last_sent_id: 2 })

    await expect(runCrawl({ store, fetcher: thread, extractor, notifier })).rejects.toBeInstanceOf(FetchError)

    expect(set).not.toHaveBeenCalled()
  })

  it('fails without a checkpoint when a page links back to an earlier page', async () => {
    const notifier = new RecordingNotifier()
    const { store, set } = spiedStore({ last_page: 5, last_sent_id: 2 })
    // Markup of page 2 (next link to 3) served as page 5
    const fetcher: PageFetcher = {
      fetch: async () => ({ html: threadPageHtml(2, ids(3, 4), 3), page: 5 }),
    }

    await expect(runCrawl({ store, fetcher, extractor, notifier })).rejects.toThrow(
      new ScrapingError('Page 5 links to page 3 as its next page')
    )
    expect(notifier.delivered).toEqual([])
    expect(set).not.toHaveBeenCalled()
  })

  it('fails a baseline run on a page without posts', async () => {
    const thread = new FakeThread([[]])
    const notifier = new RecordingNotifier()
    const { store, set } = spiedStore()

    await expect(runCrawl({ store, fetcher: thread, extractor, notifier })).rejects.toThrow(
      'Page 1 has no posts to set a baseline from'
    )
    expect(set).not.toHaveBeenCalled()
  })

  it('never lowers the watermark over repeated runs', async () => {
    const thread = new FakeThread([ids(1, 2), ids(3, 4)])
    const notifier = new RecordingNotifier()
    const { store } = spiedStore()
    const watermarks: number[] = []

    watermarks.push((await runCrawl({ store, fetcher: thread, extractor, notifier })).lastSentId)
    thread.setPage(2, ids(3, 4, 5))
    watermarks.push((await runCrawl({ store, fetcher: thread, extractor, notifier })).lastSentId)
    watermarks.push((await runCrawl({ store, fetcher: thread, extractor, notifier })).lastSentId)

    expect(watermarks).toEqual([4, 5, 5])
    expect(notifier.delivered).toEqual(['Item 5'])
  })
})
