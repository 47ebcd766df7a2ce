// A concrete page number, or the thread's last page as reported by the forum
export type PageRef = number | 'latest'

export interface Post {
  readonly id: number                // From data-content="post-<id>"; ordering and dedup key
  readonly timestamp: string         // Passed through as found in the page
  readonly authorName: string
  readonly authorUrl: string
  readonly authorAvatarUrl?: string  // Members without an uploaded avatar have none
  readonly rawContent: string        // Plain-text rendering of the post body
  readonly derivedTitle: string
}

export interface ThreadPage {
  html: string
  page: number                       // Concrete number, also when 'latest' was requested
}

export interface ExtractedPage {
  posts: Post[]                      // Document order
  nextPage: number | null
}

export interface PageFetcher {
  fetch(page: PageRef): Promise<ThreadPage>
}

export interface PostParser {
  extract(html: string): ExtractedPage
}
