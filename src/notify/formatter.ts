import type { Post } from '../scrapers/types.js'

// Embed field limits of the webhook sink, in codepoints
export const TITLE_LIMIT = 256
export const DESCRIPTION_LIMIT = 2048
export const AUTHOR_NAME_LIMIT = 256

export interface NotificationAuthor {
  readonly name: string
  readonly url: string
  readonly iconUrl?: string
}

export interface Notification {
  readonly title: string
  readonly description: string
  readonly timestamp: string
  readonly author: NotificationAuthor
}

// Cuts at a codepoint boundary, so surrogate pairs are never split. No ellipsis.
export function truncate(text: string, maxCodepoints: number): string {
  let count = 0
  let end = 0
  for (const char of text) {
    if (count === maxCodepoints) {
      return text.slice(0, end)
    }
    count++
    end += char.length
  }
  return text
}

export function formatNotification(post: Post): Notification {
  return Object.freeze({
    title: truncate(post.derivedTitle, TITLE_LIMIT),
    description: truncate(post.rawContent, DESCRIPTION_LIMIT),
    timestamp: post.timestamp,
    author: Object.freeze({
      name: truncate(post.authorName, AUTHOR_NAME_LIMIT),
      url: post.authorUrl,
      ...(post.authorAvatarUrl !== undefined ? { iconUrl: post.authorAvatarUrl } : {}),
    }),
  })
}
