import * as cheerio from 'cheerio'
import { hasChildren, isTag, isText } from 'domhandler'
import type { AnyNode, Element } from 'domhandler'
import { ScrapingError } from '../utils/errors.js'
import { parseUint32 } from '../utils/validation.js'
import type { ExtractedPage, Post, PostParser } from './types.js'

// XenForo 2 thread markup
export const THREAD_SELECTORS = {
  post: '.message',
  time: '.u-dt',
  username: '.username',
  avatar: '.avatar img',
  body: '.bbWrapper',
  nextPage: '.pageNav-page--current + .pageNav-page',
} as const

const POST_MARKER = /^post-(\d+)$/

export interface PostExtractorOptions {
  origin: string
  titleMarker: string
  defaultTitle: string
}

// Depth-first, so for `<b><i>x</i>y</b>` this is "x".
function firstTextNode(node: AnyNode): string | null {
  if (isText(node)) return node.data
  if (hasChildren(node)) {
    for (const child of node.children) {
      const text = firstTextNode(child)
      if (text !== null) return text
    }
  }
  return null
}

// Quotes, spoilers and embeds collapse to their first text run; links become their target.
function renderNode(node: AnyNode): string {
  if (isText(node)) {
    return node.data
  }

  if (isTag(node)) {
    switch (node.name) {
      case 'br':
        return '\n'
      case 'a':
        return node.attribs.href ?? ''
      default:
        return firstTextNode(node) ?? ''
    }
  }

  return ''
}

export function renderBody(body: Element): string {
  return body.children.map(renderNode).join('')
}

export function deriveTitle(content: string, marker: string, defaultTitle: string): string {
  if (!content.startsWith(marker)) {
    return defaultTitle
  }
  const [line] = content.slice(marker.length).split('\n')
  return line || defaultTitle
}

export class PostExtractor implements PostParser {
  constructor(private readonly options: PostExtractorOptions) {}

  extract(html: string): ExtractedPage {
    const $ = cheerio.load(html)

    const posts = $(THREAD_SELECTORS.post)
      .toArray()
      .map(element => this.extractPost($, element))

    return { posts, nextPage: this.extractNextPage($) }
  }

  private extractPost($: cheerio.CheerioAPI, element: Element): Post {
    const post = $(element)
    const id = this.extractId(post.attr('data-content'))

    const timestamp = post.find(THREAD_SELECTORS.time).first().attr('datetime')
    if (timestamp === undefined) {
      throw new ScrapingError(`Post ${id} has no timestamp`)
    }

    const username = post.find(THREAD_SELECTORS.username).get(0)
    if (!username) {
      throw new ScrapingError(`Post ${id} has no username element`)
    }
    const authorName = firstTextNode(username)
    if (authorName === null) {
      throw new ScrapingError(`Post ${id} has an empty username element`)
    }
    const profileHref = username.attribs.href
    if (profileHref === undefined) {
      throw new ScrapingError(`Post ${id} username has no link`)
    }

    const avatar = post.find(THREAD_SELECTORS.avatar).get(0)
    let authorAvatarUrl: string | undefined
    if (avatar) {
      const src = avatar.attribs.src
      if (src === undefined) {
        throw new ScrapingError(`Post ${id} avatar has no src`)
      }
      authorAvatarUrl = this.resolveUrl(src, id)
    }

    const body = post.find(THREAD_SELECTORS.body).get(0)
    if (!body) {
      throw new ScrapingError(`Post ${id} has no body`)
    }
    const rawContent = renderBody(body)

    return {
      id,
      timestamp,
      authorName,
      authorUrl: this.resolveUrl(profileHref, id),
      ...(authorAvatarUrl !== undefined ? { authorAvatarUrl } : {}),
      rawContent,
      derivedTitle: deriveTitle(rawContent, this.options.titleMarker, this.options.defaultTitle),
    }
  }

  private extractId(marker: string | undefined): number {
    const match = marker?.match(POST_MARKER)
    const id = match ? parseUint32(match[1]) : null
    if (id === null) {
      throw new ScrapingError(`Malformed post marker: ${marker ?? '(missing)'}`)
    }
    return id
  }

  private extractNextPage($: cheerio.CheerioAPI): number | null {
    const link = $(THREAD_SELECTORS.nextPage).first()
    if (link.length === 0) {
      return null
    }

    const text = link.text().trim()
    const page = parseUint32(text)
    if (page === null) {
      throw new ScrapingError(`Unparsable next page number: ${text}`)
    }
    return page
  }

  private resolveUrl(href: string, postId: number): string {
    try {
      return new URL(href, this.options.origin).toString()
    } catch {
      throw new ScrapingError(`Post ${postId} has an unresolvable link: ${href}`)
    }
  }
}
