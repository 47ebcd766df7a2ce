import { postJson } from '../scrapers/http.js'
import { errorMessage } from '../utils/errors.js'
import { logger } from '../utils/logger.js'
import type { Notification } from './formatter.js'

export interface DeliveryResult {
  success: boolean
  error?: string
}

export interface Notifier {
  deliver(notification: Notification): Promise<DeliveryResult>
}

interface EmbedAuthor {
  name: string
  url: string
  icon_url?: string
}

interface Embed {
  title: string
  description: string
  timestamp: string
  author: EmbedAuthor
}

export interface WebhookMessage {
  embeds: Embed[]
}

export function toWebhookMessage(notification: Notification): WebhookMessage {
  const { author } = notification
  return {
    embeds: [
      {
        title: notification.title,
        description: notification.description,
        timestamp: notification.timestamp,
        author: {
          name: author.name,
          url: author.url,
          ...(author.iconUrl !== undefined ? { icon_url: author.iconUrl } : {}),
        },
      },
    ],
  }
}

export interface WebhookNotifierOptions {
  userAgent?: string
  timeoutMs?: number
}

// Never throws: a rejected or unreachable webhook is reported as a failed delivery.
// The URL embeds the webhook token, so it stays out of error messages.
export class WebhookNotifier implements Notifier {
  constructor(
    private readonly webhookUrl: string,
    private readonly options: WebhookNotifierOptions = {}
  ) {}

  async deliver(notification: Notification): Promise<DeliveryResult> {
    try {
      const response = await postJson(this.webhookUrl, toWebhookMessage(notification), {
        userAgent: this.options.userAgent,
        timeoutMs: this.options.timeoutMs,
        label: 'webhook',
      })
      // Nothing in the reply is used; release the connection
      await response.body?.cancel()

      if (!response.ok) {
        return { success: false, error: `HTTP ${response.status}: ${response.statusText}` }
      }
      return { success: true }
    } catch (error) {
      return { success: false, error: errorMessage(error) }
    }
  }
}

// Dry-run sink: prints what would have been sent.
export class LoggingNotifier implements Notifier {
  readonly sent: Notification[] = []

  async deliver(notification: Notification): Promise<DeliveryResult> {
    this.sent.push(notification)
    logger.info({ title: notification.title, author: notification.author.name }, 'Would deliver notification')
    console.log(JSON.stringify(toWebhookMessage(notification), null, 2))
    return { success: true }
  }
}
