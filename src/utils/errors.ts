// Fatal error classes. Any of these escaping a crawl ends the run without a
// cursor write. Delivery failures are not errors; see DeliveryResult.

// Thrown when an expected element or attribute is missing or malformed in a thread page
export class ScrapingError extends Error {
  constructor(message: string, public originalError?: Error) {
    super(message)
    this.name = 'ScrapingError'
    Object.setPrototypeOf(this, ScrapingError.prototype)
  }
}

// Thrown when a thread page cannot be retrieved (transport failure, timeout, non-2xx status)
export class FetchError extends Error {
  constructor(message: string, public status?: number, public originalError?: Error) {
    super(message)
    this.name = 'FetchError'
    Object.setPrototypeOf(this, FetchError.prototype)
  }
}

// Thrown when configuration or the webhook secret is missing or invalid
export class ConfigError extends Error {
  constructor(message: string, public originalError?: Error) {
    super(message)
    this.name = 'ConfigError'
    Object.setPrototypeOf(this, ConfigError.prototype)
  }
}

export function isScrapingError(error: unknown): error is ScrapingError {
  return error instanceof ScrapingError
}

export function isFetchError(error: unknown): error is FetchError {
  return error instanceof FetchError
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
