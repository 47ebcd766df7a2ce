import pino from 'pino'
import { config } from '../config/index.js'

// JSON lines on stderr; stdout stays free for the dry-run report.
export const logger = pino(
  {
    name: 'forum-thread-notifier',
    level: config.logLevel,
  },
  pino.destination(2)
)

