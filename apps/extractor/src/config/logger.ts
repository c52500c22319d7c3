/**
 * Extractor Logger Configuration
 *
 * Pre-configured loggers for extractor components
 */

import { createLogger } from '@pagesift/logger'

// Root logger for the extractor service
export const logger = createLogger('extractor')

export const loggers = {
  batch: logger.child('batch'),
  render: logger.child('render'),
  export: logger.child('export'),
  config: logger.child('config'),
  cli: logger.child('cli'),
}
