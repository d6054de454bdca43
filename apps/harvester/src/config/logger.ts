/**
 * Harvester loggers. Stages below the pipeline get children of its logger.
 */

import { createLogger } from '@cover-harvest/logger'

export const logger = createLogger('harvester')

export const loggers = {
  pipeline: logger.child('pipeline'),
}
