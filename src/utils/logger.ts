import pino from 'pino'
import { config } from '../config/index.js'

// stdout is reserved for results, so logs go to stderr
export const logger = pino(
  {
    name: 'blogger-linked-images',
    level: config.logLevel,
  },
  pino.destination(2)
)
