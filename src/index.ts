#!/usr/bin/env node

import { config } from './config/index.js'
import { createProgram } from './cli/program.js'
import { FetchHttpClient } from './scrapers/http.js'
import { logger } from './utils/logger.js'

const program = createProgram({
  client: new FetchHttpClient(),
  apiBase: config.bloggerApiBase,
  print: line => console.log(line),
})

program.parseAsync(process.argv).catch(error => {
  logger.error({ err: error }, 'Fatal error')
  process.exitCode = 1
})
