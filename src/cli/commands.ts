import { mkdir } from 'fs/promises'
import { crawlLinkedImages, resolvedUrls } from '../scrapers/crawler.js'
import type { HttpClient } from '../scrapers/http.js'
import { downloadToDirectory } from '../storage/downloader.js'
import { formatSize } from '../utils/format-size.js'
import { logger } from '../utils/logger.js'

export interface CliContext {
  client: HttpClient
  apiBase?: string
  print(line: string): void
}

function linkedImageUrls(ctx: CliContext, blogUrl: string, apiKey: string): AsyncGenerator<string> {
  return resolvedUrls(crawlLinkedImages(ctx.client, blogUrl, { apiKey }, { apiBase: ctx.apiBase }))
}

export async function listCommand(ctx: CliContext, blogUrl: string, apiKey: string): Promise<void> {
  let count = 0
  for await (const url of linkedImageUrls(ctx, blogUrl, apiKey)) {
    ctx.print(url)
    count++
  }
  logger.info({ count }, 'Listed linked images')
}

export async function downloadCommand(
  ctx: CliContext,
  blogUrl: string,
  apiKey: string,
  destination: string
): Promise<void> {
  await mkdir(destination, { recursive: true })

  let count = 0
  let totalBytes = 0
  for await (const url of linkedImageUrls(ctx, blogUrl, apiKey)) {
    const size = await downloadToDirectory(ctx.client, url, destination)
    ctx.print(`${url} : ${formatSize(size)}`)
    count++
    totalBytes += size
  }

  logger.info({ count, total: formatSize(totalBytes), destination }, 'Download complete')
}
