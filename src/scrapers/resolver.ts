import { findImageSources } from '../html/image-sources.js'
import { NoImageFoundError } from '../utils/errors.js'
import { logger } from '../utils/logger.js'
import type { HttpClient } from './http.js'

export function isImageContentType(contentType: string | null): boolean {
  if (contentType === null) return false
  return contentType.trim().split('/')[0] === 'image'
}

/**
 * Follows a link one hop. An image is returned as-is; an HTML page is
 * replaced by the first image it embeds. Whatever that image turns out to be
 * is not checked again.
 */
export async function resolveLink(client: HttpClient, url: string): Promise<string> {
  const response = await client.get(url)
  const contentType = response.headers.get('content-type')

  if (isImageContentType(contentType)) {
    await response.body?.cancel()
    return url
  }

  const html = await response.text()
  const [firstImage] = findImageSources(html)
  if (firstImage === undefined) {
    throw new NoImageFoundError(url)
  }

  logger.debug({ url, contentType, image: firstImage }, 'Resolved embedded image')
  return firstImage
}
