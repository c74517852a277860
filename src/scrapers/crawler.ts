import { findLinkedImages } from '../html/linked-images.js'
import { toError } from '../utils/errors.js'
import { logger } from '../utils/logger.js'
import { BloggerClient, type BloggerClientOptions } from './blogger.js'
import type { HttpClient } from './http.js'
import { resolveLink } from './resolver.js'
import type { BlogPost, BloggerCredentials, LinkResolution } from './types.js'

function* linkedImagesInPosts(posts: BlogPost[]): Generator<string> {
  for (const post of posts) {
    const links = findLinkedImages(post.content)
    if (links.length > 0) {
      logger.debug({ postId: post.id, title: post.title, count: links.length }, 'Found linked images')
    }
    yield* links
  }
}

/**
 * Lazily walks every post of a blog and resolves each linked image.
 *
 * Nothing is fetched until the first element is requested, and every
 * element's requests happen only when it is. The generator can be consumed
 * once; call again to re-run the crawl. Lookup and pagination failures reject
 * the pending `next()`, while a link that fails to resolve is reported as an
 * unsuccessful element and the crawl moves on.
 */
export async function* crawlLinkedImages(
  client: HttpClient,
  blogUrl: string,
  credentials: BloggerCredentials,
  options: BloggerClientOptions = {}
): AsyncGenerator<LinkResolution> {
  const blogger = new BloggerClient(client, credentials, options)
  const blogId = await blogger.getBlogId(blogUrl)
  const posts = await blogger.fetchAllPosts(blogId)

  for (const link of linkedImagesInPosts(posts)) {
    let resolution: LinkResolution
    try {
      resolution = { success: true, link, url: await resolveLink(client, link) }
    } catch (error) {
      logger.debug({ link, err: error }, 'Failed to resolve link')
      resolution = { success: false, link, error: toError(error) }
    }
    yield resolution
  }
}

// Stops at the first failed resolution by throwing its error
export async function* resolvedUrls(resolutions: AsyncIterable<LinkResolution>): AsyncGenerator<string> {
  for await (const resolution of resolutions) {
    if (!resolution.success) {
      throw resolution.error
    }
    yield resolution.url
  }
}
