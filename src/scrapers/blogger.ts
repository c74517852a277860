import { config } from '../config/index.js'
import { logger } from '../utils/logger.js'
import { fetchJson, type HttpClient } from './http.js'
import { BlogSchema, PostPageSchema, type BlogPost, type BloggerCredentials, type PostPage } from './types.js'

export interface BloggerClientOptions {
  apiBase?: string
}

/**
 * Read-only access to the Blogger v3 REST API, authenticated by API key.
 */
export class BloggerClient {
  private readonly apiBase: string

  constructor(
    private readonly http: HttpClient,
    private readonly credentials: BloggerCredentials,
    options: BloggerClientOptions = {}
  ) {
    this.apiBase = (options.apiBase ?? config.bloggerApiBase).replace(/\/+$/, '')
  }

  async getBlogId(blogUrl: string): Promise<string> {
    const url = `${this.apiBase}/blogs/byurl?url=${encodeURIComponent(blogUrl)}&key=${encodeURIComponent(this.credentials.apiKey)}`
    const blog = await fetchJson(this.http, url, BlogSchema)
    logger.info({ blogUrl, blogId: blog.id }, 'Found blog')
    return blog.id
  }

  // Follows nextPageToken until a page comes back without one.
  // Any failure aborts the whole listing.
  async fetchAllPosts(blogId: string): Promise<BlogPost[]> {
    const posts: BlogPost[] = []
    let pageToken: string | undefined
    let pageCount = 0

    do {
      const page = await this.fetchPostPage(blogId, pageToken)
      posts.push(...page.items)
      pageCount++
      logger.debug({ blogId, page: pageCount, count: page.items.length }, 'Fetched posts page')
      pageToken = page.nextPageToken
    } while (pageToken !== undefined)

    logger.info({ blogId, pages: pageCount, posts: posts.length }, 'Fetched all posts')
    return posts
  }

  private fetchPostPage(blogId: string, pageToken?: string): Promise<PostPage> {
    return fetchJson(this.http, this.postsUrl(blogId, pageToken), PostPageSchema)
  }

  private postsUrl(blogId: string, pageToken?: string): string {
    const base = `${this.apiBase}/blogs/${encodeURIComponent(blogId)}/posts?key=${encodeURIComponent(this.credentials.apiKey)}`
    return pageToken === undefined ? base : `${base}&pageToken=${encodeURIComponent(pageToken)}`
  }
}
