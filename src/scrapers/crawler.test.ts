import { describe, it, expect } from 'vitest'
import { NoImageFoundError, ResponseShapeError } from '../utils/errors.js'
import { FakeHttpClient } from '../testing/fake-http-client.js'
import { crawlLinkedImages, resolvedUrls } from './crawler.js'
import type { LinkResolution } from './types.js'

const API = 'https://api.test/blogger/v3'
const LOOKUP = `${API}/blogs/byurl?url=http%3A%2F%2Fmyblog.blogspot.com&key=test-key`
const POSTS = `${API}/blogs/42/posts?key=test-key`

function blogWith(pages: Array<{ items: Array<{ content: string }>; nextPageToken?: string }>): FakeHttpClient {
  const http = new FakeHttpClient().json(LOOKUP, { id: '42' })
  pages.forEach((page, index) => {
    http.json(index === 0 ? POSTS : `${POSTS}&pageToken=t${index + 1}`, page)
  })
  return http
}

function crawl(http: FakeHttpClient): AsyncGenerator<LinkResolution> {
  return crawlLinkedImages(http, 'http://myblog.blogspot.com', { apiKey: 'test-key' }, { apiBase: API })
}

async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const values: T[] = []
  for await (const value of iterable) {
    values.push(value)
  }
  return values
}

describe('crawlLinkedImages', () => {
  it('resolves linked images across posts and pages in order', async () => {
    const http = blogWith([
      {
        items: [
          { content: '<a href="http://img/a.jpg"><img src="a-thumb.jpg"></a>' },
          { content: '<p>no links</p>' },
        ],
        nextPageToken: 't2',
      },
      {
        items: [
          { content: '<a href="http://pages/b.png"><img src="b-thumb.png"></a><a href="http://img/c.gif"><img src="c.gif"></a>' },
        ],
      },
    ])
      .image('http://img/a.jpg')
      .html('http://pages/b.png', '<html><img src="http://img/b-full.png"></html>')
      .image('http://img/c.gif', undefined, 'image/gif')

    const results = await collect(crawl(http))

    expect(results).toEqual([
      { success: true, link: 'http://img/a.jpg', url: 'http://img/a.jpg' },
      { success: true, link: 'http://pages/b.png', url: 'http://img/b-full.png' },
      { success: true, link: 'http://img/c.gif', url: 'http://img/c.gif' },
    ])
  })

  it('does nothing until the first element is requested', async () => {
    const http = blogWith([{ items: [{ content: '<a href="http://img/a.jpg"><img src="t.jpg"></a>' }] }])
      .image('http://img/a.jpg')

    const resolutions = crawl(http)
    expect(http.requests).toEqual([])

    await resolutions.next()
    expect(http.requests).toEqual([LOOKUP, POSTS, 'http://img/a.jpg'])
  })

  it('resolves each link only when it is requested', async () => {
    const http = blogWith([{
      items: [{ content: '<a href="http://img/1.jpg"><img src="t"></a><a href="http://img/2.jpg"><img src="t"></a>' }],
    }])
      .image('http://img/1.jpg')
      .image('http://img/2.jpg')

    const resolutions = crawl(http)
    await resolutions.next()

    expect(http.requests).not.toContain('http://img/2.jpg')
  })

  it('reports a failed link and carries on', async () => {
    const http = blogWith([{
      items: [{ content: '<a href="http://pages/empty.png"><img src="t"></a><a href="http://img/ok.png"><img src="t"></a>' }],
    }])
      .html('http://pages/empty.png', '<p>no pictures</p>')
      .image('http://img/ok.png', undefined, 'image/png')

    const results = await collect(crawl(http))

    expect(results).toHaveLength(2)
    expect(results[0]).toMatchObject({
      success: false,
      link: 'http://pages/empty.png',
      error: expect.any(NoImageFoundError),
    })
    expect(results[1]).toEqual({ success: true, link: 'http://img/ok.png', url: 'http://img/ok.png' })
  })

  it('rejects when the blog lookup fails', async () => {
    const http = new FakeHttpClient().json(LOOKUP, { error: 'not found' })

    await expect(crawl(http).next()).rejects.toBeInstanceOf(ResponseShapeError)
  })

  it('is consumed only once', async () => {
    const http = blogWith([{ items: [{ content: '<a href="http://img/a.jpg"><img src="t"></a>' }] }])
      .image('http://img/a.jpg')

    const resolutions = crawl(http)
    expect(await collect(resolutions)).toHaveLength(1)
    expect(await collect(resolutions)).toEqual([])
  })
})

describe('resolvedUrls', () => {
  async function* resolutionsOf(...items: LinkResolution[]): AsyncGenerator<LinkResolution> {
    yield* items
  }

  it('yields the resolved urls', async () => {
    const urls = resolvedUrls(resolutionsOf(
      { success: true, link: 'http://a/1.png', url: 'http://a/1.png' },
      { success: true, link: 'http://a/2.png', url: 'http://b/2.png' },
    ))

    expect(await collect(urls)).toEqual(['http://a/1.png', 'http://b/2.png'])
  })

  it('throws the first failure after yielding what came before it', async () => {
    const failure = new NoImageFoundError('http://a/page')
    const urls = resolvedUrls(resolutionsOf(
      { success: true, link: 'http://a/1.png', url: 'http://a/1.png' },
      { success: false, link: 'http://a/page', error: failure },
      { success: true, link: 'http://a/3.png', url: 'http://a/3.png' },
    ))

    await expect(urls.next()).resolves.toEqual({ done: false, value: 'http://a/1.png' })
    await expect(urls.next()).rejects.toBe(failure)
    await expect(urls.next()).resolves.toEqual({ done: true, value: undefined })
  })
})
