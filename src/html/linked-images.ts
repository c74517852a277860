import { isImageFilename } from '../utils/is-image-filename.js'
import { findAttribute, scanTags, type TagAttribute, type TagVisitor } from './scanner.js'

/**
 * Finds images that are links to another image:
 *
 *   <a href="image.jpg"><img src="thumb.jpg"></a>  ->  "image.jpg"
 *
 * Only the innermost open anchor is considered, and it does not have to be the
 * image's direct parent, so an image inside a div or list inside a link counts
 * too.
 */
export class LinkedImageCollector implements TagVisitor {
  readonly links: string[] = []
  private readonly anchorStack: string[] = []

  get depth(): number {
    return this.anchorStack.length
  }

  onTagStart(name: string, attributes: TagAttribute[]): void {
    if (name === 'a') {
      const href = findAttribute(attributes, 'href')
      if (href !== undefined) {
        this.anchorStack.push(href)
      }
      return
    }

    if (name === 'img' && this.anchorStack.length > 0) {
      const link = this.anchorStack[this.anchorStack.length - 1]
      if (isImageFilename(link)) {
        this.links.push(link)
      }
    }
  }

  onTagEnd(name: string): void {
    if (name === 'a' && this.anchorStack.length > 0) {
      this.anchorStack.pop()
    }
  }
}

export function findLinkedImages(html: string): string[] {
  const collector = new LinkedImageCollector()
  scanTags(html, collector)
  return collector.links
}
