import { findAttribute, scanTags, type TagAttribute, type TagVisitor } from './scanner.js'

// Collects every <img src> in document order
export class ImageSourceCollector implements TagVisitor {
  readonly sources: string[] = []

  onTagStart(name: string, attributes: TagAttribute[]): void {
    if (name !== 'img') return
    const src = findAttribute(attributes, 'src')
    if (src !== undefined) {
      this.sources.push(src)
    }
  }

  onTagEnd(): void {}
}

export function findImageSources(html: string): string[] {
  const collector = new ImageSourceCollector()
  scanTags(html, collector)
  return collector.sources
}
