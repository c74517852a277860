import { Parser } from 'htmlparser2'

export type TagAttribute = [name: string, value: string]

/**
 * Receives tag events from {@link scanTags} in document order.
 */
export interface TagVisitor {
  onTagStart(name: string, attributes: TagAttribute[]): void
  onTagEnd(name: string): void
}

/**
 * Single forward pass over `html`, without building a document tree.
 *
 * Tag names arrive lower-cased and attribute values entity-decoded. Text that
 * does not parse as a tag is skipped. Void elements such as `img` get an
 * implied end event, as do elements still open when the input ends.
 */
export function scanTags(html: string, visitor: TagVisitor): void {
  const parser = new Parser(
    {
      onopentag(name, attribs) {
        visitor.onTagStart(name, Object.entries(attribs))
      },
      onclosetag(name) {
        visitor.onTagEnd(name)
      },
    },
    {
      decodeEntities: true,
      lowerCaseTags: true,
      lowerCaseAttributeNames: true,
    }
  )

  parser.write(html)
  parser.end()
}

export function findAttribute(attributes: TagAttribute[], name: string): string | undefined {
  const match = attributes.find(([key]) => key === name)
  return match?.[1]
}
