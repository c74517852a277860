const IMAGE_EXTENSIONS = ['png', 'gif', 'jpg', 'jpeg']

/**
 * Plain, case-sensitive suffix check on the whole link, query string included.
 *
 * @example
 * isImageFilename("http://x/photo.jpg") // true
 * isImageFilename("http://x/photo.JPG") // false
 * isImageFilename("http://x/photo.jpg?x=1") // false
 */
export function isImageFilename(link: string): boolean {
  return IMAGE_EXTENSIONS.some(extension => link.endsWith(extension))
}
