import { mkdir, writeFile } from 'fs/promises'
import path from 'path'
import { fetchBytes, type HttpClient } from '../scrapers/http.js'
import { DownloadWriteError } from '../utils/errors.js'
import { logger } from '../utils/logger.js'

// Everything after the last slash, undecoded
export function filenameFromUrl(url: string): string {
  return url.slice(url.lastIndexOf('/') + 1)
}

/**
 * Saves the resource at `url` into `directory` under its own name and returns
 * the number of bytes written. An existing file with the same name is
 * overwritten.
 */
export async function downloadToDirectory(
  client: HttpClient,
  url: string,
  directory: string
): Promise<number> {
  const data = await fetchBytes(client, url)
  const filepath = path.join(directory, filenameFromUrl(url))

  try {
    await mkdir(directory, { recursive: true })
    await writeFile(filepath, data)
  } catch (error) {
    throw new DownloadWriteError(filepath, { cause: error })
  }

  logger.debug({ url, filepath, bytes: data.byteLength }, 'Downloaded image')
  return data.byteLength
}
