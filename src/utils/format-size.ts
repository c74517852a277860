const UNITS = ['bytes', 'Kb', 'Mb', 'Gb']

/**
 * @example
 * formatSize(2_300_000) // "2.30 Mb"
 */
export function formatSize(bytes: number): string {
  let factor = 1
  for (const unit of UNITS) {
    if (bytes / factor < 1000) {
      return `${(bytes / factor).toFixed(2)} ${unit}`
    }
    factor *= 1000
  }
  return `${(bytes / factor).toFixed(2)} Tb`
}
