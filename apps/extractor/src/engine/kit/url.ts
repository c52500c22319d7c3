/**
 * Hostname reduced to characters safe in a file name; `page` when the URL does not parse.
 */
export function fileSafeHost(url: string): string {
  if (!URL.canParse(url)) {
    return 'page'
  }
  return new URL(url).hostname.replace(/[^a-z0-9.-]/gi, '_') || 'page'
}

/** `007_example.com.html` style names, ordered by position in the run */
export function indexedFileName(url: string, index: number, ext: string): string {
  return `${String(index).padStart(3, '0')}_${fileSafeHost(url)}.${ext}`
}
