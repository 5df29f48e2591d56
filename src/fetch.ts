import { request } from 'undici'
import { DEFAULT_TIMEOUT_MS, MAX_REDIRECTIONS, USER_AGENT } from './config'
import { FetchError } from './errors'

export interface FetchOptions {
  timeoutMs?: number
}

export type PageFetcher = (url: string, options?: FetchOptions) => Promise<string>

/**
 * GETs a release page and returns its markup. Redirects are followed; any
 * final status but 200 is a `FetchError`. There are no retries.
 */
export const fetchReleasePage: PageFetcher = async (url, options = {}) => {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS

  const res = await request(url, {
    headers: { 'User-Agent': USER_AGENT },
    headersTimeout: timeoutMs,
    bodyTimeout: timeoutMs,
    maxRedirections: MAX_REDIRECTIONS,
  }).catch((error: unknown) => {
    throw new FetchError(url, undefined, error)
  })

  if (res.statusCode !== 200) {
    await res.body.dump()
    throw new FetchError(url, res.statusCode)
  }

  return res.body.text()
}
