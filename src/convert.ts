import { DEFAULT_PERFORMER, DEFAULT_TIMEOUT_MS, type ConvertOptions } from './config'
import { writeCueSheets, type DiscFailure } from './cue'
import { extractRelease, parseHtml } from './extract'
import { fetchReleasePage, type PageFetcher } from './fetch'
import { silentLogger } from './logger'
import { defaultCueFileName } from './utils'

export type ConvertStatus = 'ok' | 'partial' | 'no-tracklist'

export interface ConvertResult {
  status: ConvertStatus
  albumTitle: string
  written: string[]
  failed: DiscFailure[]
}

export interface ConvertDeps {
  fetchPage?: PageFetcher
}

/**
 * Fetches a MusicBrainz release page and writes one cue sheet per disc.
 * A failed fetch rejects with `FetchError` before anything is written.
 */
export async function convertReleaseToCue(
  options: Partial<ConvertOptions> & Pick<ConvertOptions, 'url' | 'wavFileName'>,
  { fetchPage = fetchReleasePage }: ConvertDeps = {}
): Promise<ConvertResult> {
  const logger = options.logger ?? silentLogger
  const performer = options.performer ?? DEFAULT_PERFORMER

  const html = await fetchPage(options.url, {
    timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
  })
  const release = extractRelease(parseHtml(html), logger)

  if (!release.discs) {
    logger.error(`No tracklist found at ${options.url}`)
    return {
      status: 'no-tracklist',
      albumTitle: release.albumTitle,
      written: [],
      failed: [],
    }
  }

  const baseFileName =
    options.outputFile ?? defaultCueFileName(release.albumTitle)

  const { written, failed } = await writeCueSheets(
    release.discs,
    {
      albumTitle: release.albumTitle,
      performer,
      audioFileName: options.wavFileName,
    },
    baseFileName,
    logger
  )

  if (failed.length === 0) {
    logger.notice('CUE sheets created successfully.')
  }

  return {
    status: failed.length === 0 ? 'ok' : 'partial',
    albumTitle: release.albumTitle,
    written,
    failed,
  }
}
