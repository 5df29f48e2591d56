import { JSDOM } from 'jsdom'
import { COLUMN, MIN_ROW_CELLS, SELECTORS, UNKNOWN_ALBUM } from './config'
import { silentLogger, type Logger } from './logger'
import type { Disc, Release, Track } from './types'

/**
 * How `textOf` reads an element: the text of the first `nested` match, else
 * the element's own text (`'self'`) or nothing (`'none'`).
 */
export interface TextPolicy {
  nested?: string
  fallback: 'self' | 'none'
}

export function textOf(
  element: Element,
  policy: TextPolicy
): string | undefined {
  const nested = policy.nested ? element.querySelector(policy.nested) : null
  if (nested) {
    return (nested.textContent ?? '').trim()
  }
  if (policy.fallback === 'self') {
    return (element.textContent ?? '').trim()
  }
  return undefined
}

const bidiOrSelf: TextPolicy = { nested: SELECTORS.bidiText, fallback: 'self' }
const bidiOnly: TextPolicy = { nested: SELECTORS.bidiText, fallback: 'none' }

export function parseHtml(html: string): Document {
  return new JSDOM(html).window.document
}

export function extractAlbumTitle(
  document: Document,
  logger: Logger = silentLogger
): string {
  const heading = document.querySelector(SELECTORS.titleHeading)
  const albumTitle = heading ? textOf(heading, bidiOnly) : undefined

  if (albumTitle === undefined) {
    logger.warn('Album title not found.')
    return UNKNOWN_ALBUM
  }

  logger.info(`Extracted album title: ${albumTitle}`)
  return albumTitle
}

/**
 * Tracklist tables in document order. Scoped to the tracklist container when
 * the page has one holding such tables, the whole page otherwise.
 */
export function findTracklistTables(document: Document): Element[] {
  const scoped = Array.from(
    document.querySelectorAll(
      `${SELECTORS.tracklistContainer} ${SELECTORS.tracklistTable}`
    )
  )
  if (scoped.length > 0) {
    return scoped
  }

  return Array.from(document.querySelectorAll(SELECTORS.tracklistTable))
}

/**
 * Reads one table row, or returns null for a row that isn't a track.
 */
export function extractTrack(row: Element, discNumber: number): Track | null {
  const cells = Array.from(row.querySelectorAll(SELECTORS.cell))
  if (cells.length < MIN_ROW_CELLS) {
    return null
  }

  return {
    trackNumber: textOf(cells[COLUMN.trackNumber], { fallback: 'self' }) ?? '',
    title: textOf(cells[COLUMN.title], bidiOrSelf) ?? '',
    artist: textOf(cells[COLUMN.artist], bidiOrSelf) ?? '',
    length: textOf(cells[COLUMN.length], { fallback: 'self' }) ?? '',
    discNumber,
  }
}

export function extractDisc(
  table: Element,
  discNumber: number,
  logger: Logger = silentLogger
): Disc {
  const tracks: Track[] = []

  for (const row of Array.from(table.querySelectorAll(SELECTORS.trackRow))) {
    const track = extractTrack(row, discNumber)
    if (!track) {
      continue
    }

    tracks.push(track)
    logger.trace(
      `Extracted track: ${track.trackNumber} - ${track.title} - ${track.artist} - ${track.length}`
    )
  }

  logger.info(`Extracted ${tracks.length} tracks for disc ${discNumber}.`)
  return { discNumber, tracks }
}

/**
 * Builds the release model from a parsed MusicBrainz release page.
 */
export function extractRelease(
  document: Document,
  logger: Logger = silentLogger
): Release {
  const albumTitle = extractAlbumTitle(document, logger)

  const tables = findTracklistTables(document)
  if (tables.length === 0) {
    logger.warn('No tracklist tables found!')
    return { albumTitle, discs: null }
  }

  const discs = tables.map((table, index) =>
    extractDisc(table, index + 1, logger)
  )

  return { albumTitle, discs }
}
