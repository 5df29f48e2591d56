import { outputFile } from 'fs-extra'
import { AUDIO_FILE_TYPE } from './config'
import { EncodingError } from './errors'
import { silentLogger, type Logger } from './logger'
import type { CueSheetInfo, Disc, Track } from './types'
import { discFileName, formatIndexTime } from './utils'

const DIGITS = /^\d+$/

/**
 * `minutes:seconds` to total seconds.
 */
export function parseLength(length: string): number {
  const parts = length.split(':')
  if (parts.length !== 2 || !parts.every((part) => DIGITS.test(part))) {
    throw new EncodingError('length', length)
  }

  const [minutes, seconds] = parts.map((part) => parseInt(part, 10))
  return minutes * 60 + seconds
}

export function parseTrackNumber(trackNumber: string): number {
  if (!DIGITS.test(trackNumber)) {
    throw new EncodingError('trackNumber', trackNumber)
  }
  return parseInt(trackNumber, 10)
}

export function generateCueHeader(
  discNumber: number,
  sheet: CueSheetInfo
): string {
  const title =
    sheet.discCount > 1
      ? `${sheet.albumTitle} (Disc ${discNumber})`
      : sheet.albumTitle

  let cueContent = `PERFORMER "${sheet.performer}"\n`
  cueContent += `TITLE "${title}"\n`
  cueContent += `FILE "${sheet.audioFileName}" ${AUDIO_FILE_TYPE}\n`

  return cueContent
}

function generateTrackBlock(
  track: Track,
  startSeconds: number,
  performer: string
): string {
  const trackNumber = String(parseTrackNumber(track.trackNumber)).padStart(2, '0')

  let block = `\nTRACK ${trackNumber} AUDIO\n`
  block += `    TITLE "${track.title}"\n`
  block += `    PERFORMER "${track.artist || performer}"\n`
  block += `    INDEX 01 ${formatIndexTime(startSeconds)}\n`

  return block
}

/**
 * Renders one disc's cue sheet. Tracks are laid back to back: each INDEX is
 * the sum of the lengths of the tracks before it on the same disc.
 *
 * @throws EncodingError when a track's length or number doesn't parse
 */
export function generateCueFileContent(disc: Disc, sheet: CueSheetInfo): string {
  let cueContent = generateCueHeader(disc.discNumber, sheet)

  let totalSeconds = 0
  for (const track of disc.tracks) {
    const lengthSeconds = parseLength(track.length)
    cueContent += generateTrackBlock(track, totalSeconds, sheet.performer)
    totalSeconds += lengthSeconds
  }

  return cueContent
}

export interface DiscFailure {
  discNumber: number
  error: EncodingError
}

export interface WriteResult {
  written: string[]
  failed: DiscFailure[]
}

/**
 * Writes one cue sheet per disc next to `baseFileName`. A disc whose tracks
 * don't encode is reported in `failed` and leaves no file behind; the other
 * discs are still written.
 */
export async function writeCueSheets(
  discs: readonly Disc[],
  sheet: Omit<CueSheetInfo, 'discCount'>,
  baseFileName: string,
  logger: Logger = silentLogger
): Promise<WriteResult> {
  const result: WriteResult = { written: [], failed: [] }
  const info: CueSheetInfo = { ...sheet, discCount: discs.length }

  for (const disc of discs) {
    const cueFilePath = discFileName(baseFileName, disc.discNumber)

    let cueFileContent: string
    try {
      cueFileContent = generateCueFileContent(disc, info)
    } catch (error) {
      if (!(error instanceof EncodingError)) {
        throw error
      }
      logger.error(
        `Skipping disc ${disc.discNumber}: ${error.message}. ${cueFilePath} was not written.`
      )
      result.failed.push({ discNumber: disc.discNumber, error })
      continue
    }

    await outputFile(cueFilePath, cueFileContent, 'utf-8')
    logger.notice(`CUE sheet written to ${cueFilePath}.`)
    result.written.push(cueFilePath)
  }

  return result
}
