import { Logger } from './logger'

export const USER_AGENT = 'Mozilla/5.0'
export const UNKNOWN_ALBUM = 'Unknown Album'
export const DEFAULT_PERFORMER = 'Various Artists'
export const DEFAULT_TIMEOUT_MS = 20_000
export const MAX_REDIRECTIONS = 5
export const AUDIO_FILE_TYPE = 'WAVE'
export const CUE_EXTENSION = '.cue'

/**
 * Markup of a MusicBrainz release page.
 */
export const SELECTORS = {
  titleHeading: 'h1',
  bidiText: 'bdi',
  tracklistContainer: 'div.tracklist-and-credits',
  tracklistTable: 'table.tbl.medium',
  trackRow: 'tr.odd, tr.even',
  cell: 'td',
} as const

/** A data row needs at least this many cells; the length sits in the fifth */
export const MIN_ROW_CELLS = 5

export const COLUMN = {
  trackNumber: 0,
  title: 1,
  artist: 2,
  length: 4,
} as const

export interface ConvertOptions {
  url: string
  wavFileName: string
  /** Base name of the cue files, `_discN` is inserted before its extension */
  outputFile?: string
  performer: string
  timeoutMs: number
  logger: Logger
}

/**
 * Flags as commander hands them over.
 */
export interface CliFlags {
  url: string
  wav_filename?: string
  wav_file?: string
  output_file?: string
  performer: string
  debug_level: number
  timeout: number
}

export function resolveCliOptions(
  flags: CliFlags,
  logger: Logger = new Logger(flags.debug_level)
): ConvertOptions {
  const wavFileName = flags.wav_filename ?? flags.wav_file
  if (!wavFileName) {
    throw new Error('--wav_filename (or --wav_file) is required')
  }

  return {
    url: flags.url,
    wavFileName,
    outputFile: flags.output_file,
    performer: flags.performer,
    timeoutMs: flags.timeout,
    logger,
  }
}
