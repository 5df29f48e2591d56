/**
 * One row of a disc's tracklist, as printed on the release page.
 */
export interface Track {
  /** Verbatim text of the first cell, parsed as an integer only when encoding */
  trackNumber: string
  title: string
  artist: string
  /** `minutes:seconds` */
  length: string
  discNumber: number
}

export interface Disc {
  discNumber: number
  tracks: readonly Track[]
}

export interface Release {
  albumTitle: string
  /** `null` when the page holds no tracklist table */
  discs: readonly Disc[] | null
}

/**
 * Header values shared by every disc of a release.
 */
export interface CueSheetInfo {
  albumTitle: string
  performer: string
  audioFileName: string
  discCount: number
}
