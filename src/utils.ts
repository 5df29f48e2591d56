import { basename, extname } from 'node:path'
import { pathExists } from 'fs-extra'
import * as cueParser from 'cue-parser'
import { CUE_EXTENSION } from './config'
import { silentLogger, type Logger } from './logger'

/**
 * A track read back from a CUE file.
 */
export interface CueTrack {
  trackNumber: number
  title: string
  performer: string
  startTimeSeconds: number // Start time in total seconds
}

/**
 * The parts of a CUE file this tool writes.
 */
export interface ParsedCueFile {
  title?: string
  performer?: string
  audioFileName: string
  tracks: CueTrack[]
}

/**
 * Formats a running time in whole seconds as a cue INDEX position, MM:SS:FF.
 * Frames are always `00`; minutes keep growing past 99.
 */
export function formatIndexTime(totalSeconds: number): string {
  const mm = String(Math.floor(totalSeconds / 60)).padStart(2, '0')
  const ss = String(totalSeconds % 60).padStart(2, '0')

  return `${mm}:${ss}:00`
}

/**
 * Converts MM:SS:FF (minutes:seconds:frames) format to total seconds.
 * Assumes 75 frames per second (standard for audio CDs).
 */
export function cueTimeToSeconds({
  min,
  sec,
  frame,
}: {
  min: number
  sec: number
  frame: number
}): number {
  return min * 60 + sec + frame / 75
}

/**
 * `Album.cue` -> `Album_disc2.cue`. A name without extension gets `.cue`;
 * a bare `.cue` (empty album title) gives `_disc2.cue`.
 */
export function discFileName(baseFileName: string, discNumber: number): string {
  const extension =
    basename(baseFileName) === CUE_EXTENSION
      ? CUE_EXTENSION
      : extname(baseFileName)
  const stem = extension
    ? baseFileName.slice(0, -extension.length)
    : baseFileName

  return `${stem}_disc${discNumber}${extension || CUE_EXTENSION}`
}

/**
 * Cue file name derived from the album title, with `/` made filesystem safe.
 */
export function defaultCueFileName(albumTitle: string): string {
  return `${albumTitle}${CUE_EXTENSION}`.replaceAll('/', '_')
}

type UnknownRecord = Record<string, unknown>

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null
}

function listOf(value: unknown): unknown[] {
  return Array.isArray(value) ? value : []
}

function stringOf(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined
}

function numberOf(value: unknown): number {
  return typeof value === 'number' ? value : 0
}

function toCueTrack(track: unknown, logger: Logger): CueTrack | null {
  if (!isRecord(track)) {
    return null
  }

  // INDEX 01 marks where the track starts
  const index01 = listOf(track.indexes)
    .filter(isRecord)
    .find((idx) => idx.number === 1)
  const time = index01?.time
  if (!isRecord(time)) {
    logger.warn(`Track ${String(track.number)} is missing INDEX 01. Skipping.`)
    return null
  }

  return {
    trackNumber: numberOf(track.number),
    title: stringOf(track.title) ?? '',
    performer: stringOf(track.performer) ?? 'Unknown Artist',
    startTimeSeconds: cueTimeToSeconds({
      min: numberOf(time.min),
      sec: numberOf(time.sec),
      frame: numberOf(time.frame),
    }),
  }
}

/**
 * Parses a .cue file using the 'cue-parser' npm package to extract
 * the audio file name and track information.
 */
export async function parseCueFile(
  cueFilePath: string,
  logger: Logger = silentLogger
): Promise<ParsedCueFile> {
  if (!(await pathExists(cueFilePath))) {
    throw new Error(`CUE file not found: ${cueFilePath}`)
  }

  let parsedCueSheet: unknown
  try {
    parsedCueSheet = cueParser.parse(cueFilePath)
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new Error(`Error parsing CUE file with cue-parser: ${reason}`)
  }

  const files = isRecord(parsedCueSheet) ? listOf(parsedCueSheet.files) : []
  const audioFileEntry = files.find(isRecord)
  if (!isRecord(parsedCueSheet) || !audioFileEntry) {
    throw new Error(`No file entries found in CUE sheet: ${cueFilePath}`)
  }

  const audioFileName = stringOf(audioFileEntry.name) ?? ''
  const rawTracks = listOf(audioFileEntry.tracks)
  if (rawTracks.length === 0) {
    throw new Error(
      `No tracks found for audio file '${audioFileName}' in CUE sheet: ${cueFilePath}`
    )
  }

  const tracks = rawTracks
    .map((track) => toCueTrack(track, logger))
    .filter((track): track is CueTrack => track !== null)

  return {
    title: stringOf(parsedCueSheet.title),
    performer: stringOf(parsedCueSheet.performer),
    audioFileName,
    tracks,
  }
}
