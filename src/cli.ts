import chalk from 'chalk'
import { Command, InvalidArgumentError } from 'commander'
import {
  DEFAULT_PERFORMER,
  DEFAULT_TIMEOUT_MS,
  resolveCliOptions,
  type CliFlags,
} from './config'
import { convertReleaseToCue, type ConvertDeps, type ConvertResult } from './convert'
import { Logger, consoleSink, type LogSink } from './logger'

export interface CliDeps extends ConvertDeps {
  convert?: typeof convertReleaseToCue
  sink?: LogSink
  /** Fatal messages, printed whatever the debug level */
  reportError?: (message: string) => void
  setExitCode?: (code: number) => void
}

const DIGITS = /^\d+$/

function parseInteger(min: number) {
  return (value: string): number => {
    if (!DIGITS.test(value) || parseInt(value, 10) < min) {
      throw new InvalidArgumentError(`Expected an integer >= ${min}.`)
    }
    return parseInt(value, 10)
  }
}

function exitCodeFor(result: ConvertResult): number {
  return result.status === 'ok' ? 0 : 1
}

export async function runCli(flags: CliFlags, deps: CliDeps = {}): Promise<number> {
  const {
    convert = convertReleaseToCue,
    sink = consoleSink,
    reportError = (message: string) => console.error(chalk.red(message)),
  } = deps

  try {
    const options = resolveCliOptions(flags, new Logger(flags.debug_level, sink))
    const result = await convert(options, { fetchPage: deps.fetchPage })

    if (result.status === 'no-tracklist') {
      reportError(`No tracklist found for "${result.albumTitle}".`)
    }
    for (const { discNumber, error } of result.failed) {
      reportError(`Disc ${discNumber} was not written: ${error.message}`)
    }

    return exitCodeFor(result)
  } catch (error) {
    reportError(
      `An error occurred: ${error instanceof Error ? error.message : String(error)}`
    )
    return 1
  }
}

export function createProgram(deps: CliDeps = {}): Command {
  const setExitCode =
    deps.setExitCode ??
    ((code: number) => {
      process.exitCode = code
    })

  return new Command()
    .name('release2cue')
    .description(
      'Extract the tracklist of a MusicBrainz release and write one CUE sheet per disc.'
    )
    .requiredOption('--url <url>', 'MusicBrainz release URL')
    .option(
      '--output_file <file>',
      'Output CUE file name, used as a path (album.cue creates album_disc1.cue, album_disc2.cue, ...); defaults to "<album title>.cue" with / replaced by _'
    )
    .option(
      '--wav_filename <file>',
      'WAV file name written into every sheet (required, or --wav_file)'
    )
    .option('--wav_file <file>', 'alias of --wav_filename (required, or --wav_filename)')
    .option('--performer <name>', 'Album performer', DEFAULT_PERFORMER)
    .option(
      '--debug_level <level>',
      'Debug level (0: quiet, 1: errors, 2: info, 3: tracks)',
      parseInteger(0),
      0
    )
    .option(
      '--timeout <ms>',
      'Fetch timeout in milliseconds',
      parseInteger(1),
      DEFAULT_TIMEOUT_MS
    )
    .action(async (flags: CliFlags) => {
      setExitCode(await runCli(flags, deps))
    })
}
