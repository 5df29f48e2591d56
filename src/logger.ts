import chalk from 'chalk'

/**
 * Verbosity tiers selected by `--debug_level`:
 * 1 = warnings, errors and written files, 2 = info, 3 = per-track trace.
 */
export type LogTier = 1 | 2 | 3

export type LogKind = 'error' | 'warn' | 'notice' | 'info' | 'trace'

export interface LogRecord {
  tier: LogTier
  kind: LogKind
  message: string
}

export type LogSink = (record: LogRecord) => void

export const consoleSink: LogSink = ({ kind, message }) => {
  switch (kind) {
    case 'error':
      console.error(chalk.red(message))
      break
    case 'warn':
      console.warn(chalk.yellow(message))
      break
    case 'trace':
      console.log(chalk.gray(message))
      break
    default:
      console.log(message)
  }
}

export class Logger {
  constructor(
    public readonly debugLevel: number = 0,
    private readonly sink: LogSink = consoleSink
  ) {}

  enabled(tier: LogTier): boolean {
    return this.debugLevel >= tier
  }

  log(tier: LogTier, message: string, kind: LogKind = 'notice'): void {
    if (this.enabled(tier)) {
      this.sink({ tier, kind, message })
    }
  }

  error(message: string): void {
    this.log(1, message, 'error')
  }

  warn(message: string): void {
    this.log(1, message, 'warn')
  }

  notice(message: string): void {
    this.log(1, message, 'notice')
  }

  info(message: string): void {
    this.log(2, message, 'info')
  }

  trace(message: string): void {
    this.log(3, message, 'trace')
  }
}

/** Logger that drops everything, for callers that don't pass one */
export const silentLogger = new Logger(0)
