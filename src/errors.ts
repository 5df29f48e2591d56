export class Release2CueError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause })
    this.name = 'Release2CueError'
  }
}

export class FetchError extends Release2CueError {
  constructor(
    public readonly url: string,
    public readonly statusCode?: number,
    cause?: unknown
  ) {
    super(
      statusCode === undefined
        ? `Failed to fetch page: ${url}`
        : `Failed to fetch page: ${statusCode}`,
      'FETCH_FAILED',
      cause
    )
    this.name = 'FetchError'
  }
}

export type EncodingField = 'length' | 'trackNumber'

export class EncodingError extends Release2CueError {
  constructor(
    public readonly field: EncodingField,
    public readonly value: string
  ) {
    super(`Invalid ${field} "${value}"`, 'ENCODING_FAILED')
    this.name = 'EncodingError'
  }
}
