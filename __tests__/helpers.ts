import { mkdtemp, readFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { remove } from 'fs-extra'
import { Logger, type LogRecord } from '../src/logger'
import { parseHtml } from '../src/extract'

export function fixturePath(name: string): string {
  return join(__dirname, 'fixtures', name)
}

export async function loadFixture(name: string): Promise<string> {
  return readFile(fixturePath(name), 'utf-8')
}

export async function loadDocument(name: string): Promise<Document> {
  return parseHtml(await loadFixture(name))
}

const tempDirs: string[] = []

export async function makeTempDir(): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), 'release2cue-'))
  tempDirs.push(dir)
  return dir
}

export async function removeTempDirs(): Promise<void> {
  await Promise.all(tempDirs.splice(0).map((dir) => remove(dir)))
}

// every test file that imports the helpers cleans up after itself
afterAll(removeTempDirs)

/**
 * Logger at the given level that keeps its records for assertions.
 */
export function captureLogger(debugLevel = 3): { logger: Logger; records: LogRecord[] } {
  const records: LogRecord[] = []
  return { logger: new Logger(debugLevel, (record) => records.push(record)), records }
}
