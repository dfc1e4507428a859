import { readFileSync } from 'fs'
import { join } from 'path'

export const SAMPLE_PATH = join(__dirname, 'fixtures', 'sample.cifp')

export const SAMPLE_CONTENT = readFileSync(SAMPLE_PATH, 'utf-8')

const sampleLines = SAMPLE_CONTENT.split('\n')

// Lines of the sample file, by 1-based line number
export const AIRPORT_LINE = sampleLines[2]
export const BRAVO_PRIMARY = sampleLines[3]
export const BRAVO_CONTINUATION = sampleLines[4]
export const NDB_LINE = sampleLines[5]
export const DELTA_PRIMARY = sampleLines[6]

// Overwrite columns starting at a 1-based column
export function setColumns(line: string, start: number, text: string): string {
  return line.slice(0, start - 1) + text + line.slice(start - 1 + text.length)
}

export function joinLines(...lines: string[]): string {
  return `${lines.join('\n')}\n`
}
