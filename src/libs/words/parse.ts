import type { WordEntry } from '@/types/quiz'
import { logger } from '@/libs/utils/logger'

// Column headers of the word sheet
export const COLUMNS = {
  word: 'Word',
  definition: 'Polished Definition',
  partOfSpeech: 'Part of Speech',
  synonyms: 'Synonyms',
  antonyms: 'Antonyms',
  repetition: 'Repetition'
} as const

export class WordParseError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'WordParseError'
  }
}

// "short, concise" -> ["short", "concise"]
export function splitList(cell: string | undefined): string[] {
  if (!cell) return []
  return cell
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0)
}

// Missing, blank or unreadable counts start at 0; "1,000" is a formatted 1000
export function parseRepetition(value: unknown): number {
  if (typeof value === 'number') {
    return Number.isInteger(value) && value >= 0 ? value : 0
  }
  if (typeof value !== 'string') return 0
  const digits = value.replace(/[,\s]/g, '')
  if (digits === '') return 0
  const parsed = Number(digits)
  return Number.isInteger(parsed) && parsed >= 0 ? parsed : 0
}

// Keeps the first entry for every word
export function dedupeEntries(entries: WordEntry[]): WordEntry[] {
  const seen = new Set<string>()
  const result: WordEntry[] = []
  for (const entry of entries) {
    if (seen.has(entry.word)) {
      logger.warn('Duplicate word dropped from pool', { word: entry.word })
      continue
    }
    seen.add(entry.word)
    result.push(entry)
  }
  return result
}

export interface SheetLayout {
  columns: Record<keyof typeof COLUMNS, number>
}

export function locateColumns(header: readonly string[]): SheetLayout {
  const indexOf = (name: string) => header.findIndex(cell => cell.trim() === name)
  const columns = {
    word: indexOf(COLUMNS.word),
    definition: indexOf(COLUMNS.definition),
    partOfSpeech: indexOf(COLUMNS.partOfSpeech),
    synonyms: indexOf(COLUMNS.synonyms),
    antonyms: indexOf(COLUMNS.antonyms),
    repetition: indexOf(COLUMNS.repetition)
  }

  const missing = (['word', 'definition', 'partOfSpeech', 'synonyms', 'antonyms'] as const)
    .filter(key => columns[key] < 0)
    .map(key => COLUMNS[key])
  if (missing.length > 0) {
    throw new WordParseError(`Word sheet is missing column(s): ${missing.join(', ')}`)
  }

  return { columns }
}

/**
 * Turns sheet rows (header first) into word entries. Rows without a word are
 * skipped; a missing Repetition column means every count starts at 0.
 */
export function parseWordRows(rows: readonly (readonly string[])[]): WordEntry[] {
  if (rows.length === 0) return []
  const { columns } = locateColumns(rows[0])
  const cell = (row: readonly string[], index: number) => (index >= 0 ? row[index]?.trim() ?? '' : '')

  const entries = rows.slice(1)
    .filter(row => cell(row, columns.word).length > 0)
    .map(row => ({
      word: cell(row, columns.word),
      definition: cell(row, columns.definition),
      partOfSpeech: cell(row, columns.partOfSpeech),
      synonyms: splitList(cell(row, columns.synonyms)),
      antonyms: splitList(cell(row, columns.antonyms)),
      repetition: parseRepetition(cell(row, columns.repetition))
    }))

  return dedupeEntries(entries)
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function readList(value: unknown): string[] {
  if (typeof value === 'string') return splitList(value)
  if (Array.isArray(value)) {
    return value
      .filter((item): item is string => typeof item === 'string')
      .map(item => item.trim())
      .filter(item => item.length > 0)
  }
  return []
}

function readString(value: unknown): string {
  return typeof value === 'string' ? value.trim() : ''
}

// Validates one record of the local JSON word file
export function parseWordRecord(value: unknown, position: number): WordEntry {
  if (!isRecord(value)) {
    throw new WordParseError(`Word record ${position} is not an object`)
  }
  const word = readString(value.word)
  if (!word) {
    throw new WordParseError(`Word record ${position} has no word`)
  }
  return {
    word,
    definition: readString(value.definition),
    partOfSpeech: readString(value.partOfSpeech),
    synonyms: readList(value.synonyms),
    antonyms: readList(value.antonyms),
    repetition: parseRepetition(value.repetition)
  }
}

export function parseWordRecords(value: unknown): WordEntry[] {
  if (!Array.isArray(value)) {
    throw new WordParseError('Word file must contain a JSON array')
  }
  return dedupeEntries(value.map((record, index) => parseWordRecord(record, index)))
}
