import { readFile, writeFile } from 'fs/promises'
import type { WordEntry } from '@/types/quiz'
import type { WordRepository } from '@/libs/words/repository'
import { SaveFailedError, SourceUnavailableError } from '@/libs/quiz/errors'
import { WordParseError, parseRepetition, parseWordRecords } from '@/libs/words/parse'
import { logger } from '@/libs/utils/logger'

// Word list as a JSON array on disk, for running without a sheet
export class LocalWordRepository implements WordRepository {
  readonly name = 'local-file'

  constructor(private readonly filePath: string) {}

  private async readJson(): Promise<unknown> {
    const raw = await readFile(this.filePath, 'utf8')
    const data: unknown = JSON.parse(raw)
    return data
  }

  private async readRecords(): Promise<WordEntry[]> {
    return parseWordRecords(await this.readJson())
  }

  async load(): Promise<WordEntry[]> {
    try {
      const pool = await this.readRecords()
      logger.info('Loaded words from file', { file: this.filePath, words: pool.length })
      return pool
    } catch (error) {
      logger.error('Error loading word file:', error instanceof Error ? error : String(error))
      throw new SourceUnavailableError(`Could not load words from ${this.filePath}`, error)
    }
  }

  /**
   * Sets the repetition of every record whose word is in the pool, never
   * lowering it. Other fields and records are written back as they were read.
   */
  async bulkSave(pool: readonly WordEntry[]): Promise<void> {
    try {
      const data = await this.readJson()
      if (!Array.isArray(data)) {
        throw new WordParseError('Word file must contain a JSON array')
      }
      const counts = new Map(pool.map(entry => [entry.word, entry.repetition]))
      const records: unknown[] = data.map((record: unknown) => {
        if (typeof record !== 'object' || record === null || Array.isArray(record)) return record
        const word = 'word' in record && typeof record.word === 'string' ? record.word.trim() : ''
        const next = counts.get(word)
        if (next === undefined) return record
        const stored = 'repetition' in record ? parseRepetition(record.repetition) : 0
        return { ...record, repetition: Math.max(stored, next) }
      })
      await writeFile(this.filePath, `${JSON.stringify(records, null, 2)}\n`, 'utf8')
      logger.info('Saved repetition counts to file', { file: this.filePath, words: records.length })
    } catch (error) {
      logger.error('Error saving word file:', error instanceof Error ? error : String(error))
      throw new SaveFailedError(`Could not save repetition counts to ${this.filePath}`, error)
    }
  }
}
