import type { WordEntry } from '@/types/quiz'
import type { WordRepository } from '@/libs/words/repository'
import { SaveFailedError, SourceUnavailableError } from '@/libs/quiz/errors'
import { COLUMNS, WordParseError, locateColumns, parseRepetition, parseWordRows } from '@/libs/words/parse'
import { SheetsClient, columnLetter, quoteSheetName } from '@/libs/google/sheets'
import type { CellValue } from '@/libs/google/sheets'
import { logger } from '@/libs/utils/logger'

/**
 * Word list kept in one tab of a Google Sheet, header row first. Data is
 * expected to start at cell A1.
 */
export class GoogleSheetsWordRepository implements WordRepository {
  readonly name = 'google-sheets'

  constructor(
    private readonly client: SheetsClient,
    private readonly sheetName: string
  ) {}

  async load(): Promise<WordEntry[]> {
    try {
      const rows = await this.client.getValues(quoteSheetName(this.sheetName))
      const pool = parseWordRows(rows)
      logger.info('Loaded words from sheet', { sheet: this.sheetName, words: pool.length })
      return pool
    } catch (error) {
      logger.error('Error loading word sheet:', error instanceof Error ? error : String(error))
      throw new SourceUnavailableError(`Could not load words from sheet "${this.sheetName}"`, error)
    }
  }

  /**
   * Rewrites the whole Repetition column in a single update. Rows are matched
   * by word against a fresh read of the sheet; rows for words outside the pool
   * keep their current value, and a stored count is never lowered.
   */
  async bulkSave(pool: readonly WordEntry[]): Promise<void> {
    try {
      const rows = await this.client.getValues(quoteSheetName(this.sheetName))
      if (rows.length === 0) {
        throw new WordParseError('Word sheet is empty')
      }

      const header = rows[0]
      const { columns } = locateColumns(header)
      const repetitionIndex = columns.repetition >= 0 ? columns.repetition : header.length
      const counts = new Map(pool.map(entry => [entry.word, entry.repetition]))

      const column: CellValue[][] = [[COLUMNS.repetition]]
      for (const row of rows.slice(1)) {
        const current = row[repetitionIndex] ?? ''
        const next = counts.get((row[columns.word] ?? '').trim())
        column.push([next === undefined ? current : Math.max(parseRepetition(current), next)])
      }

      const letter = columnLetter(repetitionIndex)
      const range = `${quoteSheetName(this.sheetName)}!${letter}1:${letter}${column.length}`
      await this.client.updateValues(range, column)
      logger.info('Saved repetition counts to sheet', { sheet: this.sheetName, rows: column.length - 1 })
    } catch (error) {
      logger.error('Error saving repetition counts:', error instanceof Error ? error : String(error))
      throw new SaveFailedError(`Could not save repetition counts to sheet "${this.sheetName}"`, error)
    }
  }
}
