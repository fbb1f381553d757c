import type { WordEntry } from '@/types/quiz'

/**
 * Backing store for the word list.
 *
 * `load` rejects with `SourceUnavailableError` when the store cannot be read
 * or parsed; `bulkSave` rejects with `SaveFailedError`. Neither failure is
 * fatal to a quiz session.
 */
export interface WordRepository {
  readonly name: string
  load(): Promise<WordEntry[]>
  // Overwrites the stored repetition of every word in `pool` in one write
  bulkSave(pool: readonly WordEntry[]): Promise<void>
}
