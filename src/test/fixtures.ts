import { vi } from 'vitest'
import type { WordEntry } from '@/types/quiz'
import type { WordRepository } from '@/libs/words/repository'

export function makeWord(word: string, overrides: Partial<WordEntry> = {}): WordEntry {
  return {
    word,
    definition: `meaning of ${word}`,
    partOfSpeech: 'adjective',
    synonyms: [`${word}-syn`],
    antonyms: [`${word}-ant`],
    repetition: 0,
    ...overrides
  }
}

// Five adjectives at repetition 0, "brief" first
export function briefPool(): WordEntry[] {
  return [
    makeWord('brief', { definition: 'short', synonyms: ['short', 'concise'], antonyms: ['long'] }),
    makeWord('terse', { definition: 'using few words', synonyms: ['curt'], antonyms: ['wordy'] }),
    makeWord('ample', { definition: 'more than enough', synonyms: ['plentiful'], antonyms: ['scarce'] }),
    makeWord('feeble', { definition: 'lacking strength', synonyms: ['weak'], antonyms: ['strong'] }),
    makeWord('candid', { definition: 'truthful and direct', synonyms: ['frank'], antonyms: ['evasive'] })
  ]
}

export function wordPool(size: number): WordEntry[] {
  return Array.from({ length: size }, (_, index) => makeWord(`word${index}`))
}

export class FakeWordRepository implements WordRepository {
  readonly name = 'fake'
  readonly load = vi.fn(async (): Promise<WordEntry[]> => this.words)
  readonly bulkSave = vi.fn(async (_pool: readonly WordEntry[]): Promise<void> => {})

  constructor(private readonly words: WordEntry[]) {}
}
