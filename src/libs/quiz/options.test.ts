import { afterEach, describe, expect, it, vi } from 'vitest'
import type { Question } from '@/types/quiz'
import { MAX_DISTRACTORS, distractorCandidates, synthesizeOptions } from '@/libs/quiz/options'
import { logger } from '@/libs/utils/logger'
import { briefPool, makeWord } from '@/test/fixtures'

const briefDefinition: Question = {
  word: 'brief',
  type: 'definition',
  correctAnswer: 'short',
  partOfSpeech: 'adjective'
}

afterEach(() => {
  vi.restoreAllMocks()
})

describe('distractorCandidates', () => {
  it('uses other definitions of the same part of speech', () => {
    const pool = [...briefPool(), makeWord('peril', { partOfSpeech: 'noun', definition: 'danger' })]

    expect(distractorCandidates(briefDefinition, pool)).toEqual([
      'using few words',
      'more than enough',
      'lacking strength',
      'truthful and direct'
    ])
  })

  it('lists a shared definition once and never the correct one', () => {
    const pool = [
      ...briefPool(),
      makeWord('curt', { definition: 'using few words' }),
      makeWord('short', { definition: 'short' })
    ]

    expect(distractorCandidates(briefDefinition, pool)).toEqual([
      'using few words',
      'more than enough',
      'lacking strength',
      'truthful and direct'
    ])
  })

  it('uses other headwords for synonym questions, skipping every listed synonym', () => {
    const pool = [
      ...briefPool(),
      makeWord('concise'),
      makeWord('short'),
      makeWord('swift', { partOfSpeech: 'verb' })
    ]
    const question: Question = {
      word: 'brief',
      type: 'synonym',
      correctAnswer: 'concise',
      partOfSpeech: 'adjective'
    }

    expect(distractorCandidates(question, pool)).toEqual(['terse', 'ample', 'feeble', 'candid'])
  })
})

describe('synthesizeOptions', () => {
  it('offers four distractors plus the correct answer', () => {
    const pool = [...briefPool(), makeWord('vast'), makeWord('dim')]
    const options = synthesizeOptions(briefDefinition, pool)

    expect(options).toHaveLength(MAX_DISTRACTORS + 1)
    expect(new Set(options).size).toBe(options.length)
    expect(options.filter(option => option === 'short')).toHaveLength(1)
  })

  it('shrinks under scarcity and logs a warning', () => {
    const warn = vi.spyOn(logger, 'warn').mockImplementation(() => {})
    const pool = briefPool().slice(0, 3)

    const options = synthesizeOptions(briefDefinition, pool)

    expect([...options].sort()).toEqual(['more than enough', 'short', 'using few words'])
    expect(warn).toHaveBeenCalledWith('Not enough distractors for question', {
      word: 'brief',
      type: 'definition',
      partOfSpeech: 'adjective',
      available: 2
    })
  })

  it('still offers the correct answer when nothing else fits', () => {
    vi.spyOn(logger, 'warn').mockImplementation(() => {})
    const pool = [briefPool()[0], makeWord('peril', { partOfSpeech: 'noun' })]

    expect(synthesizeOptions(briefDefinition, pool)).toEqual(['short'])
  })

  it('sizes the options from the candidate count', () => {
    vi.spyOn(logger, 'warn').mockImplementation(() => {})
    const pool = briefPool()
    for (const type of ['synonym', 'antonym'] as const) {
      const entry = pool[1]
      const question: Question = {
        word: entry.word,
        type,
        correctAnswer: type === 'synonym' ? entry.synonyms[0] : entry.antonyms[0],
        partOfSpeech: entry.partOfSpeech
      }
      const candidates = distractorCandidates(question, pool)
      const options = synthesizeOptions(question, pool)

      expect(options).toHaveLength(Math.min(MAX_DISTRACTORS, candidates.length) + 1)
      expect(options).toContain(question.correctAnswer)
    }
  })
})
