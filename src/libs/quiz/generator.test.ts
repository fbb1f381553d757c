import { describe, expect, it } from 'vitest'
import {
  DEFAULT_QUESTION_COUNTS,
  generateQuestions,
  questionPrompt,
  supportsType,
  totalQuestions
} from '@/libs/quiz/generator'
import { DataUnavailableError, MalformedEntryError } from '@/libs/quiz/errors'
import { briefPool, makeWord, wordPool } from '@/test/fixtures'

const definitionsOnly = { definition: 1, synonym: 0, antonym: 0 }

describe('generateQuestions', () => {
  it('builds twenty questions with the 10/7/3 type split', () => {
    const questions = generateQuestions(wordPool(8))

    expect(questions).toHaveLength(20)
    expect(totalQuestions(DEFAULT_QUESTION_COUNTS)).toBe(20)
    const byType = { definition: 0, synonym: 0, antonym: 0 }
    for (const question of questions) byType[question.type] += 1
    expect(byType).toEqual({ definition: 10, synonym: 7, antonym: 3 })
  })

  it('fails on an empty pool', () => {
    expect(() => generateQuestions([])).toThrow(DataUnavailableError)
  })

  it('always picks a word at the lowest repetition', () => {
    const pool = [makeWord('B', { repetition: 5 }), makeWord('A', { repetition: 0 })]
    for (let i = 0; i < 25; i++) {
      const [question] = generateQuestions(pool, definitionsOnly)
      expect(question.word).toBe('A')
    }
  })

  it('does not repeat a word while other least-practised words remain', () => {
    const pool = [
      ...['a', 'b', 'c', 'd', 'e'].map(word => makeWord(word)),
      ...['v', 'w', 'x', 'y', 'z'].map(word => makeWord(word, { repetition: 1 }))
    ]
    const questions = generateQuestions(pool, { definition: 5, synonym: 0, antonym: 0 })

    expect(questions.map(question => question.word).sort()).toEqual(['a', 'b', 'c', 'd', 'e'])
  })

  it('repeats a least-practised word rather than reaching for a more practised one', () => {
    const pool = [makeWord('a'), makeWord('b'), makeWord('c', { repetition: 2 })]
    const words = generateQuestions(pool, { definition: 3, synonym: 0, antonym: 0 })
      .map(question => question.word)

    expect(words).not.toContain('c')
    expect(new Set(words.slice(0, 2))).toEqual(new Set(['a', 'b']))
  })

  it('only draws a question type from words that carry that relation', () => {
    const pool = [
      makeWord('plain', { antonyms: [] }),
      makeWord('bold', { repetition: 3, antonyms: ['timid'] })
    ]
    const questions = generateQuestions(pool, { definition: 0, synonym: 0, antonym: 2 })

    expect(questions).toEqual([
      { word: 'bold', type: 'antonym', correctAnswer: 'timid', partOfSpeech: 'adjective' },
      { word: 'bold', type: 'antonym', correctAnswer: 'timid', partOfSpeech: 'adjective' }
    ])
  })

  it('rejects a pool where no word can carry a drawn type', () => {
    const pool = [makeWord('plain', { antonyms: [] })]
    expect(() => generateQuestions(pool, { definition: 1, synonym: 0, antonym: 1 }))
      .toThrow(MalformedEntryError)
  })

  it('uses the definition or a listed relation as the correct answer', () => {
    const pool = briefPool()
    const first = () => 0

    expect(generateQuestions(pool, definitionsOnly, first)[0]).toEqual({
      word: 'brief',
      type: 'definition',
      correctAnswer: 'short',
      partOfSpeech: 'adjective'
    })
    expect(generateQuestions(pool, { definition: 0, synonym: 1, antonym: 0 }, first)[0].correctAnswer)
      .toBe('short')
    expect(generateQuestions(pool, { definition: 0, synonym: 0, antonym: 1 }, first)[0].correctAnswer)
      .toBe('long')

    for (const question of generateQuestions(pool, { definition: 0, synonym: 10, antonym: 0 })) {
      const entry = pool.find(word => word.word === question.word)
      expect(entry?.synonyms).toContain(question.correctAnswer)
    }
  })

  it('rejects negative or fractional counts', () => {
    expect(() => generateQuestions(wordPool(3), { definition: -1, synonym: 0, antonym: 0 })).toThrow(RangeError)
    expect(() => generateQuestions(wordPool(3), { definition: 1.5, synonym: 0, antonym: 0 })).toThrow(RangeError)
  })
})

describe('supportsType', () => {
  it('requires data for the relation being asked about', () => {
    const word = makeWord('odd', { definition: '', synonyms: ['strange'], antonyms: [] })
    expect(supportsType(word, 'definition')).toBe(false)
    expect(supportsType(word, 'synonym')).toBe(true)
    expect(supportsType(word, 'antonym')).toBe(false)
  })
})

describe('questionPrompt', () => {
  it('phrases each question type', () => {
    expect(questionPrompt({ word: 'brief', type: 'definition' })).toBe('What does brief mean?')
    expect(questionPrompt({ word: 'brief', type: 'synonym' })).toBe('Which word is a synonym of brief?')
    expect(questionPrompt({ word: 'brief', type: 'antonym' })).toBe('Which word is an antonym of brief?')
  })
})
