import type { Question, QuestionCounts, QuestionType, WordEntry } from '@/types/quiz'
import { DataUnavailableError, MalformedEntryError } from '@/libs/quiz/errors'
import { pickRandom, shuffle } from '@/libs/utils/random'
import type { RandomSource } from '@/libs/utils/random'

export const QUESTION_TYPES: readonly QuestionType[] = ['definition', 'synonym', 'antonym']

// 10 definitions, 7 synonyms, 3 antonyms
export const DEFAULT_QUESTION_COUNTS: QuestionCounts = {
  definition: 10,
  synonym: 7,
  antonym: 3
}

export function totalQuestions(counts: QuestionCounts): number {
  return QUESTION_TYPES.reduce((sum, type) => sum + counts[type], 0)
}

export function relationOf(entry: WordEntry, type: 'synonym' | 'antonym'): string[] {
  return type === 'synonym' ? entry.synonyms : entry.antonyms
}

export function supportsType(entry: WordEntry, type: QuestionType): boolean {
  if (type === 'definition') return entry.definition.length > 0
  return relationOf(entry, type).length > 0
}

export function questionPrompt(question: Pick<Question, 'word' | 'type'>): string {
  switch (question.type) {
    case 'definition':
      return `What does ${question.word} mean?`
    case 'synonym':
      return `Which word is a synonym of ${question.word}?`
    case 'antonym':
      return `Which word is an antonym of ${question.word}?`
  }
}

function buildTypeSequence(counts: QuestionCounts, random: RandomSource): QuestionType[] {
  const labels: QuestionType[] = []
  for (const type of QUESTION_TYPES) {
    const count = counts[type]
    if (!Number.isInteger(count) || count < 0) {
      throw new RangeError(`Question count for ${type} must be a non-negative integer, got ${count}`)
    }
    for (let i = 0; i < count; i++) labels.push(type)
  }
  return shuffle(labels, random)
}

/**
 * Least-practised words first: only words sitting at the lowest repetition
 * among those that can carry this question type are candidates. Words already
 * used in this quiz are skipped unless nothing else is left at that level.
 */
function selectWord(
  pool: readonly WordEntry[],
  type: QuestionType,
  usedWords: ReadonlySet<string>,
  random: RandomSource
): WordEntry {
  const supporting = pool.filter(entry => supportsType(entry, type))
  if (supporting.length === 0) {
    throw new MalformedEntryError(`No word in the pool has data for ${type} questions`)
  }

  const minRep = supporting.reduce((min, entry) => Math.min(min, entry.repetition), Infinity)
  const eligible = supporting.filter(entry => entry.repetition === minRep)
  const available = eligible.filter(entry => !usedWords.has(entry.word))

  return pickRandom(available.length > 0 ? available : eligible, random)
}

function answerFor(entry: WordEntry, type: QuestionType, random: RandomSource): string {
  if (type === 'definition') return entry.definition
  return pickRandom(relationOf(entry, type), random)
}

export function generateQuestions(
  pool: readonly WordEntry[],
  counts: QuestionCounts = DEFAULT_QUESTION_COUNTS,
  random: RandomSource = Math.random
): Question[] {
  if (pool.length === 0) {
    throw new DataUnavailableError('The word pool is empty')
  }

  const usedWords = new Set<string>()

  return buildTypeSequence(counts, random).map(type => {
    const entry = selectWord(pool, type, usedWords, random)
    usedWords.add(entry.word)
    return {
      word: entry.word,
      type,
      correctAnswer: answerFor(entry, type, random),
      partOfSpeech: entry.partOfSpeech
    }
  })
}
