import type { Question, WordEntry } from '@/types/quiz'
import { relationOf } from '@/libs/quiz/generator'
import { logger } from '@/libs/utils/logger'
import { sample, shuffle, unique } from '@/libs/utils/random'
import type { RandomSource } from '@/libs/utils/random'

export const MAX_DISTRACTORS = 4

/**
 * Wrong answers a question may show. Distractors always share the part of
 * speech of the question word so they stay plausible.
 *
 * Definition questions draw on other definitions; synonym and antonym
 * questions draw on other headwords, never on a word listed under the same
 * relation (which would make a second option correct).
 */
export function distractorCandidates(question: Question, pool: readonly WordEntry[]): string[] {
  const samePos = pool.filter(entry => entry.partOfSpeech === question.partOfSpeech)

  if (question.type === 'definition') {
    return unique(
      samePos
        .map(entry => entry.definition)
        .filter(definition => definition.length > 0 && definition !== question.correctAnswer)
    )
  }

  const source = pool.find(entry => entry.word === question.word)
  const excluded = new Set(source ? relationOf(source, question.type) : [])
  excluded.add(question.correctAnswer)
  excluded.add(question.word)

  return unique(samePos.map(entry => entry.word).filter(word => !excluded.has(word)))
}

export function synthesizeOptions(
  question: Question,
  pool: readonly WordEntry[],
  random: RandomSource = Math.random
): string[] {
  const candidates = distractorCandidates(question, pool)
  if (candidates.length < MAX_DISTRACTORS) {
    logger.warn('Not enough distractors for question', {
      word: question.word,
      type: question.type,
      partOfSpeech: question.partOfSpeech,
      available: candidates.length
    })
  }

  const distractors = sample(candidates, Math.min(MAX_DISTRACTORS, candidates.length), random)
  return shuffle([...distractors, question.correctAnswer], random)
}
