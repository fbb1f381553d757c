import type { AnswerRecord, QuizSummary, RepetitionBucket, ReviewItem, WordEntry } from '@/types/quiz'

// How many words sit at each repetition level, lowest level first
export function buildRepetitionHistogram(pool: readonly WordEntry[]): RepetitionBucket[] {
  const counts = new Map<number, number>()
  for (const entry of pool) {
    counts.set(entry.repetition, (counts.get(entry.repetition) ?? 0) + 1)
  }
  return [...counts.entries()]
    .sort(([a], [b]) => a - b)
    .map(([repetition, count]) => ({ repetition, count }))
}

function toReviewItem(record: AnswerRecord, entries: ReadonlyMap<string, WordEntry>): ReviewItem {
  const entry = entries.get(record.word)
  return {
    word: record.word,
    definition: entry?.definition ?? '',
    partOfSpeech: entry?.partOfSpeech ?? '',
    synonyms: entry ? [...entry.synonyms] : [],
    antonyms: entry ? [...entry.antonyms] : [],
    questionType: record.questionType,
    userChoice: record.userChoice,
    correctAnswer: record.correctAnswer
  }
}

export function summarizeResults(
  pool: readonly WordEntry[],
  answerHistory: readonly AnswerRecord[],
  totalQuestions: number = answerHistory.length
): QuizSummary {
  const entries = new Map(pool.map(entry => [entry.word, entry]))
  const correctList: ReviewItem[] = []
  const incorrectList: ReviewItem[] = []

  for (const record of answerHistory) {
    const item = toReviewItem(record, entries)
    if (record.isCorrect) correctList.push(item)
    else incorrectList.push(item)
  }

  return {
    score: correctList.length,
    totalQuestions,
    repetitionHistogram: buildRepetitionHistogram(pool),
    masteredWords: pool.filter(entry => entry.repetition > 0).length,
    totalWords: pool.length,
    correctList,
    incorrectList
  }
}
