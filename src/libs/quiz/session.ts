import type {
  AnswerRecord,
  Question,
  QuestionCounts,
  QuizSummary,
  SaveStatus,
  SessionSnapshot,
  SessionStatus,
  WordEntry
} from '@/types/quiz'
import type { WordRepository } from '@/libs/words/repository'
import {
  AlreadySubmittedError,
  InvalidChoiceError,
  QuizStateError
} from '@/libs/quiz/errors'
import {
  DEFAULT_QUESTION_COUNTS,
  generateQuestions,
  questionPrompt,
  totalQuestions
} from '@/libs/quiz/generator'
import { synthesizeOptions } from '@/libs/quiz/options'
import { summarizeResults } from '@/libs/quiz/results'
import { logger } from '@/libs/utils/logger'
import type { RandomSource } from '@/libs/utils/random'

export const SAVE_FAILED_WARNING =
  'Your progress could not be saved. Results are shown below but repetition counts were not stored.'

export interface QuizSessionOptions {
  id?: string
  // null runs the session in local-only mode: nothing is persisted
  repository?: WordRepository | null
  counts?: QuestionCounts
  random?: RandomSource
  // Warnings that hold for the whole lifetime of the session (e.g. a failed load)
  warnings?: string[]
}

/**
 * One quiz-taker's run through the quiz.
 *
 * not-started --start()--> in-progress --advance() on the last question--> completed
 *
 * While in progress each question is either awaiting an answer or answered;
 * `submit` moves it to answered and `advance` moves on. `restart` returns to
 * not-started from anywhere. The pool is owned by the session and its
 * repetition counts are updated in place as answers come in; the repository
 * only sees them once, when the quiz completes.
 */
export class QuizSession {
  readonly id: string

  private readonly pool: WordEntry[]
  private readonly entries: Map<string, WordEntry>
  private readonly repository: WordRepository | null
  private readonly counts: QuestionCounts
  private readonly random: RandomSource
  private readonly baseWarnings: string[]

  private status: SessionStatus = 'not-started'
  private questions: Question[] = []
  private currentIndex = 0
  private correctCount = 0
  private submitted = false
  private selectedOption: string | null = null
  private currentOptionsCache: string[] | null = null
  private history: AnswerRecord[] = []
  private saveStatus: SaveStatus
  private warnings: string[]
  // Bumped on restart so a save still running for an earlier run is ignored
  private run = 0

  constructor(pool: WordEntry[], options: QuizSessionOptions = {}) {
    this.id = options.id ?? `quiz_${Date.now()}`
    this.pool = pool
    this.entries = new Map(pool.map(entry => [entry.word, entry]))
    this.repository = options.repository ?? null
    this.counts = options.counts ?? DEFAULT_QUESTION_COUNTS
    this.random = options.random ?? Math.random
    this.baseWarnings = [...(options.warnings ?? [])]
    this.warnings = [...this.baseWarnings]
    this.saveStatus = this.initialSaveStatus()
  }

  start(): void {
    if (this.status !== 'not-started') {
      throw new QuizStateError(`Cannot start a quiz that is ${this.status}`)
    }

    // Generation throws before any state changes, so a failed start leaves the session untouched
    this.questions = generateQuestions(this.pool, this.counts, this.random)
    this.currentIndex = 0
    this.correctCount = 0
    this.status = 'in-progress'

    logger.info('Quiz started', {
      sessionId: this.id,
      questions: this.questions.length,
      words: this.pool.length
    })
  }

  currentQuestion(): Question | null {
    if (this.status !== 'in-progress') return null
    return this.questions[this.currentIndex]
  }

  // Synthesized on first access and reused until the quiz moves on
  currentOptions(): string[] {
    const question = this.currentQuestion()
    if (!question) return []
    if (!this.currentOptionsCache) {
      this.currentOptionsCache = synthesizeOptions(question, this.pool, this.random)
    }
    return [...this.currentOptionsCache]
  }

  select(choice: string): void {
    this.requireQuestion()
    if (this.submitted) throw new AlreadySubmittedError()
    this.requireOption(choice)
    this.selectedOption = choice
  }

  submit(choice: string): AnswerRecord {
    const question = this.requireQuestion()
    if (this.submitted) throw new AlreadySubmittedError()
    this.requireOption(choice)

    const record: AnswerRecord = {
      word: question.word,
      isCorrect: choice === question.correctAnswer,
      userChoice: choice,
      correctAnswer: question.correctAnswer,
      questionType: question.type
    }

    this.submitted = true
    this.selectedOption = choice
    this.history.push(record)

    if (record.isCorrect) {
      this.correctCount += 1
      this.bumpRepetition(question.word)
    }

    return record
  }

  /**
   * Moves past an answered question. Completing the last question issues the
   * single bulk write of the session; the returned promise settles once that
   * write has succeeded or failed, and never rejects because of it.
   */
  async advance(): Promise<void> {
    this.requireQuestion()
    if (!this.submitted) {
      throw new QuizStateError('Submit an answer before moving to the next question')
    }

    this.currentIndex += 1
    this.submitted = false
    this.selectedOption = null
    this.currentOptionsCache = null

    if (this.currentIndex < this.questions.length) return

    this.status = 'completed'
    logger.info('Quiz completed', {
      sessionId: this.id,
      score: this.correctCount,
      totalQuestions: this.questions.length
    })
    await this.persist()
  }

  // Local repetition counts in the pool survive a restart
  restart(): void {
    this.run += 1
    this.status = 'not-started'
    this.questions = []
    this.currentIndex = 0
    this.correctCount = 0
    this.submitted = false
    this.selectedOption = null
    this.currentOptionsCache = null
    this.history = []
    this.warnings = [...this.baseWarnings]
    this.saveStatus = this.initialSaveStatus()
  }

  score(): number {
    return this.correctCount
  }

  isComplete(): boolean {
    return this.status === 'completed'
  }

  getStatus(): SessionStatus {
    return this.status
  }

  answerHistory(): readonly AnswerRecord[] {
    return this.history
  }

  summary(): QuizSummary {
    if (this.status !== 'completed') {
      throw new QuizStateError('The quiz summary is only available once the quiz is complete')
    }
    return summarizeResults(this.pool, this.history, this.questions.length)
  }

  snapshot(): SessionSnapshot {
    const question = this.currentQuestion()
    return {
      id: this.id,
      status: this.status,
      questionNumber: question ? this.currentIndex + 1 : this.currentIndex,
      totalQuestions: this.questions.length || totalQuestions(this.counts),
      question: question
        ? { word: question.word, type: question.type, prompt: questionPrompt(question) }
        : null,
      options: this.currentOptions(),
      selectedOption: this.selectedOption,
      submitted: this.submitted,
      lastAnswer: this.submitted ? this.history[this.history.length - 1] : null,
      score: this.correctCount,
      saveStatus: this.saveStatus,
      warnings: [...this.warnings]
    }
  }

  private initialSaveStatus(): SaveStatus {
    return this.repository ? 'idle' : 'local-only'
  }

  private requireQuestion(): Question {
    const question = this.currentQuestion()
    if (!question) {
      throw new QuizStateError(`No question is in progress (quiz is ${this.status})`)
    }
    return question
  }

  private requireOption(choice: string): void {
    if (!this.currentOptions().includes(choice)) {
      throw new InvalidChoiceError(`"${choice}" is not one of the options for this question`)
    }
  }

  private bumpRepetition(word: string): void {
    const entry = this.entries.get(word)
    if (!entry) return
    entry.repetition += 1
  }

  private async persist(): Promise<void> {
    if (!this.repository) {
      this.saveStatus = 'local-only'
      return
    }

    const run = this.run
    const repository = this.repository
    this.saveStatus = 'saving'
    try {
      await repository.bulkSave(this.pool)
      logger.info('Repetition counts saved', { sessionId: this.id, repository: repository.name })
      if (run === this.run) this.saveStatus = 'saved'
    } catch (error) {
      logger.error('Failed to save repetition counts:', error instanceof Error ? error : String(error))
      if (run !== this.run) return
      this.saveStatus = 'failed'
      this.warnings.push(SAVE_FAILED_WARNING)
    }
  }
}
