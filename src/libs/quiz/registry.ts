import { randomUUID } from 'crypto'
import type { WordEntry } from '@/types/quiz'
import type { WordRepository } from '@/libs/words/repository'
import { getWordRepository } from '@/libs/words'
import { DataUnavailableError, SessionNotFoundError, SourceUnavailableError } from '@/libs/quiz/errors'
import { QuizSession } from '@/libs/quiz/session'
import type { QuizSessionOptions } from '@/libs/quiz/session'
import { logger } from '@/libs/utils/logger'

export const LOAD_FAILED_WARNING =
  'The word list could not be loaded, so progress will not be saved.'

const SESSION_TTL_MS = 2 * 60 * 60 * 1000 // 2 hours

interface RegisteredSession {
  session: QuizSession
  touchedAt: number
}

export interface SessionRegistryOptions {
  ttlMs?: number
  now?: () => number
  sessionOptions?: Pick<QuizSessionOptions, 'counts' | 'random'>
}

/**
 * Owns the live quiz sessions of this server process, addressed by id.
 * Sessions idle for longer than the TTL are dropped when a new one is made.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, RegisteredSession>()
  private readonly ttlMs: number
  private readonly now: () => number

  constructor(
    private readonly resolveRepository: () => Promise<WordRepository>,
    private readonly options: SessionRegistryOptions = {}
  ) {
    this.ttlMs = options.ttlMs ?? SESSION_TTL_MS
    this.now = options.now ?? Date.now
  }

  /**
   * Loads a fresh word pool and starts a session on it. When storage cannot be
   * reached the session runs on an empty pool in local-only mode, so starting
   * it fails with `DataUnavailableError` instead of a storage error.
   */
  async create(): Promise<QuizSession> {
    this.evictStale()

    let repository: WordRepository | null = null
    let pool: WordEntry[] = []
    const warnings: string[] = []

    try {
      repository = await this.resolveRepository()
      pool = await repository.load()
    } catch (error) {
      if (!(error instanceof SourceUnavailableError)) throw error
      logger.warn('Word source unavailable, continuing without saving', { reason: error.message })
      repository = null
      warnings.push(LOAD_FAILED_WARNING)
    }

    const session = new QuizSession(pool, {
      ...this.options.sessionOptions,
      id: randomUUID(),
      repository,
      warnings
    })
    try {
      session.start()
    } catch (error) {
      if (error instanceof DataUnavailableError && repository === null) {
        throw new DataUnavailableError('The word list could not be loaded. Please try again later.')
      }
      throw error
    }

    this.sessions.set(session.id, { session, touchedAt: this.now() })
    return session
  }

  get(sessionId: string): QuizSession {
    const registered = this.sessions.get(sessionId)
    if (!registered) {
      throw new SessionNotFoundError(sessionId)
    }
    registered.touchedAt = this.now()
    return registered.session
  }

  delete(sessionId: string): void {
    if (!this.sessions.delete(sessionId)) {
      throw new SessionNotFoundError(sessionId)
    }
  }

  size(): number {
    return this.sessions.size
  }

  private evictStale(): void {
    const cutoff = this.now() - this.ttlMs
    for (const [id, registered] of this.sessions) {
      if (registered.touchedAt < cutoff) {
        this.sessions.delete(id)
        logger.debug('Evicted idle quiz session', { sessionId: id })
      }
    }
  }
}

export const sessionRegistry = new SessionRegistry(getWordRepository)
