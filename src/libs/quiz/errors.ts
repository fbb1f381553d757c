export type QuizErrorCode =
  | 'DATA_UNAVAILABLE'
  | 'MALFORMED_ENTRY'
  | 'INVALID_CHOICE'
  | 'ALREADY_SUBMITTED'
  | 'INVALID_STATE'
  | 'SESSION_NOT_FOUND'
  | 'SOURCE_UNAVAILABLE'
  | 'SAVE_FAILED'

/**
 * Base class for every failure the quiz engine and its storage adapters raise.
 * `status` is the HTTP status the route handlers answer with.
 */
export class QuizError extends Error {
  readonly code: QuizErrorCode
  readonly status: number

  constructor(message: string, code: QuizErrorCode, status: number, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.code = code
    this.status = status
  }
}

// Empty or missing word pool; a session cannot start
export class DataUnavailableError extends QuizError {
  constructor(message = 'No words are available for a quiz') {
    super(message, 'DATA_UNAVAILABLE', 503)
  }
}

// No word carries the data a drawn question type needs
export class MalformedEntryError extends QuizError {
  constructor(message: string) {
    super(message, 'MALFORMED_ENTRY', 422)
  }
}

export class InvalidChoiceError extends QuizError {
  constructor(message: string) {
    super(message, 'INVALID_CHOICE', 400)
  }
}

export class AlreadySubmittedError extends QuizError {
  constructor(message = 'This question has already been answered') {
    super(message, 'ALREADY_SUBMITTED', 409)
  }
}

export class QuizStateError extends QuizError {
  constructor(message: string) {
    super(message, 'INVALID_STATE', 409)
  }
}

export class SessionNotFoundError extends QuizError {
  constructor(sessionId: string) {
    super(`Quiz session ${sessionId} not found`, 'SESSION_NOT_FOUND', 404)
  }
}

export class SourceUnavailableError extends QuizError {
  constructor(message: string, cause?: unknown) {
    super(message, 'SOURCE_UNAVAILABLE', 503, { cause })
  }
}

export class SaveFailedError extends QuizError {
  constructor(message: string, cause?: unknown) {
    super(message, 'SAVE_FAILED', 502, { cause })
  }
}
