import { NextResponse } from 'next/server'
import { InvalidChoiceError, QuizError } from '@/libs/quiz/errors'
import { logger } from '@/libs/utils/logger'

export type RouteContext = { params: Promise<{ id: string }> }

export function errorResponse(error: unknown, context: string) {
  if (error instanceof QuizError) {
    logger.warn(`${context}: ${error.message}`, { code: error.code })
    return NextResponse.json({ error: error.message, code: error.code }, { status: error.status })
  }
  logger.error(`${context}:`, error instanceof Error ? error : new Error(String(error)))
  return NextResponse.json({ error: 'Internal server error' }, { status: 500 })
}

// Body of select/submit: { choice: string }
export async function readChoice(request: Request): Promise<string> {
  let body: unknown
  try {
    body = await request.json()
  } catch {
    throw new InvalidChoiceError('Request body must be JSON')
  }
  if (typeof body !== 'object' || body === null || !('choice' in body) || typeof body.choice !== 'string') {
    throw new InvalidChoiceError('A choice is required')
  }
  return body.choice
}
