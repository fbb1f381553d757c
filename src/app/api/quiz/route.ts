import { NextResponse } from 'next/server'
import { sessionRegistry } from '@/libs/quiz/registry'
import { errorResponse } from '@/libs/utils/http'
import { logger } from '@/libs/utils/logger'

export const dynamic = 'force-dynamic'

// Creates and starts a new quiz session
export async function POST() {
  try {
    const session = await sessionRegistry.create()
    logger.info('Quiz session created', { sessionId: session.id })
    return NextResponse.json({ session: session.snapshot() }, { status: 201 })
  } catch (error) {
    return errorResponse(error, 'Error creating quiz session')
  }
}
