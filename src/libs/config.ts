import path from 'path'
import { getSecret } from '@/libs/google/secret'

export type WordSource = 'sheets' | 'local'

export interface QuizConfig {
  wordSource: WordSource
  sheetId: string | null
  sheetName: string
  // Secret Manager secret holding a service-account key; Application Default Credentials otherwise
  serviceAccountSecret: string | null
  localWordsFile: string
}

export const SHEET_ID_SECRET = 'vocab-quiz-sheet-id'
const DEFAULT_SHEET_NAME = 'Sheet1'
const DEFAULT_LOCAL_WORDS_FILE = path.join('data', 'words.json')

function readEnv(name: string): string | null {
  const value = process.env[name]?.trim()
  return value ? value : null
}

function parseWordSource(value: string | null): WordSource | null {
  if (value === null) return null
  if (value === 'sheets' || value === 'local') return value
  throw new Error(`QUIZ_WORD_SOURCE must be "sheets" or "local", got "${value}"`)
}

/**
 * Environment first, Secret Manager second. Without a sheet id the quiz
 * falls back to the local word file.
 */
export async function getQuizConfig(): Promise<QuizConfig> {
  const requestedSource = parseWordSource(readEnv('QUIZ_WORD_SOURCE'))
  const sheetId = requestedSource === 'local'
    ? null
    : readEnv('QUIZ_SHEET_ID') ?? await getSecret(SHEET_ID_SECRET)

  if (requestedSource === 'sheets' && !sheetId) {
    throw new Error('QUIZ_WORD_SOURCE is "sheets" but no sheet id is configured')
  }

  return {
    wordSource: requestedSource ?? (sheetId ? 'sheets' : 'local'),
    sheetId,
    sheetName: readEnv('QUIZ_SHEET_NAME') ?? DEFAULT_SHEET_NAME,
    serviceAccountSecret: readEnv('QUIZ_SERVICE_ACCOUNT_SECRET'),
    localWordsFile: path.resolve(process.cwd(), readEnv('QUIZ_LOCAL_WORDS_FILE') ?? DEFAULT_LOCAL_WORDS_FILE)
  }
}
