import { getQuizConfig } from '@/libs/config'
import type { QuizConfig } from '@/libs/config'
import { SheetsClient, createSheetsTransport } from '@/libs/google/sheets'
import { SourceUnavailableError } from '@/libs/quiz/errors'
import { GoogleSheetsWordRepository } from '@/libs/words/sheets-repository'
import { LocalWordRepository } from '@/libs/words/local-repository'
import type { WordRepository } from '@/libs/words/repository'
import { logger } from '@/libs/utils/logger'

export async function createWordRepository(config: QuizConfig): Promise<WordRepository> {
  if (config.wordSource === 'sheets' && config.sheetId) {
    const transport = await createSheetsTransport(config.serviceAccountSecret)
    return new GoogleSheetsWordRepository(new SheetsClient(transport, config.sheetId), config.sheetName)
  }
  return new LocalWordRepository(config.localWordsFile)
}

let repositoryPromise: Promise<WordRepository> | null = null

// Resolved once per process; a failed setup is retried on the next call
export function getWordRepository(): Promise<WordRepository> {
  if (!repositoryPromise) {
    repositoryPromise = getQuizConfig()
      .then(createWordRepository)
      .then(repository => {
        logger.info('Word repository ready', { repository: repository.name })
        return repository
      })
      .catch((error: unknown) => {
        repositoryPromise = null
        throw new SourceUnavailableError('Word storage is not configured correctly', error)
      })
  }
  return repositoryPromise
}
