import path from 'path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

const { getSecret } = vi.hoisted(() => ({ getSecret: vi.fn() }))
vi.mock('@/libs/google/secret', () => ({ getSecret }))

import { SHEET_ID_SECRET, getQuizConfig } from '@/libs/config'

const defaultWordsFile = path.resolve(process.cwd(), 'data', 'words.json')

beforeEach(() => {
  getSecret.mockResolvedValue(null)
  for (const name of [
    'QUIZ_WORD_SOURCE',
    'QUIZ_SHEET_ID',
    'QUIZ_SHEET_NAME',
    'QUIZ_SERVICE_ACCOUNT_SECRET',
    'QUIZ_LOCAL_WORDS_FILE'
  ]) {
    vi.stubEnv(name, '')
  }
})

afterEach(() => {
  vi.unstubAllEnvs()
  getSecret.mockReset()
})

describe('getQuizConfig', () => {
  it('falls back to the local word file when no sheet is configured', async () => {
    expect(await getQuizConfig()).toEqual({
      wordSource: 'local',
      sheetId: null,
      sheetName: 'Sheet1',
      serviceAccountSecret: null,
      localWordsFile: defaultWordsFile
    })
    expect(getSecret).toHaveBeenCalledWith(SHEET_ID_SECRET)
  })

  it('uses the sheet named in the environment', async () => {
    vi.stubEnv('QUIZ_SHEET_ID', 'sheet-123')
    vi.stubEnv('QUIZ_SHEET_NAME', 'Words')
    vi.stubEnv('QUIZ_SERVICE_ACCOUNT_SECRET', 'quiz-service-account')

    expect(await getQuizConfig()).toMatchObject({
      wordSource: 'sheets',
      sheetId: 'sheet-123',
      sheetName: 'Words',
      serviceAccountSecret: 'quiz-service-account'
    })
    expect(getSecret).not.toHaveBeenCalled()
  })

  it('reads the sheet id from Secret Manager', async () => {
    getSecret.mockResolvedValue('sheet-from-secret')
    expect(await getQuizConfig()).toMatchObject({ wordSource: 'sheets', sheetId: 'sheet-from-secret' })
  })

  it('skips the sheet entirely when the local source is requested', async () => {
    vi.stubEnv('QUIZ_WORD_SOURCE', 'local')
    vi.stubEnv('QUIZ_SHEET_ID', 'sheet-123')
    vi.stubEnv('QUIZ_LOCAL_WORDS_FILE', 'fixtures/words.json')

    expect(await getQuizConfig()).toMatchObject({
      wordSource: 'local',
      sheetId: null,
      localWordsFile: path.resolve(process.cwd(), 'fixtures/words.json')
    })
  })

  it('rejects an unknown source or a sheet source without a sheet id', async () => {
    vi.stubEnv('QUIZ_WORD_SOURCE', 'csv')
    await expect(getQuizConfig()).rejects.toThrow('QUIZ_WORD_SOURCE must be "sheets" or "local", got "csv"')

    vi.stubEnv('QUIZ_WORD_SOURCE', 'sheets')
    await expect(getQuizConfig()).rejects.toThrow('QUIZ_WORD_SOURCE is "sheets" but no sheet id is configured')
  })
})
