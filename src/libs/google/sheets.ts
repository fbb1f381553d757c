import { GoogleAuth } from 'google-auth-library'
import { getSecret } from '@/libs/google/secret'
import { logger } from '@/libs/utils/logger'

export const SHEETS_SCOPE = 'https://www.googleapis.com/auth/spreadsheets'
const SHEETS_API = 'https://sheets.googleapis.com/v4/spreadsheets'

export interface SheetsRequest {
  url: string
  method: 'GET' | 'PUT'
  params?: Record<string, string>
  data?: unknown
}

// The slice of an authorized HTTP client the Sheets calls need
export interface SheetsTransport {
  request<T>(options: SheetsRequest): Promise<{ data: T }>
}

interface ValueRange {
  range?: string
  majorDimension?: string
  values?: unknown[][]
}

export type CellValue = string | number

export interface ServiceAccountKey {
  client_email: string
  private_key: string
  project_id?: string
}

export function parseServiceAccountKey(raw: string): ServiceAccountKey {
  const parsed: unknown = JSON.parse(raw)
  if (typeof parsed !== 'object' || parsed === null) {
    throw new Error('Service account key is not a JSON object')
  }
  const clientEmail = 'client_email' in parsed ? parsed.client_email : undefined
  const privateKey = 'private_key' in parsed ? parsed.private_key : undefined
  const projectId = 'project_id' in parsed ? parsed.project_id : undefined
  if (typeof clientEmail !== 'string' || typeof privateKey !== 'string') {
    throw new Error('Service account key needs client_email and private_key')
  }
  return {
    client_email: clientEmail,
    private_key: privateKey,
    ...(typeof projectId === 'string' && { project_id: projectId })
  }
}

async function loadServiceAccount(secretName: string): Promise<ServiceAccountKey> {
  const payload = await getSecret(secretName)
  if (!payload) {
    throw new Error(`No service account data found in Secret Manager secret ${secretName}`)
  }
  return parseServiceAccountKey(payload)
}

/**
 * Authorized transport for the Sheets API. With a secret name the key is read
 * from Secret Manager, otherwise Application Default Credentials are used.
 */
export async function createSheetsTransport(serviceAccountSecret: string | null): Promise<SheetsTransport> {
  const credentials = serviceAccountSecret ? await loadServiceAccount(serviceAccountSecret) : undefined
  const auth = new GoogleAuth({
    scopes: [SHEETS_SCOPE],
    ...(credentials && { credentials })
  })
  logger.info('Sheets client initialized', {
    credentials: credentials ? credentials.client_email : 'application-default'
  })

  return {
    request: async <T>(options: SheetsRequest) => {
      const response = await auth.request<T>(options)
      return { data: response.data }
    }
  }
}

// 'Words' -> "'Words'"; quoting is valid for every sheet name
export function quoteSheetName(name: string): string {
  return `'${name.replace(/'/g, "''")}'`
}

// 0 -> A, 25 -> Z, 26 -> AA
export function columnLetter(index: number): string {
  let letters = ''
  let remaining = index + 1
  while (remaining > 0) {
    const offset = (remaining - 1) % 26
    letters = String.fromCharCode(65 + offset) + letters
    remaining = Math.floor((remaining - 1) / 26)
  }
  return letters
}

export class SheetsClient {
  constructor(
    private readonly transport: SheetsTransport,
    private readonly spreadsheetId: string
  ) {}

  private valuesUrl(range: string): string {
    return `${SHEETS_API}/${encodeURIComponent(this.spreadsheetId)}/values/${encodeURIComponent(range)}`
  }

  // Every cell comes back as text; trailing empty cells are absent
  async getValues(range: string): Promise<string[][]> {
    const { data } = await this.transport.request<ValueRange>({
      url: this.valuesUrl(range),
      method: 'GET',
      params: { majorDimension: 'ROWS' }
    })
    return (data.values ?? []).map(row => row.map(cell => (cell === null || cell === undefined ? '' : String(cell))))
  }

  async updateValues(range: string, values: CellValue[][]): Promise<void> {
    await this.transport.request<ValueRange>({
      url: this.valuesUrl(range),
      method: 'PUT',
      params: { valueInputOption: 'USER_ENTERED' },
      data: { range, majorDimension: 'ROWS', values }
    })
  }
}
