import { SecretManagerServiceClient } from '@google-cloud/secret-manager'
import { logger } from '@/libs/utils/logger'

const CACHE_TTL_MS = 5 * 60 * 1000 // 5 minutes

type CachedSecret = {
  value: string | null
  expiresAt: number
}

const secretCache = new Map<string, CachedSecret>()
let secretManagerClient: SecretManagerServiceClient | null = null

function getClient(): SecretManagerServiceClient {
  if (!secretManagerClient) {
    secretManagerClient = new SecretManagerServiceClient()
  }
  return secretManagerClient
}

// Secrets live in the project named by GOOGLE_CLOUD_PROJECT; without it nothing is looked up
export async function getSecret(secretName: string): Promise<string | null> {
  const projectId = process.env.GOOGLE_CLOUD_PROJECT
  if (!projectId) {
    return null
  }

  try {
    // Serve from cache when valid
    const cached = secretCache.get(secretName)
    if (cached && cached.expiresAt > Date.now()) {
      return cached.value
    }

    // Cache miss: fetch from Secret Manager
    logger.info(`Fetching from Secret Manager: ${secretName}`)
    const [version] = await getClient().accessSecretVersion({
      name: `projects/${projectId}/secrets/${secretName}/versions/latest`,
    })
    const value = version.payload?.data?.toString() || null
    secretCache.set(secretName, { value, expiresAt: Date.now() + CACHE_TTL_MS })
    return value
  } catch (error) {
    logger.error(`Secret Manager error for ${secretName}:`, error instanceof Error ? error : String(error))
    return null
  }
}
