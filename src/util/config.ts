import { z } from 'zod'
import { ConfigError } from '../types/types'
import { DEFAULT_API_BASE_URL } from '../modules/Timeline/TimelineClient'

const schema = z.object({
    TWITTER_BEARER_TOKEN: z.string().min(1).optional(),
    TWITTER_API_BASE_URL: z.string().url().default(DEFAULT_API_BASE_URL),
    FEEDCHAIN_CACHE_PATH: z.string().min(1).default('data/feedchain.sqlite'),
    LOG_LEVEL: z.enum(['silent', 'error', 'warn', 'info', 'debug']).default('warn'),
    LOG_DIR: z.string().min(1).optional()
})

export interface AppConfig {
    bearerToken: string | null
    apiBaseUrl: string
    cachePath: string
    logLevel: z.infer<typeof schema>['LOG_LEVEL']
    logDirectory: string | null
}

/**
 * Reads the environment; blank variables count as unset
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const present = Object.fromEntries(
        Object.entries(env).filter(([, value]) => value !== undefined && value.trim().length > 0)
    )
    const parsed = schema.safeParse(present)
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
        throw new ConfigError(`Invalid environment: ${issues.join('; ')}`)
    }
    const { data } = parsed
    return {
        bearerToken: data.TWITTER_BEARER_TOKEN ?? null,
        apiBaseUrl: data.TWITTER_API_BASE_URL,
        cachePath: data.FEEDCHAIN_CACHE_PATH,
        logLevel: data.LOG_LEVEL,
        logDirectory: data.LOG_DIR ?? null
    }
}
