import { Logger, red, yellow } from '../util/logger'
const logger = new Logger('CorpusLoader')

import type { CorpusStore } from './TweetCache/CorpusStore'

export interface CorpusSource {
    fetchTexts(username: string, amount: number): Promise<string[]>
}

export interface LoadCorpusOptions {
    username: string
    /** How many posts to fetch on a cache miss */
    amount: number
    /** Fetch and overwrite the cache even when the user is already cached */
    forceRefresh?: boolean
}

export interface LoadedCorpus {
    corpus: string[]
    fromCache: boolean
}

export const screenNameOf = (username: string) => username.trim().replace(/^@/, '')

// Screen names are case-insensitive, so one cache entry serves every spelling
export const cacheKeyFor = (username: string) => screenNameOf(username).toLowerCase()

export async function loadCorpus(
    options: LoadCorpusOptions,
    deps: { store: CorpusStore; source: CorpusSource }
): Promise<LoadedCorpus> {
    const { username, amount, forceRefresh = false } = options
    const screenName = screenNameOf(username)
    const key = cacheKeyFor(username)

    if (!forceRefresh) {
        const cached = await deps.store.lookup(key)
        if (cached) {
            logger.info(`${yellow(username)}'s posts are already cached (${yellow(cached.length)})`)
            return { corpus: cached, fromCache: true }
        }
    }

    logger.info(`Fetching up to ${yellow(amount)} posts for ${yellow(screenName)}`)
    const corpus = await deps.source.fetchTexts(screenName, amount)

    // Write failures leave the fetched corpus usable
    try {
        await deps.store.store(key, corpus)
        logger.ok(`Cached ${yellow(corpus.length)} posts for ${yellow(screenName)}`)
    } catch (error) {
        logger.warn(`Could not cache posts for ${yellow(screenName)}: ${red(error instanceof Error ? error.message : String(error))}`)
    }

    return { corpus, fromCache: false }
}
