import type { Argv } from 'yargs'

import { ConfigError } from '../types/types'
import type { AppConfig } from '../util/config'
import { configureLogging } from '../util/logger'
import { loadCorpus, type CorpusSource, type LoadedCorpus } from '../modules/CorpusLoader'
import type { CorpusStore } from '../modules/TweetCache/CorpusStore'
import { TweetCacheDataSource } from '../modules/TweetCache/DataSource'
import { TimelineClient } from '../modules/Timeline/TimelineClient'

export interface ClosableCorpusStore extends CorpusStore {
    destroy?(): Promise<void>
}

/**
 * Everything a command needs from the outside world
 */
export interface CommandDeps {
    config: AppConfig
    createStore(path: string): ClosableCorpusStore
    createSource(config: AppConfig): CorpusSource
    write(text: string): void
}

export const defaultCommandDeps = (config: AppConfig): CommandDeps => ({
    config,
    createStore: path => new TweetCacheDataSource(path),
    createSource: timelineSource,
    write: text => process.stdout.write(`${text}\n`)
})

// The token is only needed once the cache misses
function timelineSource(config: AppConfig): CorpusSource {
    let client: TimelineClient | null = null
    return {
        fetchTexts(username, amount) {
            if (!config.bearerToken) {
                return Promise.reject(new ConfigError('TWITTER_BEARER_TOKEN is not set; it is needed to fetch posts that are not cached'))
            }
            client ??= new TimelineClient({ bearerToken: config.bearerToken, baseURL: config.apiBaseUrl })
            return client.fetchTexts(username, amount)
        }
    }
}

export function withCorpusOptions<T>(yargs: Argv<T>) {
    return yargs
        .positional('username', {
            type: 'string',
            describe: 'Whose timeline to learn from',
            demandOption: true
        })
        .option('cache-size', {
            alias: 's',
            type: 'number',
            default: 200,
            describe: 'How many posts to fetch'
        })
        .option('cache-file', {
            alias: 'c',
            type: 'string',
            describe: 'SQLite cache file (defaults to FEEDCHAIN_CACHE_PATH)'
        })
        .option('force-cache-update', {
            alias: 'f',
            type: 'boolean',
            default: false,
            describe: 'Fetch the timeline and update the cache even if the user is already cached'
        })
        .option('verbose', {
            alias: 'v',
            type: 'boolean',
            default: false,
            describe: 'Show debug output'
        })
        .middleware(argv => {
            if (argv.verbose) configureLogging({ level: 'debug' })
        })
        .check(argv => {
            const cacheSize = argv['cache-size']
            if (!Number.isInteger(cacheSize) || cacheSize <= 0) throw new Error('Cache size must be a positive integer.')
            return true
        })
}

export interface CorpusArgs {
    username: string
    cacheSize: number
    cacheFile?: string
    forceCacheUpdate: boolean
}

export async function withCorpus<R>(args: CorpusArgs, deps: CommandDeps, use: (loaded: LoadedCorpus) => R): Promise<R> {
    const store = deps.createStore(args.cacheFile ?? deps.config.cachePath)
    try {
        const loaded = await loadCorpus(
            { username: args.username, amount: args.cacheSize, forceRefresh: args.forceCacheUpdate },
            { store, source: deps.createSource(deps.config) }
        )
        return use(loaded)
    } finally {
        await store.destroy?.()
    }
}
