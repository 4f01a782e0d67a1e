import { Logger, yellow } from '../../util/logger'
const logger = new Logger('TweetCache | DataSource')

import { DataSource as ORMDataSource } from 'typeorm'
import { existsSync, mkdirSync } from 'fs'
import { dirname } from 'path'

import type { CorpusStore } from './CorpusStore'
import { Author } from './entities/Author'
import { Post } from './entities/Post'

export const IN_MEMORY_DATABASE = ':memory:'

// Three bound parameters per post; SQLite allows 999 per statement
const BATCH_SIZE = 300

/**
 * SQLite-backed corpus cache. Storing a corpus replaces whatever was cached under that key
 */
export class TweetCacheDataSource implements CorpusStore {
    private orm: ORMDataSource | null = null

    constructor(private readonly databasePath: string) {}

    private ensureDataDirectory() {
        if (this.databasePath === IN_MEMORY_DATABASE) return
        const dataDir = dirname(this.databasePath)
        if (!existsSync(dataDir)) {
            logger.info(`Creating data directory ${yellow(dataDir)}`)
            mkdirSync(dataDir, { recursive: true })
        }
    }

    public async init(): Promise<ORMDataSource> {
        if (this.orm) return this.orm

        try {
            this.ensureDataDirectory()

            const orm = new ORMDataSource({
                type: 'sqlite',
                database: this.databasePath,
                entities: [Author, Post],
                synchronize: true
            })
            await orm.initialize()

            this.orm = orm
            logger.ok(`{init} SQLite cache at ${yellow(this.databasePath)} initialized`)
            return orm
        } catch (error) {
            logger.error(`Failed to initialize database: ${error}`)
            throw error
        }
    }

    public async lookup(key: string): Promise<string[] | null> {
        const orm = await this.init()

        const author = await orm.getRepository(Author).findOne({ where: { username: key } })
        if (!author) {
            logger.debug(`{lookup} Nothing cached for ${yellow(key)}`)
            return null
        }

        const posts = await orm.getRepository(Post).find({
            where: { authorUsername: key },
            order: { position: 'ASC' },
            select: { text: true, position: true }
        })
        logger.debug(`{lookup} ${yellow(posts.length)} posts cached for ${yellow(key)} since ${yellow(new Date(author.fetchedAt).toISOString())}`)
        return posts.map(post => post.text)
    }

    public async store(key: string, corpus: readonly string[]): Promise<void> {
        const orm = await this.init()

        await orm.transaction(async manager => {
            await manager.upsert(Author, { username: key, fetchedAt: Date.now() }, ['username'])
            await manager.delete(Post, { authorUsername: key })

            for (let i = 0; i < corpus.length; i += BATCH_SIZE) {
                const chunk = corpus.slice(i, i + BATCH_SIZE)
                await manager.insert(Post, chunk.map((text, offset) => ({
                    text,
                    position: i + offset,
                    authorUsername: key
                })))
            }
        })
        logger.ok(`{store} Cached ${yellow(corpus.length)} posts for ${yellow(key)}`)
    }

    public async destroy() {
        if (!this.orm) return
        await this.orm.destroy()
        this.orm = null
    }
}
