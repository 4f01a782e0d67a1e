import { Logger, yellow } from '../../util/logger'
const logger = new Logger('MarkovChain | Text')

import { EventEmitter } from 'tseep'
import { z } from 'zod'

import { InvalidConfigurationError } from '../../types/types'
import { buildModel } from './MarkovModel'
import { walk } from './Generator'
import { cryptoRandom, type RandomSource } from './RandomSource'
import { joinTokens, tokenize, tokenModeFor } from './tokenize'

const positiveInt = (name: string) => z.number({ invalid_type_error: `${name} must be a number` })
    .int(`${name} must be an integer`)
    .positive(`${name} must be a positive integer`)

const generateOptionsSchema = z.object({
    order: positiveInt('order'),
    length: positiveInt('length'),
    splitWords: z.boolean()
})

export interface MarkovGenerateOptions {
    corpus: readonly string[]
    order: number
    /** Minimum output length, in characters or words depending on `splitWords` */
    length: number
    /** Work on characters instead of words */
    splitWords: boolean
    random?: RandomSource
}

export interface ModelBuiltEvent {
    entries: number
    /** Entries too short to hold a single transition */
    skipped: number
    prefixes: number
    heads: number
    elapsedTime: number
}

export interface GeneratedEvent {
    tokens: number
    restarts: number
    elapsedTime: number
}

export interface CorpusStats {
    entryCount: number
    totalWordCount: number
    uniqueWordCount: number
    avgWordsPerEntry: number
    totalCharacterCount: number
}

export class MarkovText extends EventEmitter<{
    modelBuilt: (event: ModelBuiltEvent) => void
    generated: (event: GeneratedEvent) => void
}> {
    public generate(options: MarkovGenerateOptions): string {
        const parsed = generateOptionsSchema.safeParse(options)
        if (!parsed.success) {
            throw new InvalidConfigurationError(parsed.error.issues.map(issue => issue.message))
        }
        const { order, length, splitWords } = parsed.data
        const random = options.random ?? cryptoRandom
        const mode = tokenModeFor(splitWords)

        const startTime = Date.now()
        const sequences = options.corpus.map(entry => tokenize(entry, mode))
        const model = buildModel(sequences, order)
        const modelBuilt: ModelBuiltEvent = {
            entries: sequences.length,
            skipped: sequences.filter(sequence => sequence.length < order + 1).length,
            prefixes: model.transitions.size,
            heads: model.heads.size,
            elapsedTime: Date.now() - startTime
        }
        logger.debug(`{generate} ${mode} model of order ${yellow(order)}: ${yellow(modelBuilt.prefixes)} prefixes, ${yellow(modelBuilt.heads)} heads, ${yellow(modelBuilt.skipped)} entries skipped`)
        this.emit('modelBuilt', modelBuilt)

        const walkStartTime = Date.now()
        const { tokens, restarts } = walk(model, length, mode, random)
        this.emit('generated', { tokens: tokens.length, restarts, elapsedTime: Date.now() - walkStartTime })

        return joinTokens(tokens, mode)
    }

    public getCorpusStats(corpus: readonly string[]): CorpusStats {
        const uniqueWords = new Set<string>()
        let totalWordCount = 0
        let totalCharacterCount = 0

        for (const entry of corpus) {
            const words = tokenize(entry, 'words')
            totalWordCount += words.length
            totalCharacterCount += Array.from(entry).length
            for (const word of words) {
                uniqueWords.add(word.toLowerCase())
            }
        }

        return {
            entryCount: corpus.length,
            totalWordCount,
            uniqueWordCount: uniqueWords.size,
            avgWordsPerEntry: corpus.length > 0 ? totalWordCount / corpus.length : 0,
            totalCharacterCount
        }
    }
}
