import { Logger, yellow } from '../util/logger'
const logger = new Logger('generate')

import type { Argv } from 'yargs'

import { formatElapsed, pluralize } from '../util/functions'
import { MarkovText } from '../modules/MarkovChain/MarkovText'
import { cryptoRandom, seededRandom } from '../modules/MarkovChain/RandomSource'
import { withCorpus, withCorpusOptions, type CommandDeps, type CorpusArgs } from './corpus'

export interface GenerateArgs extends CorpusArgs {
    length: number
    order: number
    split: boolean
    seed?: string
}

export async function runGenerate(args: GenerateArgs, deps: CommandDeps): Promise<string> {
    const markov = new MarkovText()
    markov.on('modelBuilt', event => {
        logger.debug(`Model built from ${yellow(event.entries - event.skipped)}/${yellow(event.entries)} ${pluralize(event.entries, 'post')} in ${yellow(formatElapsed(event.elapsedTime))}`)
    })
    markov.on('generated', event => {
        logger.debug(`Generated ${yellow(event.tokens)} ${args.split ? 'characters' : 'words'} with ${yellow(event.restarts)} ${pluralize(event.restarts, 'restart')}`)
    })

    return withCorpus(args, deps, ({ corpus }) => markov.generate({
        corpus,
        order: args.order,
        length: args.length,
        splitWords: args.split,
        random: args.seed !== undefined ? seededRandom(args.seed) : cryptoRandom
    }))
}

export const generateCommand = <T>(yargs: Argv<T>, deps: CommandDeps) => yargs.command(
    ['generate <username>', '$0 <username>'],
    'Generate text from a user\'s timeline',
    builder => withCorpusOptions(builder)
        .option('length', {
            alias: 'l',
            type: 'number',
            default: 160,
            describe: 'Minimum output length: characters with --split, words otherwise'
        })
        .option('order', {
            alias: 'o',
            type: 'number',
            default: 3,
            describe: 'Order of the Markov chain'
        })
        .option('split', {
            alias: 'x',
            type: 'boolean',
            default: false,
            describe: 'Work on characters rather than words'
        })
        .option('seed', {
            type: 'string',
            describe: 'Seed for a reproducible run'
        })
        .check(argv => {
            if (!Number.isInteger(argv.length) || argv.length <= 0) throw new Error('Length must be a positive integer.')
            if (!Number.isInteger(argv.order) || argv.order <= 0) throw new Error('Order must be a positive integer.')
            return true
        }),
    async argv => {
        const text = await runGenerate(argv, deps)
        deps.write(text)
    }
)
