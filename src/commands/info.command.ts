import type { Argv } from 'yargs'

import { MarkovText, type CorpusStats } from '../modules/MarkovChain/MarkovText'
import { withCorpus, withCorpusOptions, type CommandDeps, type CorpusArgs } from './corpus'

export interface InfoResult extends CorpusStats {
    username: string
    fromCache: boolean
}

export async function runInfo(args: CorpusArgs, deps: CommandDeps): Promise<InfoResult> {
    return withCorpus(args, deps, ({ corpus, fromCache }) => ({
        username: args.username,
        fromCache,
        ...new MarkovText().getCorpusStats(corpus)
    }))
}

export function formatInfo(info: InfoResult) {
    return [
        `Corpus for ${info.username}${info.fromCache ? ' (cached)' : ''}`,
        `Posts: ${info.entryCount}`,
        `Words: ${info.totalWordCount} (${info.uniqueWordCount} unique)`,
        `Average words per post: ${info.avgWordsPerEntry.toFixed(2)}`,
        `Characters: ${info.totalCharacterCount}`
    ].join('\n')
}

export const infoCommand = <T>(yargs: Argv<T>, deps: CommandDeps) => yargs.command(
    'info <username>',
    'Show statistics about a user\'s corpus',
    builder => withCorpusOptions(builder),
    async argv => {
        deps.write(formatInfo(await runInfo(argv, deps)))
    }
)
