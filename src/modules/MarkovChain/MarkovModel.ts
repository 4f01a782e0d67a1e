import type { Token } from '../../types/types'
import { InvalidConfigurationError } from '../../types/types'
import { ngrams } from './ngrams'
import { WindowMap, WindowSet, type ReadonlyWindowMap, type ReadonlyWindowSet } from './windows'

export interface MarkovModel {
    readonly order: number
    /** Prefix window -> every token seen right after it. Never holds an empty set */
    readonly transitions: ReadonlyWindowMap<ReadonlySet<Token>>
    /** Opening window of every entry long enough to have a transition */
    readonly heads: ReadonlyWindowSet
}

export function assertOrder(order: number) {
    if (!Number.isInteger(order) || order < 1) {
        throw new InvalidConfigurationError([`order must be a positive integer (got ${order})`])
    }
}

/**
 * Builds prefix -> successor sets over the whole corpus. For example, words of
 * `Under my closet I found cats and a bat` at order 2 give `[Under, my] -> {closet}`,
 * `[my, closet] -> {I}` and so on, with `[Under, my]` as the only head.
 *
 * Entries shorter than `order + 1` tokens contribute nothing. Successors are a set:
 * how often a transition was seen is not kept.
 */
export function buildModel(corpus: Iterable<readonly Token[]>, order: number): MarkovModel {
    assertOrder(order)

    const transitions = new WindowMap<Set<Token>>()
    const heads = new WindowSet()

    for (const sequence of corpus) {
        if (sequence.length < order + 1) continue

        heads.add(sequence.slice(0, order))

        for (const ngram of ngrams(sequence, order + 1)) {
            const prefix = ngram.slice(0, order)
            const suffix = ngram[order]

            const successors = transitions.get(prefix)
            if (successors) successors.add(suffix)
            else transitions.set(prefix, new Set([suffix]))
        }
    }

    return Object.freeze({ order, transitions, heads })
}
