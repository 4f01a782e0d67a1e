import { InvalidConfigurationError } from '../../types/types'

export interface NgramOptions<P> {
    padLeft?: boolean
    padRight?: boolean
    /** Defaults to `null` */
    padSymbol?: P
}

/**
 * Overlapping windows of `n` consecutive items:
 *
 * ```ts
 * [...ngrams([1, 2, 3, 4, 5], 3)] // [[1, 2, 3], [2, 3, 4], [3, 4, 5]]
 * [...ngrams([1, 2, 3, 4, 5], 2, { padRight: true })] // [[1, 2], [2, 3], [3, 4], [4, 5], [5, null]]
 * ```
 *
 * The result is lazy and every iteration starts over from `sequence`, so it can be
 * iterated more than once as long as `sequence` can. Fewer than `n` items produce no windows.
 */
export function ngrams<T>(sequence: Iterable<T>, n: number): Iterable<readonly T[]>
export function ngrams<T, P = null>(sequence: Iterable<T>, n: number, options: NgramOptions<P>): Iterable<readonly (T | P)[]>
export function ngrams<T, P>(sequence: Iterable<T>, n: number, options: NgramOptions<P> = {}): Iterable<readonly (T | P | null)[]> {
    if (!Number.isInteger(n) || n < 1) {
        throw new InvalidConfigurationError([`n must be a positive integer (got ${n})`])
    }
    const { padLeft = false, padRight = false } = options
    const padSymbol = options.padSymbol ?? null
    const padding = Array<P | null>(n - 1).fill(padSymbol)

    function* padded(): Generator<T | P | null> {
        if (padLeft) yield* padding
        yield* sequence
        if (padRight) yield* padding
    }

    return {
        *[Symbol.iterator]() {
            const history: (T | P | null)[] = []
            for (const item of padded()) {
                history.push(item)
                if (history.length > n) history.shift()
                if (history.length === n) yield Object.freeze([...history])
            }
        }
    }
}

export function bigrams<T>(sequence: Iterable<T>): Iterable<readonly T[]>
export function bigrams<T, P = null>(sequence: Iterable<T>, options: NgramOptions<P>): Iterable<readonly (T | P)[]>
export function bigrams<T, P>(sequence: Iterable<T>, options: NgramOptions<P> = {}) {
    return ngrams(sequence, 2, options)
}

export function trigrams<T>(sequence: Iterable<T>): Iterable<readonly T[]>
export function trigrams<T, P = null>(sequence: Iterable<T>, options: NgramOptions<P>): Iterable<readonly (T | P)[]>
export function trigrams<T, P>(sequence: Iterable<T>, options: NgramOptions<P> = {}) {
    return ngrams(sequence, 3, options)
}
