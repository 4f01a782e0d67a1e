import type { Token, TokenMode, Window } from '../../types/types'
import { EmptyCorpusModelError, InvalidConfigurationError } from '../../types/types'
import type { MarkovModel } from './MarkovModel'
import { cryptoRandom, type RandomSource } from './RandomSource'
import { joinTokens, RESTART_SEPARATOR } from './tokenize'

export interface WalkResult {
    tokens: Token[]
    /** How many times the walk hit a dead end and jumped to a fresh head */
    restarts: number
}

/**
 * Random walk over the model until at least `targetLength` tokens are out.
 *
 * A prefix with no recorded successor ends the chain: a new head is picked and its
 * tokens appended whole, so the result can overshoot `targetLength` by up to
 * `order - 1` tokens (`order` in character mode, counting the separator).
 */
export function walk(model: MarkovModel, targetLength: number, mode: TokenMode, random: RandomSource = cryptoRandom): WalkResult {
    if (!Number.isInteger(targetLength) || targetLength < 1) {
        throw new InvalidConfigurationError([`length must be a positive integer (got ${targetLength})`])
    }
    if (model.heads.size === 0) throw new EmptyCorpusModelError(model.order)

    const heads = Array.from(model.heads)
    let prefix: Window = random.pick(heads)
    const tokens: Token[] = [...prefix]
    let restarts = 0

    while (tokens.length < targetLength) {
        const successors = model.transitions.get(prefix)
        if (successors) {
            tokens.push(random.pick(Array.from(successors)))
            prefix = tokens.slice(-model.order)
        } else {
            prefix = random.pick(heads)
            if (mode === 'characters') tokens.push(RESTART_SEPARATOR)
            tokens.push(...prefix)
            restarts++
        }
    }

    return { tokens, restarts }
}

export function generateTokens(model: MarkovModel, targetLength: number, mode: TokenMode, random?: RandomSource): Token[] {
    return walk(model, targetLength, mode, random).tokens
}

export function generate(model: MarkovModel, targetLength: number, mode: TokenMode, random?: RandomSource): string {
    return joinTokens(generateTokens(model, targetLength, mode, random), mode)
}
