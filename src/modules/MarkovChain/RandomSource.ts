import { getRandomElement } from '../../util/functions'

export interface RandomSource {
    /** Uniformly random element of a non-empty array */
    pick<T>(items: readonly T[]): T
}

function assertNotEmpty(items: readonly unknown[]) {
    if (items.length === 0) throw new RangeError('Cannot pick from an empty collection')
}

export const cryptoRandom: RandomSource = {
    pick(items) {
        assertNotEmpty(items)
        return getRandomElement(items)
    }
}

function fnv1a32(str: string) {
    let hash = 0x811c9dc5
    for (let i = 0; i < str.length; i++) {
        hash ^= str.charCodeAt(i)
        hash = Math.imul(hash, 0x01000193)
    }
    return hash >>> 0
}

function mulberry32(seed: number) {
    return function() {
        let t = seed += 0x6D2B79F5
        t = Math.imul(t ^ (t >>> 15), 1 | t)
        t ^= t + Math.imul(t ^ (t >>> 7), 61 | t)
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296
    }
}

/**
 * Same seed, same sequence of picks
 */
export function seededRandom(seed: string | number): RandomSource {
    const next = mulberry32(typeof seed === 'number' ? seed >>> 0 : fnv1a32(seed))
    return {
        pick(items) {
            assertNotEmpty(items)
            return items[Math.floor(next() * items.length)]
        }
    }
}
