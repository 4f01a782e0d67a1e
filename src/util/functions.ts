import { randomInt } from 'crypto'

export const getRandomElement = <T>(array: readonly T[]): T => array[randomInt(array.length)]

export const pluralize = (count: number, singular: string, plural = `${singular}s`) => count === 1 ? singular : plural

/**
 * Format milliseconds into a human-readable duration
 */
export function formatElapsed(ms: number): string {
    if (ms < 1000) return `${Math.round(ms)}ms`
    const seconds = ms / 1000
    if (seconds < 60) {
        return `${seconds.toFixed(1)}s`
    } else if (seconds < 3600) {
        const minutes = Math.floor(seconds / 60)
        const remainingSeconds = Math.round(seconds % 60)
        return `${minutes}m ${remainingSeconds}s`
    } else {
        const hours = Math.floor(seconds / 3600)
        const minutes = Math.floor((seconds % 3600) / 60)
        const remainingSeconds = Math.round(seconds % 60)
        return `${hours}h ${minutes}m ${remainingSeconds}s`
    }
}
