export type JSONResolvable = string | number | boolean | {[key: string]: JSONResolvable} | {[key: string]: JSONResolvable}[] | null

/**
 * A token is a single character in character mode, or a whole word in word mode
 */
export type Token = string

/**
 * An ordered, fixed-length tuple of consecutive tokens
 */
export type Window = readonly Token[]

/**
 * `characters` models one code point at a time, `words` one whitespace-delimited word at a time
 */
export type TokenMode = 'characters' | 'words'

/**
 * Empty Corpus Model Error
 *
 * Every corpus entry was shorter than `order + 1` tokens, so there is no head to start a chain from
 */
export class EmptyCorpusModelError extends Error {
    order: number
    constructor(order: number) {
        super(`Cannot generate text: no corpus entry has at least ${order + 1} tokens for an order ${order} model`)
        this.name = 'EmptyCorpusModelError'
        this.order = order
    }
}

/**
 * Invalid Configuration Error
 * @param {string[]} issues - One line per rejected setting
 */
export class InvalidConfigurationError extends Error {
    issues: string[]
    constructor(issues: string[]) {
        super(`Invalid configuration: ${issues.join('; ')}`)
        this.name = 'InvalidConfigurationError'
        this.issues = issues
    }
}

/**
 * Timeline API Error
 * @param {string} message - What the API (or the client) reported
 * @param {number} status - HTTP status, when the request got that far
 */
export class TimelineApiError extends Error {
    status: number | null
    constructor(message: string, status: number | null = null) {
        super(message)
        this.name = 'TimelineApiError'
        this.status = status
    }
}

/**
 * Environment configuration failed validation
 */
export class ConfigError extends Error {
    constructor(message: string) {
        super(message)
        this.name = 'ConfigError'
    }
}
