import type { Token, TokenMode } from '../../types/types'

/**
 * Character mode puts this between two chains so words from different entries don't run together
 */
export const RESTART_SEPARATOR: Token = ' '

export const tokenModeFor = (splitWords: boolean): TokenMode => splitWords ? 'characters' : 'words'

export function tokenize(text: string, mode: TokenMode): Token[] {
    if (mode === 'characters') return Array.from(text)
    return text.split(/\s+/).filter(w => w.length > 0)
}

export function joinTokens(tokens: readonly Token[], mode: TokenMode): string {
    return tokens.join(mode === 'characters' ? '' : ' ')
}
