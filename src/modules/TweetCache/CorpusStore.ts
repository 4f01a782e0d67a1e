/**
 * Where fetched corpora are kept between runs, keyed by username
 */
export interface CorpusStore {
    lookup(key: string): Promise<string[] | null>
    store(key: string, corpus: readonly string[]): Promise<void>
}

export class MemoryCorpusStore implements CorpusStore {
    private readonly corpora = new Map<string, string[]>()

    async lookup(key: string) {
        const corpus = this.corpora.get(key)
        return corpus ? [...corpus] : null
    }

    async store(key: string, corpus: readonly string[]) {
        this.corpora.set(key, [...corpus])
    }
}
