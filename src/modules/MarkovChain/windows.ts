import type { Window } from '../../types/types'

// Windows are compared by value, so they are keyed by an encoding of their tokens
export const windowKey = (window: Window) => JSON.stringify(window)

export interface ReadonlyWindowMap<V> extends Iterable<[Window, V]> {
    readonly size: number
    has(window: Window): boolean
    get(window: Window): V | undefined
    keys(): IterableIterator<Window>
    values(): IterableIterator<V>
    entries(): IterableIterator<[Window, V]>
}

export interface ReadonlyWindowSet extends Iterable<Window> {
    readonly size: number
    has(window: Window): boolean
    values(): IterableIterator<Window>
}

export class WindowMap<V> implements ReadonlyWindowMap<V> {
    private readonly byKey = new Map<string, [Window, V]>()

    get size() {
        return this.byKey.size
    }

    has(window: Window) {
        return this.byKey.has(windowKey(window))
    }

    get(window: Window) {
        return this.byKey.get(windowKey(window))?.[1]
    }

    set(window: Window, value: V) {
        this.byKey.set(windowKey(window), [Object.freeze([...window]), value])
        return this
    }

    *keys() {
        for (const [window] of this.byKey.values()) yield window
    }

    *values() {
        for (const [, value] of this.byKey.values()) yield value
    }

    *entries(): IterableIterator<[Window, V]> {
        for (const [window, value] of this.byKey.values()) yield [window, value]
    }

    [Symbol.iterator]() {
        return this.entries()
    }
}

export class WindowSet implements ReadonlyWindowSet {
    private readonly windows = new WindowMap<true>()

    get size() {
        return this.windows.size
    }

    has(window: Window) {
        return this.windows.has(window)
    }

    add(window: Window) {
        this.windows.set(window, true)
        return this
    }

    values() {
        return this.windows.keys()
    }

    [Symbol.iterator]() {
        return this.values()
    }
}
