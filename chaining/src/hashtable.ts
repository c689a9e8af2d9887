import { assert, isIndex } from "../../shared/utils"
import { HashStrategy } from "./strategies"
import { TableObserver } from "./observer"

export type ChainEntry = {
    readonly key: string
    readonly value: number
    next: ChainEntry | null
}

export type TableOptions = {
    observer?: TableObserver
}

function createBuckets(capacity: number): (ChainEntry | null)[] {
    return new Array<ChainEntry | null>(capacity).fill(null)
}

// Fixed-capacity string -> integer table with separate chaining.
// Duplicate keys are not merged: each insert pushes a new entry at the chain head.
export class ChainedHashTable {
    private buckets: (ChainEntry | null)[]
    private count: number = 0
    private alive: boolean = true
    private readonly observer: TableObserver

    constructor(readonly capacity: number, options: TableOptions = {}) {
        assert(Number.isInteger(capacity) && capacity > 0, `capacity must be a positive integer, got ${capacity}`)
        this.buckets = createBuckets(capacity)
        this.observer = options.observer ?? {}
    }

    get total(): number {
        return this.count
    }

    get destroyed(): boolean {
        return !this.alive
    }

    private checkAlive(): void {
        assert(this.alive, "table has been destroyed")
    }

    private index(strategy: HashStrategy, key: string): number {
        this.checkAlive()
        assert(typeof key === "string", `key must be a string, got ${typeof key}`)
        const i = strategy(key, this.capacity)
        assert(isIndex(i, this.capacity), `hash strategy returned ${i} for "${key}", expected an integer in [0, ${this.capacity})`)
        return i
    }

    insert(strategy: HashStrategy, key: string, value: number): void {
        const i = this.index(strategy, key)
        assert(Number.isInteger(value), `value must be an integer, got ${value}`)
        this.buckets[i] = { key, value, next: this.buckets[i] }
        this.count++
        this.observer.inserted?.(key, value, i)
    }

    // Unlinks the first entry with an equal key, head to tail. Returns false if none.
    remove(strategy: HashStrategy, key: string): boolean {
        const i = this.index(strategy, key)
        let prev: ChainEntry | null = null
        let current = this.buckets[i]
        while (current !== null && current.key !== key) {
            prev = current
            current = current.next
        }
        if (current === null) {
            this.observer.missed?.(key, i)
            return false
        }
        if (prev === null) {
            this.buckets[i] = current.next
        } else {
            prev.next = current.next
        }
        current.next = null
        this.count--
        this.observer.removed?.(key, current.value, i)
        return true
    }

    find(strategy: HashStrategy, key: string): number | undefined {
        const i = this.index(strategy, key)
        for (let entry = this.buckets[i]; entry !== null; entry = entry.next) {
            if (entry.key === key) {
                return entry.value
            }
        }
        return undefined
    }

    private release(): number {
        let released = 0
        for (let i = 0; i < this.buckets.length; i++) {
            let current = this.buckets[i]
            while (current !== null) {
                this.buckets[i] = current.next
                current.next = null
                current = this.buckets[i]
                released++
            }
        }
        this.count -= released
        return released
    }

    // Drops every entry, keeps the buckets. Returns the number of entries released.
    reset(): number {
        this.checkAlive()
        const released = this.release()
        this.observer.cleared?.(released)
        return released
    }

    destroy(): void {
        this.checkAlive()
        this.release()
        this.buckets = []
        this.alive = false
    }

    bucket(index: number): [string, number][] {
        this.checkAlive()
        assert(isIndex(index, this.capacity), `bucket index ${index} out of range [0, ${this.capacity})`)
        let chain: [string, number][] = []
        for (let entry = this.buckets[index]; entry !== null; entry = entry.next) {
            chain.push([entry.key, entry.value])
        }
        return chain
    }

    chainLengths(): number[] {
        this.checkAlive()
        return this.buckets.map(head => {
            let n = 0
            for (let entry = head; entry !== null; entry = entry.next) {
                n++
            }
            return n
        })
    }

    // entries beyond the first in each bucket
    collisions(): number {
        return this.chainLengths().reduce((acc, n) => acc + Math.max(n - 1, 0), 0)
    }

    display(): string[] {
        this.checkAlive()
        let lines = [`table capacity=${this.capacity} total=${this.count}`]
        for (let i = 0; i < this.capacity; i++) {
            const chain = this.bucket(i)
            if (chain.length === 0) {
                lines.push(`[${i}] empty`)
            } else {
                lines.push(`[${i}] ` + chain.map(([key, value]) => `(${key}, ${value})`).join(" -> "))
            }
        }
        return lines
    }

    *[Symbol.iterator](): Generator<[string, number]> {
        this.checkAlive()
        for (let i = 0; i < this.capacity; i++) {
            yield* this.bucket(i)
        }
    }
}

export function createTable(capacity: number, options: TableOptions = {}): ChainedHashTable {
    return new ChainedHashTable(capacity, options)
}
