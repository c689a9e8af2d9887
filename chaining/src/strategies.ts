import { ContractError } from "../../shared/utils"

// maps a key to a bucket index in [0, capacity)
export type HashStrategy = (key: string, capacity: number) => number

// deliberately poor baseline: keys sharing a first character always collide
export function firstCharHash(key: string, capacity: number): number {
    if (key.length === 0) {
        return 0
    }
    return key.charCodeAt(0) % capacity
}

export function djb2Hash(key: string, capacity: number): number {
    let hash = 5381
    for (let i = 0; i < key.length; i++) {
        // hash * 33 + c, wrapped to unsigned 32 bit
        hash = (Math.imul(hash, 33) + key.charCodeAt(i)) >>> 0
    }
    return hash % capacity
}

const GOLDEN_RATIO_FRACTION = 0.6180339887

// polynomial rolling hash folded through Knuth's multiplicative method
export function knuthHash(key: string, capacity: number): number {
    let hash = 0
    for (let i = 0; i < key.length; i++) {
        hash = (Math.imul(hash, 31) + key.charCodeAt(i)) >>> 0
    }
    const product = hash * GOLDEN_RATIO_FRACTION
    const fraction = product - Math.floor(product)
    return Math.floor(capacity * fraction)
}

export type StrategyName = "naive" | "djb2" | "knuth"

export const strategies: Record<StrategyName, HashStrategy> = {
    naive: firstCharHash,
    djb2: djb2Hash,
    knuth: knuthHash,
}

export function isStrategyName(name: string): name is StrategyName {
    return Object.prototype.hasOwnProperty.call(strategies, name)
}

export function strategyByName(name: string): HashStrategy {
    if (!isStrategyName(name)) {
        throw new ContractError(`Unknown hash strategy "${name}", expected one of ${Object.keys(strategies).join(", ")}`)
    }
    return strategies[name]
}
