import { maxValue } from "../../shared/utils"
import { ChainedHashTable, createTable } from "./hashtable"
import { HashStrategy } from "./strategies"

export type StrategyReport = {
    name: string
    collisions: number
    longestChain: number
    emptyBuckets: number
}

export function chainLengths(table: ChainedHashTable): number[] {
    return table.chainLengths()
}

export function loadFactor(table: ChainedHashTable): number {
    return table.total / table.capacity
}

export function reportTable(name: string, table: ChainedHashTable): StrategyReport {
    const lengths = chainLengths(table)
    return {
        name,
        collisions: table.collisions(),
        longestChain: maxValue(lengths, n => n),
        emptyBuckets: lengths.filter(n => n === 0).length,
    }
}

// inserts all keys once per strategy, value = position in the list
export function compareStrategies(keys: readonly string[], capacity: number, named: Record<string, HashStrategy>): StrategyReport[] {
    let reports: StrategyReport[] = []
    for (const [name, strategy] of Object.entries(named)) {
        const table = createTable(capacity)
        try {
            keys.forEach((key, i) => table.insert(strategy, key, i))
            reports.push(reportTable(name, table))
        } finally {
            table.destroy()
        }
    }
    return reports
}
