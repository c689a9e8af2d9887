import { describe, expect, test } from '@jest/globals';
import { chainLengths, compareStrategies, loadFactor, reportTable } from './analysis'
import { createTable } from './hashtable'
import { djb2Hash, firstCharHash } from './strategies'
import { ContractError } from '../../shared/utils'

describe('analysis', () => {
    test('chain_lengths', () => {
        let table = createTable(3)
        table.insert(() => 0, "a", 1)
        table.insert(() => 0, "b", 2)
        expect(chainLengths(table)).toEqual([2, 0, 0])
    })

    test('load_factor', () => {
        let table = createTable(4)
        table.insert(djb2Hash, "a", 1)
        table.insert(djb2Hash, "b", 2)
        expect(loadFactor(table)).toBe(0.5)
    })

    test('report_table', () => {
        let table = createTable(4)
        table.insert(() => 1, "a", 1)
        table.insert(() => 1, "b", 2)
        table.insert(() => 3, "c", 3)
        expect(reportTable("fixed", table)).toEqual({ name: "fixed", collisions: 1, longestChain: 2, emptyBuckets: 2 })
    })

    test('compare_strategies', () => {
        const reports = compareStrategies(["apple", "ant", "arc"], 101, { naive: firstCharHash, djb2: djb2Hash })
        expect(reports).toEqual([
            { name: "naive", collisions: 2, longestChain: 3, emptyBuckets: 100 },
            { name: "djb2", collisions: 0, longestChain: 1, emptyBuckets: 98 },
        ])
    })

    test('compare_strategies_failing_strategy', () => {
        const outOfRange = (_: string, capacity: number) => capacity
        expect(() => compareStrategies(["a"], 3, { djb2: djb2Hash, broken: outOfRange })).toThrow(ContractError)
    })

    test('compare_strategies_no_keys', () => {
        const reports = compareStrategies([], 3, { djb2: djb2Hash })
        expect(reports).toEqual([{ name: "djb2", collisions: 0, longestChain: 0, emptyBuckets: 3 }])
    })
})
