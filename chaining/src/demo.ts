import { readFileSync } from "fs"
import { resolve } from "path"
import { assert } from "../../shared/utils"
import { compareStrategies, loadFactor, StrategyReport } from "./analysis"
import { createTable } from "./hashtable"
import { consoleObserver } from "./observer"
import { strategies, strategyByName } from "./strategies"

export type DemoOptions = {
    capacity: number
    strategy: string
}

export type DemoSummary = {
    inserted: number
    collisions: number
    loadFactor: number
    removedPresent: boolean
    removedAbsent: boolean
    released: number
    reports: StrategyReport[]
}

export const MISSING_KEY = "~missing~"

// build copies chaining/data next to the compiled sources
export const defaultWordsFile = resolve(__dirname, "..", "data", "words.txt")

export function readWords(path: string): string[] {
    return readFileSync(path, "utf8")
        .split(/\r?\n/)
        .map(line => line.trim())
        .filter(line => line.length > 0)
}

export function parseDemoArgs(args: readonly string[], defaults: DemoOptions): DemoOptions {
    const capacityArg: string | undefined = args[0]
    const strategyArg: string | undefined = args[1]
    const capacity = capacityArg === undefined ? defaults.capacity : Number(capacityArg)
    assert(Number.isInteger(capacity) && capacity > 0, `capacity must be a positive integer, got "${capacityArg}"`)
    const strategy = strategyArg ?? defaults.strategy
    strategyByName(strategy)
    return { capacity, strategy }
}

export function runDemo(words: readonly string[], options: DemoOptions, log: (line: string) => void = console.log): DemoSummary {
    const strategy = strategyByName(options.strategy)
    const table = createTable(options.capacity, { observer: consoleObserver(log) })

    words.forEach((word, i) => table.insert(strategy, word, i))
    table.display().forEach(line => log(line))

    const collisions = table.collisions()
    const load = loadFactor(table)
    log(`collisions using ${options.strategy}: ${collisions}`)
    log(`load factor: ${load.toFixed(2)}`)

    const reports = compareStrategies(words, options.capacity, strategies)
    for (const report of reports) {
        log(`${report.name}: collisions=${report.collisions} longest=${report.longestChain} empty=${report.emptyBuckets}`)
    }

    const removedPresent = words.length > 0 && table.remove(strategy, words[0])
    const removedAbsent = table.remove(strategy, MISSING_KEY)
    const inserted = words.length
    const released = table.reset()
    table.destroy()

    return { inserted, collisions, loadFactor: load, removedPresent, removedAbsent, released, reports }
}
