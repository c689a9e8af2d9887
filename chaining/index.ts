export { ChainedHashTable, createTable } from "./src/hashtable"
export type { ChainEntry, TableOptions } from "./src/hashtable"
export { djb2Hash, firstCharHash, knuthHash, strategies, strategyByName, isStrategyName } from "./src/strategies"
export type { HashStrategy, StrategyName } from "./src/strategies"
export { consoleObserver } from "./src/observer"
export type { TableObserver } from "./src/observer"
export { chainLengths, compareStrategies, loadFactor, reportTable } from "./src/analysis"
export type { StrategyReport } from "./src/analysis"
export { ContractError } from "../shared/utils"
