export class ContractError extends Error {
    constructor(message: string) {
        super(message)
        this.name = "ContractError"
    }
}

export function assert(condition: boolean, message: string): asserts condition {
    if (!condition) {
        throw new ContractError(message)
    }
}

export function isIndex(value: number, length: number): boolean {
    return Number.isInteger(value) && value >= 0 && value < length
}

export function maxValue<T>(items: Iterable<T>, key: (item: T) => number): number {
    let maxValue = -Infinity
    for (let item of items) {
        let value = key(item)
        if (value > maxValue) {
            maxValue = value
        }
    }
    return maxValue
}
