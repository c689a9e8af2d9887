// Optional hook for tracing table mutations. The table itself never prints.
export interface TableObserver {
    inserted?(key: string, value: number, index: number): void
    removed?(key: string, value: number, index: number): void
    missed?(key: string, index: number): void
    cleared?(released: number): void
}

export function consoleObserver(log: (line: string) => void = console.log): TableObserver {
    return {
        removed(key, value, index) {
            log(`removing ${key} (value=${value}) from bucket ${index}`)
        },
        missed(key, index) {
            log(`key ${key} not found in bucket ${index}`)
        },
        cleared(released) {
            log(`reset released ${released} entries`)
        },
    }
}
