import { InvalidTickerError } from './rebalanceErrors.js'
import type { NumericInput } from './decimal.js'

/** Raw target weights, either as a record or as pairs (pairs keep duplicates visible) */
export type AllocationInput = Record<string, NumericInput> | Iterable<readonly [string, NumericInput]>

/**
 * Trim and upper-case a ticker. Every ticker comparison in the core goes
 * through this, so 'aapl', ' AAPL ' and 'AAPL' are the same position.
 */
export function normalizeTicker(ticker: string): string {
    const normalized = ticker.trim().toUpperCase()
    if (!normalized) {
        throw new InvalidTickerError(ticker)
    }
    return normalized
}

export function isIterable<T>(value: Iterable<T> | object): value is Iterable<T> {
    return Symbol.iterator in value
}

/**
 * @example
 * allocationEntries({ meta: 0.4, AAPL: '0.6' })
 * // → [['meta', 0.4], ['AAPL', '0.6']]
 *
 * @example
 * allocationEntries(new Map([['META', 0.4], ['AAPL', 0.6]]))
 * // → [['META', 0.4], ['AAPL', 0.6]]
 */
export function allocationEntries(input: AllocationInput): Array<readonly [string, NumericInput]> {
    if (isIterable<readonly [string, NumericInput]>(input)) {
        return Array.from(input)
    }
    return Object.entries(input)
}

/** Code-point ordering, independent of locale */
export function compareTickers(a: string, b: string): number {
    if (a < b) return -1
    if (a > b) return 1
    return 0
}
