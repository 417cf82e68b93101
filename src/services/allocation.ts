import type { Decimal } from 'decimal.js'
import { D, Dec, ONE, ZERO, toDecimal, type Weight } from '../utils/decimal.js'
import { allocationEntries, normalizeTicker, type AllocationInput } from '../utils/allocationUtils.js'
import {
    AllocationSumError,
    DuplicateTickerError,
    InvalidWeightError,
    RebalanceError,
    mapUnknownError,
} from '../utils/rebalanceErrors.js'

/** Tolerance on the weight sum; absorbs input parsing noise, not misconfiguration */
export const ALLOCATION_EPSILON = new D('1e-9')

export type SafeAllocationResult =
    | { success: true, data: Allocation }
    | { success: false, error: RebalanceError }

/**
 * Target weights per ticker. Validated once at construction, so an instance
 * that exists is always consistent: upper-case tickers, no duplicates, every
 * weight in [0, 1] and the weights summing to 1.
 */
export class Allocation {
    private readonly weights: ReadonlyMap<string, Weight>
    readonly total: Decimal

    private constructor(weights: Map<string, Weight>, total: Decimal) {
        this.weights = weights
        this.total = total
        Object.freeze(this)
    }

    static create(input: AllocationInput | Allocation): Allocation {
        if (input instanceof Allocation) return input

        const weights = new Map<string, Weight>()
        for (const [rawTicker, rawWeight] of allocationEntries(input)) {
            const ticker = normalizeTicker(rawTicker)
            if (weights.has(ticker)) {
                throw new DuplicateTickerError(ticker)
            }
            weights.set(ticker, toDecimal(rawWeight))
        }

        for (const [ticker, weight] of weights) {
            if (weight.lt(0) || weight.gt(ONE)) {
                throw new InvalidWeightError(ticker, weight.toString())
            }
        }

        const total = Dec.sum(weights.values())
        if (!Dec.within(total, ONE, ALLOCATION_EPSILON)) {
            throw new AllocationSumError(total.toString())
        }

        return new Allocation(weights, total)
    }

    /** Like `create`, but reports failure as a value instead of throwing */
    static safeCreate(input: AllocationInput | Allocation): SafeAllocationResult {
        try {
            return { success: true, data: Allocation.create(input) }
        } catch (error) {
            return { success: false, error: mapUnknownError(error) }
        }
    }

    get size(): number {
        return this.weights.size
    }

    has(ticker: string): boolean {
        return this.weights.has(normalizeTicker(ticker))
    }

    /** Target weight of a ticker; 0 when the ticker is not allocated */
    weightOf(ticker: string): Weight {
        return this.weights.get(normalizeTicker(ticker)) ?? ZERO
    }

    /** Tickers in the order they were configured */
    tickers(): string[] {
        return [...this.weights.keys()]
    }

    entries(): Array<[string, Weight]> {
        return [...this.weights.entries()]
    }

    toJSON(): Record<string, string> {
        const json: Record<string, string> = {}
        for (const [ticker, weight] of this.weights) {
            json[ticker] = weight.toString()
        }
        return json
    }
}
