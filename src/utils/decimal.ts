/**
 * decimal.ts — Exact decimal arithmetic for portfolio calculations.
 *
 * JS numbers are IEEE 754 doubles, so 0.1 + 0.2 !== 0.3. Share counts, prices,
 * weights and cash all flow through decimal.js instead.
 *
 * Precision strategy:
 *   - Intermediate values:  40 significant digits, never rounded
 *   - Share quantities:     4 decimal places, ROUND_HALF_EVEN (configurable)
 *   - Money (display only): 2 decimal places
 *
 * Usage:
 *   import { toDecimal, Dec } from '../utils/decimal.js'
 *
 *   toDecimal(0.1)                     // → 0.1 exactly
 *   toDecimal('228.50')                // → 228.5
 *   Dec.sum([a, b, c])                 // → a + b + c
 *   Dec.roundShares(d)                 // → d at 4 dp, half-even
 *   Dec.formatMoney(d)                 // → '6137.50'
 */

import { Decimal } from 'decimal.js'
import { InvalidNumberError } from './rebalanceErrors.js'

// ─────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────

/** Significant digits kept by every intermediate operation */
const PRECISION = 40

/** Default decimal places for share quantities */
export const SHARE_DECIMALS = 4

/** Decimal places used when rendering money */
export const MONEY_DECIMALS = 2

/** Rounding mode applied to share quantities */
export const SHARE_ROUNDING = Decimal.ROUND_HALF_EVEN

/**
 * Decimal constructor used throughout the core. Kept separate from the global
 * decimal.js constructor so callers' own settings never leak in.
 */
export const D = Decimal.clone({
    precision: PRECISION,
    rounding: Decimal.ROUND_HALF_EVEN,
    toExpNeg: -21,
    toExpPos: 21,
})

export type Money = Decimal
export type Weight = Decimal

/** Anything accepted where a number enters the system */
export type NumericInput = Decimal | number | string | bigint

export const ZERO = new D(0)
export const ONE = new D(1)

// ─────────────────────────────────────────────
// Conversion
// ─────────────────────────────────────────────

/**
 * Convert a numeric input to an exact Decimal.
 *
 * Numbers are rendered through their shortest round-trip string first, so the
 * literal 0.1 becomes 0.1 rather than 0.1000000000000000055511151231257827...
 */
export function toDecimal(value: NumericInput): Decimal {
    if (Decimal.isDecimal(value)) {
        if (!value.isFinite()) {
            throw new InvalidNumberError(value.toString())
        }
        return new D(value)
    }

    if (typeof value === 'bigint') {
        return new D(value.toString())
    }

    if (typeof value === 'number') {
        if (!Number.isFinite(value)) {
            throw new InvalidNumberError(String(value))
        }
        return parseDecimalString(String(value))
    }

    return parseDecimalString(value.trim(), value)
}

function parseDecimalString(text: string, original: string = text): Decimal {
    if (text === '') {
        throw new InvalidNumberError(original)
    }

    let parsed: Decimal
    try {
        parsed = new D(text)
    } catch (error) {
        throw new InvalidNumberError(original, error)
    }

    // decimal.js happily parses 'NaN' and 'Infinity'
    if (!parsed.isFinite()) {
        throw new InvalidNumberError(original)
    }
    return parsed
}

// ─────────────────────────────────────────────
// Public API
// ─────────────────────────────────────────────

export const Dec = {
    /** Sum a list of decimals; empty input sums to zero */
    sum(values: Iterable<Decimal>): Decimal {
        let total = ZERO
        for (const value of values) {
            total = total.plus(value)
        }
        return total
    },

    /** True when |a − b| ≤ epsilon */
    within(a: Decimal, b: Decimal, epsilon: Decimal): boolean {
        return a.minus(b).abs().lte(epsilon)
    },

    /**
     * Round a share quantity. Only applied to the final quantity of a trade,
     * never to intermediate values.
     */
    roundShares(shares: Decimal, dp: number = SHARE_DECIMALS): Decimal {
        return shares.toDecimalPlaces(dp, SHARE_ROUNDING)
    },

    /** Format money to a fixed 2-dp string, e.g. '6137.50' */
    formatMoney(amount: Decimal): string {
        return amount.toFixed(MONEY_DECIMALS, Decimal.ROUND_HALF_EVEN)
    },

    /** Format a ratio in [0,1] as a percentage string, e.g. 0.4 → '40.0' */
    formatRatio(ratio: Decimal, dp: number = 1): string {
        return ratio.times(100).toFixed(dp, Decimal.ROUND_HALF_EVEN)
    },
}
