import type { Decimal } from 'decimal.js'
import type { Holding } from '../types/index.js'
import { ZERO, toDecimal, type Money, type NumericInput, type Weight } from '../utils/decimal.js'
import { normalizeTicker, type AllocationInput } from '../utils/allocationUtils.js'
import {
    DuplicateHoldingError,
    NegativeCashError,
    NegativePriceError,
    NegativeSharesError,
} from '../utils/rebalanceErrors.js'
import { DEFAULT_CONFIG, type RebalancerConfig } from '../config/rebalancerConfig.js'
import { Allocation } from './allocation.js'
import { PriceBook, type PriceBookInput } from './priceBook.js'
import { createHolding, createStock, marketValue } from './market.js'
import { computeRebalance, totalValue } from './rebalancing.js'
import type { RebalanceResult } from './rebalanceResult.js'

export interface PortfolioInit {
    holdings?: Iterable<Holding>
    allocation: Allocation | AllocationInput
    cash?: NumericInput
    /** Quotes for allocated tickers that are not held */
    prices?: PriceBookInput
    config?: Partial<Pick<RebalancerConfig, 'defaultThreshold' | 'shareDecimals'>>
}

/**
 * Holdings, a target allocation and idle cash. Validated on construction and
 * immutable afterwards; the `with*` methods return a new portfolio.
 *
 * @example
 * const portfolio = new Portfolio({
 *     holdings: [createHolding(createStock('META', 585), 50)],
 *     allocation: { META: 0.6, AAPL: 0.4 },
 *     prices: [createStock('AAPL', 228)],
 *     cash: 2000,
 * })
 * portfolio.rebalance(100)
 */
export class Portfolio {
    readonly holdings: readonly Holding[]
    readonly allocation: Allocation
    readonly cash: Money
    readonly prices: PriceBook
    private readonly holdingsByTicker: ReadonlyMap<string, Holding>
    private readonly defaultThreshold: Decimal
    private readonly shareDecimals: number

    constructor(init: PortfolioInit) {
        const seen = new Set<string>()
        const normalized: Array<[string, Holding]> = []
        for (const holding of init.holdings ?? []) {
            const ticker = normalizeTicker(holding.stock.ticker)
            if (seen.has(ticker)) {
                throw new DuplicateHoldingError(ticker)
            }
            seen.add(ticker)
            normalized.push([ticker, holding])
        }

        const byTicker = new Map<string, Holding>()
        for (const [ticker, holding] of normalized) {
            const shares = toDecimal(holding.shares)
            if (shares.lt(0)) {
                throw new NegativeSharesError(ticker, shares.toString())
            }
            const price = toDecimal(holding.stock.price)
            if (price.lt(0)) {
                throw new NegativePriceError(ticker, price.toString())
            }
            byTicker.set(ticker, createHolding(createStock(ticker, price), shares))
        }

        const cash = toDecimal(init.cash ?? ZERO)
        if (cash.lt(0)) {
            throw new NegativeCashError(cash.toString())
        }

        this.holdingsByTicker = byTicker
        this.holdings = Object.freeze([...byTicker.values()])
        this.allocation = Allocation.create(init.allocation)
        this.cash = cash
        this.prices = PriceBook.from(init.prices)
        this.defaultThreshold = init.config?.defaultThreshold ?? DEFAULT_CONFIG.defaultThreshold
        this.shareDecimals = init.config?.shareDecimals ?? DEFAULT_CONFIG.shareDecimals
        Object.freeze(this)
    }

    /** Market value of every holding plus cash */
    get totalValue(): Money {
        return totalValue(this.holdings, this.cash)
    }

    holdingFor(ticker: string): Holding | undefined {
        return this.holdingsByTicker.get(normalizeTicker(ticker))
    }

    /**
     * Current weight of each holding as a fraction of total value. All zero when
     * the portfolio is worth nothing.
     */
    currentWeights(): Map<string, Weight> {
        const total = this.totalValue
        const weights = new Map<string, Weight>()
        for (const [ticker, holding] of this.holdingsByTicker) {
            weights.set(ticker, total.isZero() ? ZERO : marketValue(holding).div(total))
        }
        return weights
    }

    /**
     * Trades that move this portfolio toward its allocation. `threshold` is the
     * smallest monetary deviation worth trading.
     */
    rebalance(threshold: NumericInput = this.defaultThreshold): RebalanceResult {
        return computeRebalance(
            {
                holdings: this.holdingsByTicker,
                allocation: this.allocation,
                cash: this.cash,
                prices: this.prices,
            },
            { threshold, shareDecimals: this.shareDecimals }
        )
    }

    withAllocation(allocation: Allocation | AllocationInput): Portfolio {
        return new Portfolio({ ...this.toInit(), allocation })
    }

    /** Adds a holding; a ticker that is already held is rejected */
    withHolding(holding: Holding): Portfolio {
        return new Portfolio({ ...this.toInit(), holdings: [...this.holdings, holding] })
    }

    withCash(cash: NumericInput): Portfolio {
        return new Portfolio({ ...this.toInit(), cash })
    }

    private toInit(): PortfolioInit {
        return {
            holdings: this.holdings,
            allocation: this.allocation,
            cash: this.cash,
            prices: this.prices,
            config: { defaultThreshold: this.defaultThreshold, shareDecimals: this.shareDecimals },
        }
    }
}
