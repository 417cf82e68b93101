import type { Decimal } from 'decimal.js'
import { TradeAction, type Holding, type Stock, type Trade } from '../types/index.js'
import { Dec, SHARE_DECIMALS, ZERO, toDecimal, type Money, type NumericInput } from '../utils/decimal.js'
import { compareTickers } from '../utils/allocationUtils.js'
import { logger } from '../utils/logger.js'
import { EmptyPortfolioError, InvalidThresholdError } from '../utils/rebalanceErrors.js'
import type { Allocation } from './allocation.js'
import type { PriceBook } from './priceBook.js'
import { ACTION_PRIORITY, createTrade, marketValue } from './market.js'
import { RebalanceResult } from './rebalanceResult.js'

/** Everything the algorithm reads. Holdings are keyed by normalised ticker. */
export interface RebalanceSnapshot {
    holdings: ReadonlyMap<string, Holding>
    allocation: Allocation
    cash: Money
    prices: PriceBook
}

export interface RebalanceOptions {
    /** Minimum |target − current| in money before a trade is emitted */
    threshold?: NumericInput
    /** Decimal places kept on share quantities */
    shareDecimals?: number
}

/** One ticker's view of the rebalance before filtering */
export interface PositionPlan {
    ticker: string
    stock: Stock
    shares: Decimal
    currentValue: Money
    targetValue: Money
    delta: Money
}

export const totalValue = (holdings: Iterable<Holding>, cash: Money): Money => {
    let total = cash
    for (const holding of holdings) {
        total = total.plus(marketValue(holding))
    }
    return total
}

export function parseThreshold(threshold: NumericInput): Decimal {
    const value = toDecimal(threshold)
    if (value.lt(0)) {
        throw new InvalidThresholdError(value.toString())
    }
    return value
}

/**
 * Pair every ticker with its current and target value. Held tickers come first
 * in holding order, then allocated tickers that are not held. An allocated
 * ticker that is not held becomes a zero-share placeholder priced from the
 * price book (MissingPriceError when there is no quote).
 */
export function planPositions(snapshot: RebalanceSnapshot, total: Money, warnings: string[]): PositionPlan[] {
    const { holdings, allocation, prices } = snapshot
    const plans: PositionPlan[] = []

    for (const [ticker, holding] of holdings) {
        const currentValue = marketValue(holding)
        const targetValue = allocation.weightOf(ticker).times(total)
        plans.push({
            ticker,
            stock: holding.stock,
            shares: holding.shares,
            currentValue,
            targetValue,
            delta: targetValue.minus(currentValue),
        })
    }

    for (const [ticker, weight] of allocation.entries()) {
        if (holdings.has(ticker) || weight.isZero()) continue

        warnings.push(
            `${ticker} is in allocation (${Dec.formatRatio(weight)}%) but not in holdings. ` +
            'Treated as a zero-share holding at its quoted price.'
        )
        const stock = prices.require(ticker)
        const targetValue = weight.times(total)
        plans.push({
            ticker,
            stock,
            shares: ZERO,
            currentValue: ZERO,
            targetValue,
            delta: targetValue,
        })
    }

    return plans
}

/**
 * Size the trade for one position, or return undefined when nothing should be
 * traded. A position with no target is closed whatever its value: the exact
 * held quantity is sold, even below the threshold or at a price of zero.
 */
export function sizeTrade(
    plan: PositionPlan,
    threshold: Decimal,
    shareDecimals: number,
    warnings: string[]
): Trade | undefined {
    const { ticker, delta, stock } = plan

    if (plan.targetValue.isZero() && plan.shares.gt(0)) {
        return createTrade(ticker, TradeAction.SELL, plan.shares, plan.currentValue)
    }

    const amount = delta.abs()
    if (delta.isZero() || amount.lt(threshold)) return undefined

    if (stock.price.isZero()) {
        warnings.push(`${ticker} has a zero price and cannot be traded.`)
        return undefined
    }

    const action = delta.gt(0) ? TradeAction.BUY : TradeAction.SELL
    const shares = Dec.roundShares(amount.div(stock.price), shareDecimals)

    if (shares.isZero()) {
        logger.debug({ ticker, delta: delta.toString() }, 'Trade rounds to zero shares, skipped')
        return undefined
    }

    return createTrade(ticker, action, shares, amount)
}

export const compareTrades = (a: Trade, b: Trade): number =>
    ACTION_PRIORITY[a.action] - ACTION_PRIORITY[b.action] || compareTickers(a.ticker, b.ticker)

/**
 * Compute the trades that move the snapshot toward its target allocation.
 * Pure: the same snapshot and options always produce an equal result.
 */
export function computeRebalance(snapshot: RebalanceSnapshot, options: RebalanceOptions = {}): RebalanceResult {
    const threshold = parseThreshold(options.threshold ?? ZERO)
    const shareDecimals = options.shareDecimals ?? SHARE_DECIMALS

    const total = totalValue(snapshot.holdings.values(), snapshot.cash)
    if (total.isZero()) {
        throw new EmptyPortfolioError()
    }

    const warnings: string[] = []
    const trades: Trade[] = []

    for (const plan of planPositions(snapshot, total, warnings)) {
        const trade = sizeTrade(plan, threshold, shareDecimals, warnings)
        if (trade) trades.push(trade)
    }

    trades.sort(compareTrades)

    const result = new RebalanceResult(trades, warnings)

    logger.debug({
        totalValue: total.toString(),
        threshold: threshold.toString(),
        trades: result.trades.length,
        netCashFlow: result.netCashFlow.toString(),
    }, 'Rebalance computed')
    for (const warning of result.warnings) {
        logger.warn(warning)
    }

    return result
}
