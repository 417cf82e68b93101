import type { Decimal } from 'decimal.js'
import type { Holding, Stock, Trade, TradeJSON } from '../types/index.js'
import { TradeAction } from '../types/index.js'
import { toDecimal, type Money, type NumericInput } from '../utils/decimal.js'
import { normalizeTicker } from '../utils/allocationUtils.js'
import { NegativePriceError, NegativeSharesError, RebalanceError } from '../utils/rebalanceErrors.js'

/**
 * Build a Stock. In production the price would come from a quote feed; here it
 * is supplied by the caller.
 */
export function createStock(ticker: string, price: NumericInput): Stock {
    const normalized = normalizeTicker(ticker)
    const value = toDecimal(price)
    if (value.lt(0)) {
        throw new NegativePriceError(normalized, value.toString())
    }
    return Object.freeze({ ticker: normalized, price: value })
}

export function createHolding(stock: Stock, shares: NumericInput): Holding {
    const quantity = toDecimal(shares)
    if (quantity.lt(0)) {
        throw new NegativeSharesError(stock.ticker, quantity.toString())
    }
    return Object.freeze({ stock, shares: quantity })
}

/** Current market value of a holding */
export const marketValue = (holding: Holding): Money => holding.shares.times(holding.stock.price)

export function createTrade(ticker: string, action: TradeAction, shares: Decimal, value: Money): Trade {
    if (shares.lte(0)) {
        throw new RebalanceError('INTERNAL_ERROR', `Trade for ${ticker} must move a positive share count, got ${shares.toString()}`)
    }
    if (value.lt(0)) {
        throw new RebalanceError('INTERNAL_ERROR', `Trade value for ${ticker} must not be negative, got ${value.toString()}`)
    }
    return Object.freeze({ ticker, action, shares, value })
}

export const tradeToJSON = (trade: Trade): TradeJSON => ({
    ticker: trade.ticker,
    action: trade.action,
    shares: trade.shares.toString(),
    value: trade.value.toString(),
})

export const describeTrade = (trade: Trade): string =>
    `${trade.action} ${trade.shares.toString()} shares of ${trade.ticker} (~$${trade.value.toFixed(2)})`

// SELL first, then BUY
export const ACTION_PRIORITY: Record<TradeAction, number> = {
    [TradeAction.SELL]: 0,
    [TradeAction.BUY]: 1,
}
