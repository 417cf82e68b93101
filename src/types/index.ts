import type { Money } from '../utils/decimal.js'
import type { Decimal } from 'decimal.js'

export const TradeAction = {
    BUY: 'BUY',
    SELL: 'SELL',
} as const

export type TradeAction = typeof TradeAction[keyof typeof TradeAction]

export const isTradeAction = (value: unknown): value is TradeAction =>
    value === TradeAction.BUY || value === TradeAction.SELL

/** Market reference data, shared by every portfolio that holds the ticker */
export interface Stock {
    readonly ticker: string
    readonly price: Money
}

/** A portfolio's position in one stock */
export interface Holding {
    readonly stock: Stock
    readonly shares: Decimal
}

export interface Trade {
    readonly ticker: string
    readonly action: TradeAction
    /** Always positive */
    readonly shares: Decimal
    /** Absolute monetary amount moved, never signed */
    readonly value: Money
}

export interface TradeJSON {
    ticker: string
    action: TradeAction
    shares: string
    value: string
}

export interface RebalanceResultJSON {
    trades: TradeJSON[]
    warnings: string[]
    totalBuyValue: string
    totalSellValue: string
    netCashFlow: string
    isBalanced: boolean
}
