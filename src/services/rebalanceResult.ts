import type { Decimal } from 'decimal.js'
import { TradeAction, type RebalanceResultJSON, type Trade } from '../types/index.js'
import { Dec, type Money } from '../utils/decimal.js'
import { describeTrade, tradeToJSON } from './market.js'

/**
 * Output of a rebalance: the trades to review before execution, warnings about
 * edge cases, and summary figures. Every figure is computed from `trades` when
 * the result is built and nothing on it can change afterwards.
 */
export class RebalanceResult {
    readonly trades: readonly Trade[]
    readonly warnings: readonly string[]
    readonly totalBuyValue: Money
    readonly totalSellValue: Money
    /** Positive = cash surplus (more sells), negative = cash consumed (more buys) */
    readonly netCashFlow: Money
    readonly isBalanced: boolean

    constructor(trades: Iterable<Trade> = [], warnings: Iterable<string> = []) {
        this.trades = Object.freeze([...trades])
        this.warnings = Object.freeze([...warnings])
        this.totalBuyValue = sumValues(this.trades, TradeAction.BUY)
        this.totalSellValue = sumValues(this.trades, TradeAction.SELL)
        this.netCashFlow = this.totalSellValue.minus(this.totalBuyValue)
        this.isBalanced = this.trades.length === 0
        Object.freeze(this)
    }

    buys(): Trade[] {
        return this.trades.filter(t => t.action === TradeAction.BUY)
    }

    sells(): Trade[] {
        return this.trades.filter(t => t.action === TradeAction.SELL)
    }

    toJSON(): RebalanceResultJSON {
        return {
            trades: this.trades.map(tradeToJSON),
            warnings: [...this.warnings],
            totalBuyValue: this.totalBuyValue.toString(),
            totalSellValue: this.totalSellValue.toString(),
            netCashFlow: this.netCashFlow.toString(),
            isBalanced: this.isBalanced,
        }
    }

    toString(): string {
        if (this.isBalanced) {
            return 'RebalanceResult(balanced, no trades needed)'
        }
        return `RebalanceResult(${this.trades.length} trades, buy=$${Dec.formatMoney(this.totalBuyValue)}, ` +
            `sell=$${Dec.formatMoney(this.totalSellValue)}, net=${Dec.formatMoney(this.netCashFlow)})`
    }

    describe(): string[] {
        return this.trades.map(describeTrade)
    }
}

const sumValues = (trades: readonly Trade[], action: TradeAction): Decimal =>
    Dec.sum(trades.filter(t => t.action === action).map(t => t.value))
