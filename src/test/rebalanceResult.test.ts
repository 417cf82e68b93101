import { describe, it, expect } from 'vitest'
import { RebalanceResult } from '../services/rebalanceResult.js'
import { createTrade } from '../services/market.js'
import { TradeAction, isTradeAction } from '../types/index.js'
import { toDecimal } from '../utils/decimal.js'
import { RebalanceError } from '../utils/rebalanceErrors.js'

const trades = [
    createTrade('NVDA', TradeAction.SELL, toDecimal('46.8511'), toDecimal('6137.5')),
    createTrade('AAPL', TradeAction.BUY, toDecimal('23.1908'), toDecimal('5287.5')),
    createTrade('META', TradeAction.BUY, toDecimal('4.8718'), toDecimal('2850')),
]

describe('RebalanceResult', () => {
    it('derives totals from its trades', () => {
        const result = new RebalanceResult(trades, ['note'])

        expect(result.totalBuyValue.toString()).toBe('8137.5')
        expect(result.totalSellValue.toString()).toBe('6137.5')
        expect(result.netCashFlow.toString()).toBe('-2000')
        expect(result.isBalanced).toBe(false)
        expect(result.buys().map(t => t.ticker)).toEqual(['AAPL', 'META'])
        expect(result.sells().map(t => t.ticker)).toEqual(['NVDA'])
    })

    it('is balanced when there are no trades', () => {
        const result = new RebalanceResult()

        expect(result.isBalanced).toBe(true)
        expect(result.netCashFlow.isZero()).toBe(true)
        expect(result.toString()).toBe('RebalanceResult(balanced, no trades needed)')
    })

    it('cannot be changed after construction', () => {
        const source = [...trades]
        const result = new RebalanceResult(source)
        source.pop()

        expect(result.trades).toHaveLength(3)
        expect(Object.isFrozen(result)).toBe(true)
        expect(Object.isFrozen(result.trades)).toBe(true)
        expect(Object.isFrozen(result.trades[0])).toBe(true)
    })

    it('serialises decimals as strings', () => {
        expect(new RebalanceResult(trades.slice(0, 1), ['w']).toJSON()).toEqual({
            trades: [{ ticker: 'NVDA', action: 'SELL', shares: '46.8511', value: '6137.5' }],
            warnings: ['w'],
            totalBuyValue: '0',
            totalSellValue: '6137.5',
            netCashFlow: '6137.5',
            isBalanced: false,
        })
    })

    it('summarises itself for logs', () => {
        const result = new RebalanceResult(trades)

        expect(result.toString()).toBe('RebalanceResult(3 trades, buy=$8137.50, sell=$6137.50, net=-2000.00)')
        expect(result.describe()[0]).toBe('SELL 46.8511 shares of NVDA (~$6137.50)')
    })
})

describe('createTrade', () => {
    it('rejects non-positive share counts', () => {
        expect(() => createTrade('A', TradeAction.BUY, toDecimal(0), toDecimal(1))).toThrow(RebalanceError)
    })

    it('rejects negative values', () => {
        expect(() => createTrade('A', TradeAction.BUY, toDecimal(1), toDecimal(-1))).toThrow(RebalanceError)
    })
})

describe('TradeAction', () => {
    it('compares equal to its string name', () => {
        expect(TradeAction.BUY).toBe('BUY')
        expect(TradeAction.SELL).toBe('SELL')
        expect(JSON.stringify({ action: TradeAction.SELL })).toBe('{"action":"SELL"}')
    })

    it('narrows only the two known actions', () => {
        expect(isTradeAction('BUY')).toBe(true)
        expect(isTradeAction('Buy')).toBe(false)
        expect(isTradeAction('HOLD')).toBe(false)
    })
})
